/**
 * Remediation report for a failed gate.
 *
 * Dependency direction: report.ts → policy
 * Used by: gate engine, liveness monitor, `stagegate gate`
 */

import type { SchemaName } from '../records/schema.js';
import type { StageName } from '../stages.js';
import type { GateAction, GatePolicy } from './policy.js';

/** The parts of a gate decision the report needs. */
export interface ReportInput {
    stage: StageName;
    action: GateAction;
    errors: readonly string[];
    missingSchemas: readonly SchemaName[];
    retry: number;
}

const NEXT_STEP: Record<GateAction, string> = {
    PROCEED: 'None.',
    REVISE: 'Fix every error listed above and resubmit the stage output.',
    ESCALATE: 'Hand the stage to the next agent in the escalation chain.',
    STOP: 'Halt the run. Resume from the recovery record once the cause is fixed.',
};

/**
 * Plain-text report listing every error and every missing required schema.
 */
export function formatRemediationReport(decision: ReportInput, policy: GatePolicy): string {
    const lines: string[] = [
        `Gate ${decision.stage}: ${decision.action} (retry ${decision.retry}/${policy.maxRetry})`,
        '',
        `Errors (${decision.errors.length}):`,
    ];

    if (decision.errors.length === 0) {
        lines.push('  (none)');
    } else {
        decision.errors.forEach((error, i) => lines.push(`  ${i + 1}. ${error}`));
    }

    lines.push('', 'Missing required schemas:');
    if (decision.missingSchemas.length === 0) {
        lines.push('  (none)');
    } else {
        for (const schema of decision.missingSchemas) lines.push(`  - ${schema}`);
    }

    lines.push('', `Next step: ${NEXT_STEP[decision.action]}`);
    return lines.join('\n');
}
