/**
 * Quality gate engine — the stage-exit checkpoint.
 *
 * Combines schema validation, evidence verification, fabrication detection
 * and (at the two designated stages) an external review into one decision:
 * PROCEED, REVISE, ESCALATE or STOP. The decision depends only on the stage,
 * the output batch and the retry count; the timestamp goes to the log alone.
 *
 * Dependency direction: engine.ts → records, evidence-verifier, gate-log, policy, report, utils/parallel
 * Used by: orchestrator, liveness monitor, `stagegate gate`
 */

import type { ExternalReviewer } from '../../collaborators/types.js';
import { requiresExternalApproval, type StageName } from '../stages.js';
import { toWorkflowRecord, dataOfKind } from '../records/codec.js';
import type { SchemaName } from '../records/schema.js';
import type { Evidence, Task, WorkflowRecord } from '../records/types.js';
import { detectSchema, validateRecord } from '../records/validator.js';
import { withTimeout } from '../../utils/parallel.js';
import { logger } from '../../utils/logger.js';
import type { EvidenceVerifier } from './evidence-verifier.js';
import type { GateLog } from './gate-log.js';
import {
    REQUIRED_SCHEMAS,
    decideAction,
    formatIssue,
    type GateAction,
    type GateIssue,
    type GatePolicy,
} from './policy.js';
import { formatRemediationReport } from './report.js';

/** Outcome of one gate evaluation. */
export interface GateDecision {
    stage: StageName;
    action: GateAction;
    /** Every failed check, formatted `[schema] Kind: message`. */
    errors: string[];
    issues: GateIssue[];
    /** Schemas detected in the batch, in first-seen order. */
    checkedSchemas: SchemaName[];
    requiredSchemas: SchemaName[];
    missingSchemas: SchemaName[];
    retry: number;
    /** Records of the batch that passed schema validation. */
    records: WorkflowRecord[];
    /** Non-blocking findings, such as stale evidence artifacts. */
    warnings: string[];
    /** SHA-256 of every claimed artifact that could be read, by evidence id. */
    artifacts: Record<string, string>;
    /** Remediation report; present on every non-PROCEED decision. */
    report?: string;
}

export interface GateEngineOptions {
    policy: GatePolicy;
    verifier: EvidenceVerifier;
    gateLog: GateLog;
    reviewer?: ExternalReviewer;
    reviewerTimeoutMs: number;
    runId: string;
    objective: string;
    /** Tasks outside the batch used to find an evidence record's owner. */
    knownTasks?: () => readonly Task[];
    now?: () => Date;
}

/** Options of a single gate evaluation. */
export interface GateRunOptions {
    /**
     * Evaluate without side effects: the external reviewer is not consulted
     * and nothing is appended to the gate log.
     */
    dryRun?: boolean;
}

export class QualityGateEngine {
    private readonly options: GateEngineOptions;

    constructor(options: GateEngineOptions) {
        this.options = options;
    }

    get policy(): GatePolicy {
        return this.options.policy;
    }

    /**
     * Evaluate a stage's output batch.
     *
     * @param outputRecords - Record envelopes, unvalidated
     * @param retryCount - How many times this stage occurrence has already been revised
     */
    async gate(
        stage: StageName,
        outputRecords: readonly unknown[],
        retryCount: number,
        runOptions: GateRunOptions = {},
    ): Promise<GateDecision> {
        const dryRun = runOptions.dryRun ?? false;
        const issues: GateIssue[] = [];
        const checkedSchemas: SchemaName[] = [];
        const records: WorkflowRecord[] = [];

        // 1. Schema validation
        outputRecords.forEach((output, index) => {
            const kind = detectSchema(output);
            if (!kind) {
                issues.push({ kind: 'SchemaViolation', message: `output #${index + 1}: missing or unknown record kind` });
                return;
            }
            if (!checkedSchemas.includes(kind)) checkedSchemas.push(kind);

            const result = validateRecord(output, kind);
            if (result.ok) {
                records.push(toWorkflowRecord(output));
            } else {
                issues.push(...result.errors.map((message) => ({ kind: 'SchemaViolation' as const, schema: kind, message })));
            }
        });

        // 2. Required schemas
        const requiredSchemas = [...REQUIRED_SCHEMAS[stage]];
        const missingSchemas = requiredSchemas.filter((s) => !checkedSchemas.includes(s));
        for (const schema of missingSchemas) {
            issues.push({ kind: 'SchemaViolation', message: `Missing required schema: ${schema}` });
        }

        // 3. Evidence proofs, 4. fabricated completions
        const tasks = dataOfKind(records, 'task');
        const evidence = dataOfKind(records, 'evidence');
        const verification = await this.verifyEvidence(evidence, tasks);
        issues.push(...verification.issues);
        issues.push(...findFabrications(tasks, evidence));

        // 5. Blocking external approval
        if (requiresExternalApproval(stage) && !dryRun) {
            const rejection = await this.requestExternalApproval(stage, records);
            if (rejection) issues.push(rejection);
        }

        // 6. Decision
        const action = decideAction(issues, retryCount, this.options.policy);
        const decision: GateDecision = {
            stage,
            action,
            errors: issues.map(formatIssue),
            issues,
            checkedSchemas,
            requiredSchemas,
            missingSchemas,
            retry: retryCount,
            records,
            warnings: verification.warnings,
            artifacts: verification.artifacts,
        };

        if (!dryRun) {
            for (const warning of decision.warnings) logger.warn(`Gate ${stage}: ${warning}`);
            await this.options.gateLog.append({
                stage,
                checked: checkedSchemas,
                errors: decision.errors,
                action,
                retry: retryCount,
                timestamp: (this.options.now?.() ?? new Date()).toISOString(),
            });
        }

        if (action !== 'PROCEED') {
            decision.report = formatRemediationReport(decision, this.options.policy);
        }

        logger.debug(`Gate ${stage} (retry ${retryCount}): ${action} with ${issues.length} error(s)`);
        return decision;
    }

    private async verifyEvidence(evidence: readonly Evidence[], batchTasks: readonly Task[]): Promise<EvidenceCheck> {
        const claimed = evidence.filter((e) => e.verified);
        const owners = [...batchTasks, ...(this.options.knownTasks?.() ?? [])];

        const results = await Promise.all(
            claimed.map((item) => {
                const owner = owners.find((t) => t.metadata.evidence_location === item.location);
                return this.options.verifier.verify(item, owner?.metadata.success_criteria);
            }),
        );

        const check: EvidenceCheck = { issues: [], warnings: [], artifacts: {} };
        results.forEach((result, index) => {
            const item = claimed[index];
            if (!item) return;
            if (result.artifact) check.artifacts[item.id] = result.artifact.sha256;
            if (result.warning) check.warnings.push(`${item.id}: ${result.warning}`);
            if (result.proven) return;
            check.issues.push({
                kind: result.reason === 'missing_file' || result.reason === 'unreadable' ? 'MissingEvidence' : 'UnprovenClaim',
                schema: 'evidence',
                message: `${item.id}: ${result.detail}`,
            });
        });
        return check;
    }

    private async requestExternalApproval(stage: StageName, records: WorkflowRecord[]): Promise<GateIssue | null> {
        const { reviewer, reviewerTimeoutMs, runId, objective } = this.options;
        if (!reviewer) {
            return { kind: 'ExternalRejection', message: `no external reviewer configured for ${stage}` };
        }

        try {
            const verdict = await withTimeout(
                () => reviewer.review({ runId, stage, objective, records }),
                reviewerTimeoutMs,
            );
            if (verdict.approved) return null;
            const reasons = verdict.reasons.length > 0 ? verdict.reasons.join('; ') : 'no reason given';
            return { kind: 'ExternalRejection', message: `reviewer rejected ${stage}: ${reasons}` };
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return { kind: 'ExternalRejection', message: `reviewer unavailable for ${stage}: ${message}` };
        }
    }
}

interface EvidenceCheck {
    issues: GateIssue[];
    warnings: string[];
    artifacts: Record<string, string>;
}

/** Completed tasks whose evidence location no evidence record in the batch points at. */
function findFabrications(tasks: readonly Task[], evidence: readonly Evidence[]): GateIssue[] {
    const locations = new Set(evidence.map((e) => e.location));
    return tasks
        .filter((t) => t.status === 'completed' && !locations.has(t.metadata.evidence_location))
        .map((t) => ({
            kind: 'Fabrication' as const,
            schema: 'task' as const,
            message: `${t.id} claims completion with no evidence at ${t.metadata.evidence_location}`,
        }));
}
