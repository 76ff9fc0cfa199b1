/**
 * Gate policy — required schemas per stage and the action decision rule.
 *
 * Dependency direction: policy.ts → stages, records/schema
 * Used by: gate engine, remediation report, orchestrator
 */

import type { StageName } from '../stages.js';
import type { SchemaName } from '../records/schema.js';

export type GateAction = 'PROCEED' | 'REVISE' | 'ESCALATE' | 'STOP';

/** Kinds of gate failure. */
export type GateErrorKind =
    | 'SchemaViolation'
    | 'MissingEvidence'
    | 'UnprovenClaim'
    | 'ExternalRejection'
    | 'DependencyCycle'
    | 'Fabrication';

/** One failed check. */
export interface GateIssue {
    kind: GateErrorKind;
    /** Schema of the record involved, when there is one. */
    schema?: SchemaName;
    message: string;
}

/** Numeric thresholds of the decision rule. */
export interface GatePolicy {
    /** Retries allowed before a failing stage escalates. */
    maxRetry: number;
    /** More errors than this in one batch stops the run. */
    errorCeiling: number;
    /** This many fabricated completion claims in one batch stops the run. */
    fabricationStopThreshold: number;
}

export const DEFAULT_GATE_POLICY: GatePolicy = {
    maxRetry: 3,
    errorCeiling: 10,
    fabricationStopThreshold: 2,
};

/** Schemas each stage's output batch must contain at least one record of. */
export const REQUIRED_SCHEMAS: Record<StageName, readonly SchemaName[]> = {
    PLAN: ['task', 'evidence'],
    REVIEW: ['review_gate', 'evidence'],
    DISRUPT: ['conflict', 'evidence'],
    IMPLEMENT: ['task', 'evidence'],
    TEST: ['evidence', 'metrics'],
    REVIEW_POST: ['review_gate', 'evidence'],
    VALIDATE: ['review_gate', 'evidence'],
    LEARN: ['skill', 'metrics'],
};

/**
 * Decide the gate action for a batch.
 *
 * The error ceiling and repeated fabrication stop the run regardless of the
 * retry count; a single fabrication is never retried in place.
 */
export function decideAction(issues: readonly GateIssue[], retryCount: number, policy: GatePolicy): GateAction {
    if (issues.length === 0) return 'PROCEED';
    if (issues.length > policy.errorCeiling) return 'STOP';

    const fabrications = issues.filter((i) => i.kind === 'Fabrication').length;
    if (fabrications >= policy.fabricationStopThreshold) return 'STOP';
    if (fabrications > 0) return 'ESCALATE';

    if (retryCount >= policy.maxRetry) return 'ESCALATE';
    return 'REVISE';
}

/** `[schema] Kind: message` */
export function formatIssue(issue: GateIssue): string {
    const prefix = issue.schema ? `[${issue.schema}] ` : '';
    return `${prefix}${issue.kind}: ${issue.message}`;
}
