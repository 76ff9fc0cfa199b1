/**
 * Builders for the control records the orchestrator emits on ESCALATE and STOP.
 *
 * Dependency direction: control-records.ts → records, stages
 * Used by: orchestrator
 */

import { formatRecoveryId } from '../records/codec.js';
import type { Handoff, RecoveryRecord, Task } from '../records/types.js';
import type { StageName } from '../stages.js';

export interface HandoffInput {
    from: string;
    to: string;
    objective: string;
    stage: StageName;
    completedStages: readonly StageName[];
    /** Tasks of the stage that did not complete. */
    pendingTasks: readonly Task[];
    evidenceRefs: readonly string[];
    /** Gate errors that caused the escalation. */
    blockers: readonly string[];
    /** Time the receiving agent has, in minutes. */
    deadlineMinutes: number;
    now: Date;
}

export function buildHandoff(input: HandoffInput): Handoff {
    const deadline = new Date(input.now.getTime() + input.deadlineMinutes * 60_000);
    const instructions = input.blockers.length > 0
        ? `Resolve ${input.blockers.length} gate error(s) in ${input.stage} and resubmit the stage output.`
        : `Take over ${input.stage} and resubmit the stage output.`;

    return {
        from: input.from,
        to: input.to,
        timestamp: input.now.toISOString(),
        context: {
            objective: input.objective,
            current_stage: input.stage,
            completed_stages: [...input.completedStages],
            pending_tasks: input.pendingTasks.map((t) => t.id),
            evidence_refs: [...input.evidenceRefs],
            blockers: [...input.blockers],
        },
        instructions,
        deadline: deadline.toISOString(),
    };
}

export interface RecoveryInput {
    trigger: string;
    /** Last stage known to be good; the run start when none passed yet. */
    rollbackTo: string;
    resumeStage: StageName;
    now: Date;
}

/**
 * A recovery record for a halted run. `success` stays false until the run
 * is resumed from it.
 */
export function buildRecovery(input: RecoveryInput): RecoveryRecord {
    return {
        id: formatRecoveryId(input.now),
        trigger: input.trigger,
        rollback_to: input.rollbackTo,
        resume_stage: input.resumeStage,
        success: false,
    };
}
