/**
 * Pipeline stage names and run states.
 *
 * Dependency direction: stages.ts → nothing (leaf module)
 * Used by: records, gate engine, dispatcher, state machine
 */

/** The fixed pipeline, in execution order. REVIEW_POST is the second review occurrence. */
export const PIPELINE_STAGES = [
    'PLAN',
    'REVIEW',
    'DISRUPT',
    'IMPLEMENT',
    'TEST',
    'REVIEW_POST',
    'VALIDATE',
    'LEARN',
] as const;

export type StageName = (typeof PIPELINE_STAGES)[number];

/** Every state a run can be in. */
export const RunState = {
    Startup: 'STARTUP',
    Complete: 'COMPLETE',
    Aborted: 'ABORTED',
} as const;

export type RunStateName = StageName | (typeof RunState)[keyof typeof RunState];

/**
 * Stages whose gate additionally requires an independent external approval:
 * the pre-execution assumption challenge and the final acceptance.
 */
export const EXTERNAL_APPROVAL_STAGES: readonly StageName[] = ['DISRUPT', 'VALIDATE'];

/** Check whether a string names a pipeline stage. */
export function isStageName(value: string): value is StageName {
    return (PIPELINE_STAGES as readonly string[]).includes(value);
}

/** The stage after `stage`, or null after the last one. */
export function stageAfter(stage: StageName): StageName | null {
    const index = PIPELINE_STAGES.indexOf(stage);
    return PIPELINE_STAGES[index + 1] ?? null;
}

/** Whether a stage's gate must consult the external reviewer. */
export function requiresExternalApproval(stage: StageName): boolean {
    return EXTERNAL_APPROVAL_STAGES.includes(stage);
}
