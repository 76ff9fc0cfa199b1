/**
 * Run state machine.
 *
 * STARTUP → PLAN → REVIEW → DISRUPT → IMPLEMENT → TEST → REVIEW_POST → VALIDATE → LEARN → COMPLETE,
 * with ABORTED reachable from every active state. Each transition returns a
 * new frozen RunContext; nothing is mutated in place.
 *
 * Dependency direction: state-machine.ts → stages, records/types, errors
 * Used by: orchestrator, session persistence
 */

import { WorkflowError } from '../errors.js';
import type { Handoff, RecoveryRecord, StartupRecord } from '../records/types.js';
import { PIPELINE_STAGES, RunState, isStageName, stageAfter, type RunStateName, type StageName } from '../stages.js';

export type RunEvent =
    | { type: 'STARTED'; payload: { startup: StartupRecord } }
    | { type: 'PROCEED' }
    | { type: 'REVISE'; payload: { errors: string[] } }
    | { type: 'ESCALATE'; payload: { handoff: Handoff } }
    | { type: 'STOP'; payload: { recovery: RecoveryRecord } }
    | { type: 'APPROVED' }
    | { type: 'REJECTED'; payload: { recovery: RecoveryRecord } };

export type RunEventType = RunEvent['type'];

export interface TransitionEntry {
    from: RunStateName;
    to: RunStateName;
    /** `RESUMED` marks a run re-opened from saved state rather than a table transition. */
    event: RunEventType | 'RESUMED';
    timestamp: string;
}

export interface RunContext {
    readonly runId: string;
    readonly objective: string;
    readonly state: RunStateName;
    /** Retries used by each stage occurrence since its last escalation. */
    readonly retries: Readonly<Partial<Record<StageName, number>>>;
    readonly escalationChain: readonly string[];
    /** Index into the escalation chain of the agent working the current stage. */
    readonly agentIndex: number;
    readonly completedStages: readonly StageName[];
    readonly history: readonly TransitionEntry[];
    readonly handoffs: readonly Handoff[];
    readonly lastErrors: readonly string[];
    readonly startup?: StartupRecord;
    readonly recovery?: RecoveryRecord;
}

const TERMINAL_STATES: readonly RunStateName[] = [RunState.Complete, RunState.Aborted];

function buildTransitionTable(): Map<RunStateName, Partial<Record<RunEventType, RunStateName>>> {
    const table = new Map<RunStateName, Partial<Record<RunEventType, RunStateName>>>();
    table.set(RunState.Startup, { STARTED: 'PLAN', STOP: RunState.Aborted });

    for (const stage of PIPELINE_STAGES) {
        const row: Partial<Record<RunEventType, RunStateName>> = {
            REVISE: stage,
            ESCALATE: stage,
            STOP: RunState.Aborted,
        };
        if (stage === 'PLAN') {
            // PLAN leaves only through the human approval decision
            row.APPROVED = stageAfter(stage) ?? RunState.Complete;
            row.REJECTED = RunState.Aborted;
        } else {
            row.PROCEED = stageAfter(stage) ?? RunState.Complete;
        }
        table.set(stage, row);
    }

    table.set(RunState.Complete, {});
    table.set(RunState.Aborted, {});
    return table;
}

/** `(state, event) → next state`. States or events missing from a row are illegal. */
export const TRANSITIONS: ReadonlyMap<RunStateName, Partial<Record<RunEventType, RunStateName>>> = buildTransitionTable();

/**
 * Create a fresh run context in STARTUP.
 *
 * @throws {WorkflowError} when the escalation chain is empty.
 */
export function createRunContext(runId: string, objective: string, escalationChain: readonly string[]): RunContext {
    if (escalationChain.length === 0) {
        throw new WorkflowError('Escalation chain must name at least one agent', { runId });
    }
    return Object.freeze({
        runId,
        objective,
        state: RunState.Startup,
        retries: {},
        escalationChain: [...escalationChain],
        agentIndex: 0,
        completedStages: [],
        history: [],
        handoffs: [],
        lastErrors: [],
    });
}

/** Target state of an event, or null when the table has no entry. */
export function nextState(state: RunStateName, event: RunEventType): RunStateName | null {
    return TRANSITIONS.get(state)?.[event] ?? null;
}

/**
 * Apply an event to the run context.
 *
 * @throws {WorkflowError} for a transition missing from the table, or an
 *   escalation past the end of the escalation chain.
 */
export function transition(ctx: RunContext, event: RunEvent, now: Date = new Date()): RunContext {
    const target = nextState(ctx.state, event.type);
    if (!target) {
        throw new WorkflowError(`Invalid transition: ${ctx.state} + ${event.type}`, {
            state: ctx.state,
            event: event.type,
        });
    }

    const entry: TransitionEntry = { from: ctx.state, to: target, event: event.type, timestamp: now.toISOString() };
    const base = { ...ctx, state: target, history: [...ctx.history, entry] };
    const stage = currentStage(ctx);

    switch (event.type) {
        case 'STARTED':
            return Object.freeze({ ...base, startup: event.payload.startup });

        case 'PROCEED':
        case 'APPROVED':
            return Object.freeze({
                ...base,
                completedStages: stage ? [...ctx.completedStages, stage] : ctx.completedStages,
                agentIndex: 0,
                lastErrors: [],
            });

        case 'REVISE':
            return Object.freeze({
                ...base,
                retries: stage ? { ...ctx.retries, [stage]: retryCount(ctx, stage) + 1 } : ctx.retries,
                lastErrors: event.payload.errors,
            });

        case 'ESCALATE': {
            if (getNextAgent(ctx) === null) {
                throw new WorkflowError('Escalation chain exhausted', {
                    state: ctx.state,
                    chain: ctx.escalationChain,
                });
            }
            return Object.freeze({
                ...base,
                retries: stage ? { ...ctx.retries, [stage]: 0 } : ctx.retries,
                agentIndex: ctx.agentIndex + 1,
                handoffs: [...ctx.handoffs, event.payload.handoff],
            });
        }

        case 'STOP':
        case 'REJECTED':
            return Object.freeze({ ...base, recovery: event.payload.recovery });
    }
}

/**
 * Re-open a run at a stage, e.g. the `resume_stage` of its recovery record,
 * or at STARTUP. Retry counters and the escalation position start over.
 */
export function resumeAt(
    ctx: RunContext,
    target: StageName | typeof RunState.Startup,
    now: Date = new Date(),
): RunContext {
    const stageIndex = target === RunState.Startup ? 0 : PIPELINE_STAGES.indexOf(target);
    const entry: TransitionEntry = { from: ctx.state, to: target, event: 'RESUMED', timestamp: now.toISOString() };
    return Object.freeze({
        ...ctx,
        state: target,
        retries: {},
        agentIndex: 0,
        completedStages: ctx.completedStages.filter((s) => PIPELINE_STAGES.indexOf(s) < stageIndex),
        history: [...ctx.history, entry],
        lastErrors: [],
        recovery: undefined,
    });
}

export function isTerminal(ctx: RunContext): boolean {
    return TERMINAL_STATES.includes(ctx.state);
}

/** The pipeline stage the run is in, or null in STARTUP and the terminal states. */
export function currentStage(ctx: RunContext): StageName | null {
    return isStageName(ctx.state) ? ctx.state : null;
}

export function retryCount(ctx: RunContext, stage: StageName): number {
    return ctx.retries[stage] ?? 0;
}

/** The agent working the current stage. */
export function currentAgent(ctx: RunContext): string {
    return ctx.escalationChain[ctx.agentIndex] ?? ctx.escalationChain[ctx.escalationChain.length - 1] ?? '';
}

/** The agent an escalation would hand the stage to, or null when the chain is exhausted. */
export function getNextAgent(ctx: RunContext): string | null {
    return ctx.escalationChain[ctx.agentIndex + 1] ?? null;
}
