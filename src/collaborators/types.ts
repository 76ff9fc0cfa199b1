/**
 * Interfaces of the external collaborators the engine drives.
 *
 * The engine never performs stage work itself: handlers produce task status
 * and evidence claims, reviewers and approvers decide, stores persist.
 *
 * Dependency direction: collaborators/types.ts → records/types, stages
 * Used by: dispatcher, gate engine, orchestrator, concrete collaborators
 */

import type { StageName } from '../core/stages.js';
import type { Evidence, Handoff, Task, TaskStatus, WorkflowRecord } from '../core/records/types.js';

/** Context handed to a stage handler for one task execution. */
export interface StageExecutionContext {
    runId: string;
    /** Short session tag used in evidence ids. */
    session: string;
    stage: StageName;
    /** The agent currently executing the stage (changes on escalation). */
    agent: string;
    retryCount: number;
    /** Root of the run directory. */
    runDir: string;
    /** The latest handoff for this stage, when the stage was escalated. */
    handoff?: Handoff;
    /** Allocate a fresh evidence id for this stage. */
    nextEvidenceId(): string;
}

/** What a stage handler reports back for one task. */
export interface StageHandlerResult {
    status: Extract<TaskStatus, 'completed' | 'failed' | 'blocked'>;
    evidenceClaims: Evidence[];
    /**
     * Additional record envelopes (review gates, conflicts, metrics, skills, …)
     * for the stage batch. Unvalidated: the gate checks them.
     */
    records?: unknown[];
}

/** Performs the actual work of a stage for one task. */
export interface StageHandler {
    execute(task: Task, context: StageExecutionContext): Promise<StageHandlerResult>;
}

/** Context handed to the planner. */
export interface PlanContext {
    runId: string;
    session: string;
    objective: string;
    agent: string;
    retryCount: number;
    runDir: string;
    nextEvidenceId(): string;
}

/** Output of the PLAN stage. */
export interface PlanResult {
    tasks: Task[];
    /** Record envelopes for the PLAN batch. Unvalidated: the gate checks them. */
    records: unknown[];
}

/** Produces the run's tasks during PLAN. */
export interface Planner {
    plan(context: PlanContext): Promise<PlanResult>;
}

/** Everything an external reviewer sees. */
export interface EvidencePackage {
    runId: string;
    stage: StageName;
    objective: string;
    records: WorkflowRecord[];
}

export interface ReviewVerdict {
    approved: boolean;
    reasons: string[];
}

/** Independent approval authority; a rejection is binding. */
export interface ExternalReviewer {
    review(pkg: EvidencePackage): Promise<ReviewVerdict>;
}

/** Human approval of the plan. Waits indefinitely; false means rejected. */
export interface PlanApprover {
    approve(plan: PlanResult, objective: string): Promise<boolean>;
}

/** Persistent key/value store used for the startup round trip and run memory. */
export interface KeyValueStore {
    get(key: string): Promise<string | undefined>;
    put(key: string, value: string): Promise<void>;
}

export interface TimerHandle {
    cancel(): void;
}

/** Periodic scheduler. */
export interface Timer {
    every(intervalMs: number, callback: () => void | Promise<void>): TimerHandle;
}

export interface TestRunResult {
    passed: number;
    failed: number;
    logPath: string;
}

/** Runs a test suite and writes its log into `logDir`. */
export interface TestRunner {
    run(suiteSelector: string, logDir: string): Promise<TestRunResult>;
}

/** A dependent service checked at startup. */
export interface ServiceProbe {
    name: string;
    ping(): Promise<boolean>;
}
