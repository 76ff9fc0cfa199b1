/**
 * Orchestrator — drives a run through the stage pipeline.
 *
 * This is the main loop that:
 * 1. Checks startup preconditions and lays out the run directory
 * 2. Plans, gates the plan and waits for its approval
 * 3. Dispatches each stage's tasks and gates the resulting batch
 * 4. Applies PROCEED / REVISE / ESCALATE / STOP through the state machine
 * 5. Saves run state after every step and archives the records at the end
 *
 * Dependency direction: orchestrator.ts → state-machine, dispatcher, gate/engine, startup, session, control-records
 * Used by: cli/commands/run.ts
 */

import { join } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import type {
    ExternalReviewer,
    KeyValueStore,
    PlanApprover,
    Planner,
    PlanResult,
    ServiceProbe,
    StageExecutionContext,
    StageHandler,
    Timer,
} from '../../collaborators/types.js';
import { DependencyCycleError, ValidationError, WorkflowError } from '../errors.js';
import { EvidenceVerifier } from '../gate/evidence-verifier.js';
import { QualityGateEngine, type GateDecision } from '../gate/engine.js';
import { FileGateLog } from '../gate/gate-log.js';
import type { GatePolicy } from '../gate/policy.js';
import { compactTimestamp, envelope, formatRecoveryId } from '../records/codec.js';
import { RecordStore } from '../records/store.js';
import type { RecoveryRecord, WorkflowRecord } from '../records/types.js';
import { PIPELINE_STAGES, RunState, type StageName } from '../stages.js';
import { logger } from '../../utils/logger.js';
import { buildHandoff, buildRecovery } from './control-records.js';
import { StageDispatcher, type DispatchResult } from './dispatcher.js';
import { LivenessMonitor } from './liveness.js';
import { archiveRun, generateRunId, getRunDir, loadRun, saveRun } from './session.js';
import { runStartupChecks } from './startup.js';
import {
    createRunContext,
    currentAgent,
    currentStage,
    getNextAgent,
    isTerminal,
    resumeAt,
    retryCount,
    transition,
    type RunContext,
} from './state-machine.js';

export interface OrchestratorSettings {
    policy: GatePolicy;
    failureMarkers: readonly string[];
    evidenceMaxAgeSeconds: number;
    reviewerTimeoutMs: number;
    workerPoolWidth: number;
    parallelThreshold: number;
    escalationChain: readonly string[];
    livenessIntervalMs: number;
    handoffDeadlineMinutes: number;
    /** Directory holding one sub-directory per run. */
    runsDir: string;
}

export interface OrchestratorDependencies {
    settings: OrchestratorSettings;
    planner: Planner;
    /** The handler doing a stage's work. */
    handlerFor: (stage: StageName) => StageHandler;
    reviewer?: ExternalReviewer;
    /** Plan approval; without one the plan is approved as soon as its gate passes. */
    approver?: PlanApprover;
    memory: KeyValueStore;
    timer: Timer;
    probes: readonly ServiceProbe[];
    /** Suppress spinners (tests, non-interactive use). */
    quiet?: boolean;
    now?: () => Date;
}

/** Final state of a run. */
export interface RunOutcome {
    runId: string;
    runDir: string;
    context: RunContext;
    store: RecordStore;
    /** Every gate decision taken during this invocation, in order. */
    decisions: GateDecision[];
}

interface ActiveRun {
    runDir: string;
    session: string;
    createdAt: number;
    store: RecordStore;
    engine: QualityGateEngine;
    decisions: GateDecision[];
    latestBatch: { stage: StageName; records: unknown[]; retry: number } | null;
}

export class Orchestrator {
    private readonly deps: OrchestratorDependencies;
    private readonly now: () => Date;

    constructor(deps: OrchestratorDependencies) {
        this.deps = deps;
        this.now = deps.now ?? (() => new Date());
    }

    /** Start a new run for an objective. */
    async run(objective: string): Promise<RunOutcome> {
        const started = this.now();
        const runId = generateRunId(objective, started.getTime());
        const ctx = createRunContext(runId, objective, this.deps.settings.escalationChain);
        const active = this.activate(runId, objective, compactTimestamp(started), started.getTime(), new RecordStore());

        logger.header('stagegate — Running Workflow');
        console.log(chalk.gray(`Objective: ${objective}`));
        console.log(chalk.gray(`Run: ${runId}`));

        return this.drive(ctx, active);
    }

    /**
     * Resume a saved run. An aborted run restarts at its recovery record's
     * `resume_stage`; a completed run is returned unchanged.
     *
     * @throws {WorkflowError} when no saved run exists under that id.
     */
    async resume(runId: string): Promise<RunOutcome> {
        const runDir = getRunDir(this.deps.settings.runsDir, runId);
        const loaded = loadRun(runDir);
        if (!loaded) {
            throw new WorkflowError(`No saved run found: ${runId}`, { runDir });
        }

        const active = this.activate(runId, loaded.context.objective, loaded.session, loaded.createdAt, loaded.store);
        let ctx = loaded.context;

        logger.header('stagegate — Resuming Workflow');
        console.log(chalk.gray(`Run: ${runId} (${ctx.state})`));

        if (ctx.state === RunState.Complete) {
            logger.info('Run already complete — nothing to resume.');
            return { runId, runDir, context: ctx, store: loaded.store, decisions: [] };
        }

        if (ctx.state === RunState.Aborted) {
            const recovery = ctx.recovery;
            if (!recovery) {
                throw new WorkflowError(`Aborted run has no recovery record: ${runId}`, { runId });
            }
            active.store.append(envelope('recovery', { ...recovery, id: formatRecoveryId(this.now()), success: true }));
            // A run that never passed startup repeats it
            const target = ctx.startup ? recovery.resume_stage : RunState.Startup;
            ctx = resumeAt(ctx, target, this.now());
            logger.info(`Resuming at ${target} after ${recovery.trigger}`);
        }

        return this.drive(ctx, active);
    }

    // ── Main loop ──

    private activate(runId: string, objective: string, session: string, createdAt: number, store: RecordStore): ActiveRun {
        const { settings } = this.deps;
        const runDir = getRunDir(settings.runsDir, runId);
        const engine = new QualityGateEngine({
            policy: settings.policy,
            verifier: new EvidenceVerifier({
                failureMarkers: settings.failureMarkers,
                maxAgeSeconds: settings.evidenceMaxAgeSeconds,
            }),
            gateLog: new FileGateLog(join(runDir, 'logs')),
            reviewer: this.deps.reviewer,
            reviewerTimeoutMs: settings.reviewerTimeoutMs,
            runId,
            objective,
            knownTasks: () => store.listTasks(),
            now: this.now,
        });
        return { runDir, session, createdAt, store, engine, decisions: [], latestBatch: null };
    }

    private async drive(initial: RunContext, active: ActiveRun): Promise<RunOutcome> {
        let ctx = initial;
        // A resumed run already passed startup, which is where the sink is normally attached
        if (ctx.startup) logger.setLogFile(join(active.runDir, 'logs', 'workflow.log'));
        const liveness = new LivenessMonitor(this.deps.timer, this.deps.settings.livenessIntervalMs, async () => {
            const batch = active.latestBatch;
            if (!batch) return null;
            return active.engine.gate(batch.stage, batch.records, batch.retry, { dryRun: true });
        });

        try {
            while (!isTerminal(ctx)) {
                ctx = await this.step(ctx, active);
                if (!isTerminal(ctx)) liveness.start();
                saveRun(active.runDir, active.session, ctx, active.store, active.createdAt);
            }
        } catch (err) {
            logger.error(`Run failed: ${err instanceof Error ? err.message : String(err)}`);
            if (!isTerminal(ctx)) {
                const recovery = this.recover(active, 'unexpected_error', ctx, currentStage(ctx) ?? 'PLAN');
                ctx = transition(ctx, { type: 'STOP', payload: { recovery } }, this.now());
            }
        } finally {
            liveness.stop();
        }

        try {
            await archiveRun(active.runDir, active.store);
            saveRun(active.runDir, active.session, ctx, active.store, active.createdAt);
        } finally {
            logger.setLogFile(null);
        }
        printRunSummary(ctx);

        return { runId: ctx.runId, runDir: active.runDir, context: ctx, store: active.store, decisions: active.decisions };
    }

    private async step(ctx: RunContext, active: ActiveRun): Promise<RunContext> {
        if (ctx.state === RunState.Startup) {
            return this.startupStep(ctx, active);
        }
        const stage = currentStage(ctx);
        if (!stage) {
            throw new WorkflowError(`Run is not in a pipeline stage: ${ctx.state}`, { state: ctx.state });
        }
        return stage === 'PLAN' ? this.planStep(ctx, active) : this.stageStep(ctx, stage, active);
    }

    private async startupStep(ctx: RunContext, active: ActiveRun): Promise<RunContext> {
        const spinner = ora({ text: 'Checking startup preconditions...', isSilent: this.deps.quiet }).start();
        const result = await runStartupChecks({
            probes: this.deps.probes,
            memory: this.deps.memory,
            timer: this.deps.timer,
            runDir: active.runDir,
            now: this.now,
        });
        active.store.append(envelope('startup', result.record));

        if (!result.ok) {
            spinner.fail('Startup preconditions failed');
            for (const error of result.errors) logger.error(error);
            const recovery = this.recover(active, 'startup_failed', ctx, 'PLAN');
            return transition(ctx, { type: 'STOP', payload: { recovery } }, this.now());
        }

        spinner.succeed('Startup preconditions met');
        logger.setLogFile(join(active.runDir, 'logs', 'workflow.log'));
        return transition(ctx, { type: 'STARTED', payload: { startup: result.record } }, this.now());
    }

    private async planStep(ctx: RunContext, active: ActiveRun): Promise<RunContext> {
        const retry = retryCount(ctx, 'PLAN');
        const spinner = ora({ text: `PLAN (${currentAgent(ctx)}, retry ${retry})...`, isSilent: this.deps.quiet }).start();

        let plan: PlanResult = { tasks: [], records: [] };
        try {
            plan = await this.deps.planner.plan({
                runId: ctx.runId,
                session: active.session,
                objective: ctx.objective,
                agent: currentAgent(ctx),
                retryCount: retry,
                runDir: active.runDir,
                nextEvidenceId: () => active.store.nextEvidenceId('PLAN', active.session),
            });
        } catch (err) {
            logger.error(`Planner failed: ${err instanceof Error ? err.message : String(err)}`);
        }

        const batch: unknown[] = [...plan.tasks.map((t) => envelope('task', t)), ...plan.records];
        const decision = await this.gateBatch(active, 'PLAN', batch, retry);
        spinner.stop();

        if (decision.action !== 'PROCEED') {
            return this.applyFailure(ctx, active, decision);
        }
        logger.success(`PLAN gate passed (${plan.tasks.length} task(s))`);

        // No timeout: the run waits for the decision
        const approved = this.deps.approver ? await this.deps.approver.approve(plan, ctx.objective) : true;
        if (!approved) {
            logger.warn('Plan rejected');
            const recovery = this.recover(active, 'plan_rejected', ctx, 'PLAN');
            return transition(ctx, { type: 'REJECTED', payload: { recovery } }, this.now());
        }

        this.commit(active.store, decision.records);
        return transition(ctx, { type: 'APPROVED' }, this.now());
    }

    private async stageStep(ctx: RunContext, stage: StageName, active: ActiveRun): Promise<RunContext> {
        const { store } = active;
        const retry = retryCount(ctx, stage);
        const agent = currentAgent(ctx);
        const spinner = ora({ text: `${stage} (${agent}, retry ${retry})...`, isSilent: this.deps.quiet }).start();

        for (const task of store.listTasks(stage)) {
            if (task.status !== 'pending') store.reopenTask(task.id);
        }
        const tasks = store.listTasks(stage);

        const execution: StageExecutionContext = {
            runId: ctx.runId,
            session: active.session,
            stage,
            agent,
            retryCount: retry,
            runDir: active.runDir,
            handoff: [...ctx.handoffs].reverse().find((h) => h.context.current_stage === stage),
            nextEvidenceId: () => store.nextEvidenceId(stage, active.session),
        };

        const dispatcher = new StageDispatcher(store, this.deps.handlerFor(stage), {
            workerPoolWidth: this.deps.settings.workerPoolWidth,
            parallelThreshold: this.deps.settings.parallelThreshold,
            now: this.now,
        });

        let dispatched: DispatchResult;
        try {
            dispatched = await dispatcher.dispatch(stage, tasks, execution);
        } catch (err) {
            spinner.fail(`${stage} dispatch failed`);
            if (err instanceof DependencyCycleError) {
                logger.error(err.message);
                const recovery = this.recover(active, 'dependency_cycle', ctx, stage);
                return transition(ctx, { type: 'STOP', payload: { recovery } }, this.now());
            }
            if (err instanceof ValidationError) {
                logger.error(err.message);
                const recovery = this.recover(active, 'unknown_dependency', ctx, stage);
                return transition(ctx, { type: 'STOP', payload: { recovery } }, this.now());
            }
            throw err;
        }

        const batch: unknown[] = [];
        for (const result of dispatched.results) {
            const task = store.getTask(result.taskId);
            if (task) batch.push(envelope('task', task));
            batch.push(...result.evidenceClaims.map((e) => envelope('evidence', e)), ...result.records);
        }

        const decision = await this.gateBatch(active, stage, batch, retry);
        spinner.stop();

        if (decision.action !== 'PROCEED') {
            return this.applyFailure(ctx, active, decision);
        }

        // Task status updates already live in the store; commit the rest.
        this.commit(store, decision.records.filter((r) => r.kind !== 'task'));
        logger.success(`${stage} gate passed`);
        return transition(ctx, { type: 'PROCEED' }, this.now());
    }

    // ── Decisions ──

    private async gateBatch(active: ActiveRun, stage: StageName, records: unknown[], retry: number): Promise<GateDecision> {
        active.latestBatch = { stage, records, retry };
        const decision = await active.engine.gate(stage, records, retry);
        active.decisions.push(decision);
        return decision;
    }

    private applyFailure(ctx: RunContext, active: ActiveRun, decision: GateDecision): RunContext {
        const stage = decision.stage;
        logger.warn(`${stage} gate: ${decision.action} (${decision.errors.length} error(s))`);
        if (decision.report) logger.info(decision.report);

        switch (decision.action) {
            case 'REVISE':
                return transition(ctx, { type: 'REVISE', payload: { errors: decision.errors } }, this.now());

            case 'ESCALATE': {
                const next = getNextAgent(ctx);
                if (!next) {
                    logger.error(`Escalation chain exhausted at ${stage}`);
                    const recovery = this.recover(active, 'escalation_exhausted', ctx, stage);
                    return transition(ctx, { type: 'STOP', payload: { recovery } }, this.now());
                }
                const handoff = buildHandoff({
                    from: currentAgent(ctx),
                    to: next,
                    objective: ctx.objective,
                    stage,
                    completedStages: ctx.completedStages,
                    pendingTasks: active.store.listTasks(stage).filter((t) => t.status !== 'completed'),
                    evidenceRefs: active.store.listEvidence().map((e) => e.id),
                    blockers: decision.errors,
                    deadlineMinutes: this.deps.settings.handoffDeadlineMinutes,
                    now: this.now(),
                });
                active.store.append(envelope('handoff', handoff));
                logger.info(`Escalating ${stage}: ${handoff.from} → ${handoff.to}`);
                return transition(ctx, { type: 'ESCALATE', payload: { handoff } }, this.now());
            }

            case 'STOP': {
                const recovery = this.recover(active, `gate_stop:${stage.toLowerCase()}`, ctx, stage);
                return transition(ctx, { type: 'STOP', payload: { recovery } }, this.now());
            }

            case 'PROCEED':
                throw new WorkflowError(`PROCEED is not a failure: ${stage}`, { stage });
        }
    }

    private recover(active: ActiveRun, trigger: string, ctx: RunContext, resumeStage: StageName): RecoveryRecord {
        const lastGood = ctx.completedStages[ctx.completedStages.length - 1];
        const recovery = buildRecovery({
            trigger,
            rollbackTo: lastGood ?? RunState.Startup,
            resumeStage,
            now: this.now(),
        });
        active.store.append(envelope('recovery', recovery));
        logger.warn(`Recovery point ${recovery.id}: resume at ${resumeStage} (${trigger})`);
        return recovery;
    }

    /** Commit gated records. Only evidence that claimed and passed verification is stored. */
    private commit(store: RecordStore, records: readonly WorkflowRecord[]): void {
        for (const record of records) {
            if (record.kind === 'evidence') {
                if (!record.data.verified) continue;
                if (store.getEvidence(record.data.id)) {
                    logger.warn(`Evidence ${record.data.id} already recorded — skipped`);
                    continue;
                }
            }
            if (record.kind === 'task' && store.getTask(record.data.id)) {
                logger.warn(`Task ${record.data.id} already exists — skipped`);
                continue;
            }
            store.append(record);
        }
    }
}

/** Print a colored summary of the run. */
function printRunSummary(ctx: RunContext): void {
    console.log();
    logger.header('Run Summary');
    console.log(chalk.gray(`Objective: ${ctx.objective}`));
    console.log(chalk.gray(`Final state: ${ctx.state}`));
    console.log(chalk.gray(`Stages passed: ${ctx.completedStages.length}/${PIPELINE_STAGES.length}`));
    console.log(chalk.gray(`Handoffs: ${ctx.handoffs.length}`));

    if (ctx.history.length > 0) {
        console.log();
        console.log(chalk.bold('  State transitions:'));
        for (const step of ctx.history) {
            const arrow = step.to === RunState.Aborted ? chalk.red('→') : chalk.green('→');
            console.log(chalk.gray(`    ${step.from} ${arrow} ${chalk.white(step.to)} (${step.event})`));
        }
    }

    console.log();
    if (ctx.state === RunState.Complete) {
        logger.success('Run completed successfully!');
    } else if (ctx.state === RunState.Aborted) {
        logger.error(`Run aborted${ctx.recovery ? ` (${ctx.recovery.trigger}, resume at ${ctx.recovery.resume_stage})` : ''}.`);
    } else {
        logger.warn(`Run stopped in state: ${ctx.state}`);
    }
}
