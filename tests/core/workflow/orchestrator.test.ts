import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Orchestrator, type OrchestratorDependencies } from '../../../src/core/workflow/orchestrator.js';
import { DEFAULT_GATE_POLICY } from '../../../src/core/gate/policy.js';
import { DEFAULT_FAILURE_MARKERS } from '../../../src/core/gate/evidence-verifier.js';
import { dataOfKind, envelope, formatConflictId } from '../../../src/core/records/codec.js';
import type { StageExecutionContext, StageHandlerResult } from '../../../src/collaborators/types.js';
import type { Task } from '../../../src/core/records/types.js';
import { PIPELINE_STAGES, type StageName } from '../../../src/core/stages.js';
import { WorkflowError } from '../../../src/core/errors.js';
import { FIXED_NOW, makeTask, writeArtifact } from '../../helpers/fixtures.js';
import {
    FakeProbe,
    FakeReviewer,
    FixedApprover,
    ManualTimer,
    MemoryKeyValueStore,
    ScriptedStageHandler,
    StaticPlanner,
    type HandlerScript,
} from '../../helpers/fakes.js';

const OBJECTIVE = 'Add OAuth login';
// generateRunId(OBJECTIVE, FIXED_NOW) → slug plus base36 time
const RUN_ID = `add-oauth-login-${FIXED_NOW.getTime().toString(36)}`;
const SESSION = '20260301T120000';

/** Records a stage must add beside its evidence to pass its gate. */
function stageRecords(stage: StageName, context: StageExecutionContext, evidenceId: string): unknown[] {
    const timestamp = FIXED_NOW.toISOString();
    const reviewGate = envelope('review_gate', {
        stage,
        reviewing_agent: context.agent,
        timestamp,
        criteria_checked: ['evidence present'],
        approved: true,
        action: 'proceed',
    });
    const metrics = envelope('metrics', {
        workflow_id: context.runId,
        timestamp,
        total_time_min: 0,
        stages: [stage],
        agents: [context.agent],
        evidence: [evidenceId],
        quality: { score: 1 },
    });

    switch (stage) {
        case 'REVIEW':
        case 'REVIEW_POST':
        case 'VALIDATE':
            return [reviewGate];
        case 'DISRUPT':
            return [
                envelope('conflict', {
                    id: formatConflictId(FIXED_NOW),
                    type: 'plan_disagreement',
                    parties: ['primary', 'secondary'],
                    positions: ['keep', 'split'],
                    resolution: 'keep',
                }),
            ];
        case 'TEST':
            return [metrics];
        case 'LEARN':
            return [
                envelope('skill', {
                    name: 'oauth-flow',
                    source: 'run',
                    purpose: 'login',
                    interface: 'cli',
                    tested: true,
                    evidence_location: join(context.runDir, 'evidence'),
                }),
                metrics,
            ];
        default:
            return [];
    }
}

/** Writes the task's artifact and claims it. */
const succeed: HandlerScript = (task: Task, context: StageExecutionContext): StageHandlerResult => {
    writeArtifact(task.metadata.evidence_location, 'DONE\n');
    const id = context.nextEvidenceId();
    return {
        status: 'completed',
        evidenceClaims: [
            {
                id,
                type: 'log',
                claim: 'DONE',
                location: task.metadata.evidence_location,
                timestamp: FIXED_NOW.toISOString(),
                verified: true,
                verified_by: 'agent',
            },
        ],
        records: stageRecords(context.stage, context, id),
    };
};

describe('Orchestrator', () => {
    let runsDir: string;

    beforeEach(() => {
        runsDir = mkdtempSync(join(tmpdir(), 'stagegate-orch-'));
    });

    afterEach(() => {
        rmSync(runsDir, { recursive: true, force: true });
    });

    /** One task per stage after PLAN, with its artifact under the run's evidence directory. */
    function planner(extra: (runDir: string) => Task[] = () => []): StaticPlanner {
        return new StaticPlanner((context) => {
            const planPath = join(context.runDir, 'plans', 'plan.txt');
            writeArtifact(planPath, 'PLAN READY\n');
            const tasks = PIPELINE_STAGES.filter((s) => s !== 'PLAN' && s !== 'TEST').map((stage) =>
                makeTask(`T-${stage}`, {}, {
                    current_stage: stage,
                    evidence_location: join(context.runDir, 'evidence', `T-${stage}.log`),
                }),
            );
            return {
                tasks: [...tasks, ...extra(context.runDir)],
                records: [
                    envelope('evidence', {
                        id: context.nextEvidenceId(),
                        type: 'output',
                        claim: 'PLAN READY',
                        location: planPath,
                        timestamp: FIXED_NOW.toISOString(),
                        verified: true,
                        verified_by: 'agent',
                    }),
                ],
            };
        });
    }

    function testTasks(runDir: string): Task[] {
        return ['a', 'b'].map((suffix) =>
            makeTask(`T-TEST-${suffix}`, {}, {
                current_stage: 'TEST',
                evidence_location: join(runDir, 'evidence', `T-TEST-${suffix}.log`),
            }),
        );
    }

    function deps(overrides: Partial<OrchestratorDependencies> = {}): OrchestratorDependencies {
        const handler = new ScriptedStageHandler(succeed);
        return {
            settings: {
                policy: DEFAULT_GATE_POLICY,
                failureMarkers: DEFAULT_FAILURE_MARKERS,
                evidenceMaxAgeSeconds: 3600,
                reviewerTimeoutMs: 1000,
                workerPoolWidth: 5,
                parallelThreshold: 3,
                escalationChain: ['primary', 'secondary'],
                livenessIntervalMs: 60_000,
                handoffDeadlineMinutes: 60,
                runsDir,
            },
            planner: planner(testTasks),
            handlerFor: () => handler,
            reviewer: new FakeReviewer(),
            memory: new MemoryKeyValueStore(),
            timer: new ManualTimer(),
            probes: [new FakeProbe('db', true)],
            quiet: true,
            now: () => FIXED_NOW,
            ...overrides,
        };
    }

    it('runs every stage to COMPLETE', async () => {
        const timer = new ManualTimer();
        const outcome = await new Orchestrator(deps({ timer })).run(OBJECTIVE);

        expect(outcome.runId).toBe(RUN_ID);
        expect(outcome.context.state).toBe('COMPLETE');
        expect(outcome.context.completedStages).toEqual([...PIPELINE_STAGES]);
        expect(outcome.decisions.map((d) => `${d.stage}:${d.action}`)).toEqual(PIPELINE_STAGES.map((s) => `${s}:PROCEED`));
        expect(outcome.store.listTasks().every((t) => t.status === 'completed')).toBe(true);
        expect(outcome.store.getEvidence(`E-PLAN-${SESSION}-001`)?.claim).toBe('PLAN READY');
        expect(outcome.store.getEvidence(`E-TEST-${SESSION}-002`)?.location).toBe(join(outcome.runDir, 'evidence', 'T-TEST-b.log'));
        expect(existsSync(join(outcome.runDir, 'state.json'))).toBe(true);
        expect(existsSync(join(outcome.runDir, 'records.jsonl'))).toBe(true);
        expect(existsSync(join(outcome.runDir, 'logs', 'gate_plan.jsonl'))).toBe(true);
        // The liveness timer is cancelled once the run ends
        expect(timer.active.size).toBe(0);
    });

    it('asks the reviewer only at DISRUPT and VALIDATE', async () => {
        const reviewer = new FakeReviewer();
        await new Orchestrator(deps({ reviewer })).run(OBJECTIVE);

        expect(reviewer.packages.map((p) => p.stage)).toEqual(['DISRUPT', 'VALIDATE']);
        expect(reviewer.packages[0]?.objective).toBe(OBJECTIVE);
    });

    it('revises, escalates to the next agent and hands off', async () => {
        const handler = new ScriptedStageHandler((task, context) => {
            if (context.stage === 'IMPLEMENT' && context.agent === 'primary') {
                return { status: 'failed', evidenceClaims: [] };
            }
            return succeed(task, context);
        });
        const outcome = await new Orchestrator(deps({ handlerFor: () => handler })).run(OBJECTIVE);

        expect(outcome.context.state).toBe('COMPLETE');
        expect(outcome.decisions.filter((d) => d.stage === 'IMPLEMENT').map((d) => d.action)).toEqual([
            'REVISE',
            'REVISE',
            'REVISE',
            'ESCALATE',
            'PROCEED',
        ]);
        expect(handler.calls.filter((c) => c.stage === 'IMPLEMENT').map((c) => `${c.agent}/${c.retry}`)).toEqual([
            'primary/0',
            'primary/1',
            'primary/2',
            'primary/3',
            'secondary/0',
        ]);
        // The stage after the escalated one starts again with the first agent
        expect(handler.calls.find((c) => c.stage === 'TEST')?.agent).toBe('primary');

        const [handoff] = outcome.context.handoffs;
        expect(outcome.context.handoffs).toHaveLength(1);
        expect(handoff?.from).toBe('primary');
        expect(handoff?.to).toBe('secondary');
        expect(handoff?.context.current_stage).toBe('IMPLEMENT');
        expect(handoff?.context.completed_stages).toEqual(['PLAN', 'REVIEW', 'DISRUPT']);
        expect(handoff?.context.pending_tasks).toEqual(['T-IMPLEMENT']);
        expect(handoff?.context.evidence_refs).toEqual([
            `E-PLAN-${SESSION}-001`,
            `E-REVIEW-${SESSION}-001`,
            `E-DISRUPT-${SESSION}-001`,
        ]);
        expect(handoff?.context.blockers).toEqual(['SchemaViolation: Missing required schema: evidence']);
        expect(handoff?.deadline).toBe('2026-03-01T13:00:00.000Z');
        expect(dataOfKind(outcome.store.listRecords(), 'handoff')).toHaveLength(1);
    });

    it('stops when the escalation chain is exhausted', async () => {
        const handler = new ScriptedStageHandler((task, context) =>
            context.stage === 'IMPLEMENT' ? { status: 'failed', evidenceClaims: [] } : succeed(task, context),
        );
        const base = deps({ handlerFor: () => handler });
        const outcome = await new Orchestrator({
            ...base,
            settings: { ...base.settings, escalationChain: ['primary'] },
        }).run(OBJECTIVE);

        expect(outcome.context.state).toBe('ABORTED');
        expect(outcome.context.recovery?.trigger).toBe('escalation_exhausted');
        expect(outcome.context.recovery?.resume_stage).toBe('IMPLEMENT');
        expect(outcome.context.recovery?.rollback_to).toBe('DISRUPT');
    });

    it('stops on repeated fabrication and resumes from the recovery point', async () => {
        const fabricating = new ScriptedStageHandler((task, context) =>
            context.stage === 'TEST'
                ? { status: 'completed', evidenceClaims: [], records: stageRecords('TEST', context, 'none') }
                : succeed(task, context),
        );
        const stopped = await new Orchestrator(deps({ handlerFor: () => fabricating })).run(OBJECTIVE);

        expect(stopped.context.state).toBe('ABORTED');
        const testDecision = stopped.decisions[stopped.decisions.length - 1];
        expect(testDecision?.stage).toBe('TEST');
        expect(testDecision?.action).toBe('STOP');
        expect(testDecision?.issues.filter((i) => i.kind === 'Fabrication')).toHaveLength(2);
        expect(stopped.context.recovery).toEqual({
            id: `R-${SESSION}`,
            trigger: 'gate_stop:test',
            rollback_to: 'IMPLEMENT',
            resume_stage: 'TEST',
            success: false,
        });

        const honest = new ScriptedStageHandler(succeed);
        const resumed = await new Orchestrator(deps({ handlerFor: () => honest })).resume(RUN_ID);

        expect(resumed.context.state).toBe('COMPLETE');
        expect(resumed.decisions.map((d) => d.stage)).toEqual(['TEST', 'REVIEW_POST', 'VALIDATE', 'LEARN']);
        expect(honest.calls.map((c) => c.taskId)).toEqual(['T-TEST-a', 'T-TEST-b', 'T-REVIEW_POST', 'T-VALIDATE', 'T-LEARN']);
        expect(dataOfKind(resumed.store.listRecords(), 'recovery').map((r) => r.success)).toEqual([false, true]);
        expect(resumed.context.history.some((h) => h.event === 'RESUMED' && h.to === 'TEST')).toBe(true);
    });

    it('returns a completed run unchanged on resume', async () => {
        await new Orchestrator(deps()).run(OBJECTIVE);
        const planner2 = planner();
        const again = await new Orchestrator(deps({ planner: planner2 })).resume(RUN_ID);

        expect(again.context.state).toBe('COMPLETE');
        expect(again.decisions).toEqual([]);
        expect(planner2.calls).toBe(0);
    });

    it('aborts when the plan is rejected', async () => {
        const approver = new FixedApprover(false);
        const outcome = await new Orchestrator(deps({ approver })).run(OBJECTIVE);

        expect(approver.calls).toBe(1);
        expect(outcome.context.state).toBe('ABORTED');
        expect(outcome.context.recovery?.trigger).toBe('plan_rejected');
        expect(outcome.context.recovery?.rollback_to).toBe('STARTUP');
        expect(outcome.context.recovery?.resume_stage).toBe('PLAN');
        expect(outcome.store.listTasks()).toEqual([]);
    });

    it('does not ask for approval when the plan gate fails', async () => {
        const approver = new FixedApprover(true);
        const empty = new StaticPlanner(() => ({ tasks: [], records: [] }));
        const outcome = await new Orchestrator(deps({ approver, planner: empty })).run(OBJECTIVE);

        expect(approver.calls).toBe(0);
        expect(outcome.decisions[0]?.action).toBe('REVISE');
        expect(outcome.decisions[0]?.errors).toEqual([
            'SchemaViolation: Missing required schema: task',
            'SchemaViolation: Missing required schema: evidence',
        ]);
    });

    it('aborts before planning when a service is unreachable', async () => {
        const plan = planner();
        const outcome = await new Orchestrator(deps({ planner: plan, probes: [new FakeProbe('db', false)] })).run(OBJECTIVE);

        expect(outcome.context.state).toBe('ABORTED');
        expect(outcome.context.recovery?.trigger).toBe('startup_failed');
        expect(plan.calls).toBe(0);
        expect(dataOfKind(outcome.store.listRecords(), 'startup')[0]?.services_verified).toBe(false);
    });

    it('stops on a dependency cycle', async () => {
        const cyclic = (runDir: string): Task[] => [
            makeTask('T-X', {}, { current_stage: 'TEST', blocked_by: ['T-Y'], evidence_location: join(runDir, 'evidence', 'x.log') }),
            makeTask('T-Y', {}, { current_stage: 'TEST', blocked_by: ['T-X'], evidence_location: join(runDir, 'evidence', 'y.log') }),
        ];
        const outcome = await new Orchestrator(deps({ planner: planner(cyclic) })).run(OBJECTIVE);

        expect(outcome.context.state).toBe('ABORTED');
        expect(outcome.context.recovery?.trigger).toBe('dependency_cycle');
        expect(outcome.context.recovery?.resume_stage).toBe('TEST');
    });

    it('rejects resuming an unknown run', async () => {
        await expect(new Orchestrator(deps()).resume('nope')).rejects.toThrow(WorkflowError);
        await expect(new Orchestrator(deps()).resume('nope')).rejects.toThrow('No saved run found: nope');
    });
});
