import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FilePlanner, unplannedStages } from '../../src/collaborators/file-planner.js';
import type { PlanContext } from '../../src/collaborators/types.js';
import { envelope } from '../../src/core/records/codec.js';
import { ValidationError } from '../../src/core/errors.js';
import { QualityGateEngine } from '../../src/core/gate/engine.js';
import { EvidenceVerifier } from '../../src/core/gate/evidence-verifier.js';
import { DEFAULT_GATE_POLICY } from '../../src/core/gate/policy.js';
import { PIPELINE_STAGES } from '../../src/core/stages.js';
import { logger } from '../../src/utils/logger.js';
import { MemoryGateLog } from '../helpers/fakes.js';
import { makeEvidence, makeTask } from '../helpers/fixtures.js';

describe('FilePlanner', () => {
    let dir: string;
    let planFile: string;
    let context: PlanContext;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'stagegate-planner-'));
        planFile = join(dir, 'plan.json');
        context = {
            runId: 'run-1',
            session: 'S1',
            objective: 'Ship the feature',
            agent: 'primary',
            retryCount: 0,
            runDir: join(dir, 'run'),
            nextEvidenceId: () => 'E-PLAN-S1-001',
        };
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    function writePlan(content: unknown): void {
        writeFileSync(planFile, JSON.stringify(content), 'utf-8');
    }

    it('splits tasks from other records and writes a summary claim', async () => {
        const task = makeTask('T-1');
        writePlan([envelope('task', task), { kind: 'metrics', data: { partial: true } }]);

        const plan = await new FilePlanner(planFile).plan(context);

        const summaryPath = join(context.runDir, 'plans', 'plan-summary.txt');
        expect(plan.tasks).toEqual([task]);
        expect(plan.records[0]).toEqual({ kind: 'metrics', data: { partial: true } });
        expect(plan.records[1]).toMatchObject({
            kind: 'evidence',
            data: { id: 'E-PLAN-S1-001', type: 'output', claim: 'Tasks: 1', location: summaryPath, verified: true },
        });
        expect(readFileSync(summaryPath, 'utf-8')).toBe('Tasks: 1\n');
    });

    it('writes a summary that passes the PLAN gate when the run id mentions an error', async () => {
        vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
        context = { ...context, runId: 'improve-error-messages-mh2k1', objective: 'Improve error messages' };
        writePlan([envelope('task', makeTask('T-fix-error-text', {}, { objective: 'Improve error messages' }))]);

        const plan = await new FilePlanner(planFile).plan(context);
        const engine = new QualityGateEngine({
            policy: DEFAULT_GATE_POLICY,
            verifier: new EvidenceVerifier(),
            gateLog: new MemoryGateLog(),
            reviewerTimeoutMs: 1_000,
            runId: context.runId,
            objective: context.objective,
        });
        const decision = await engine.gate('PLAN', [...plan.tasks.map((t) => envelope('task', t)), ...plan.records], 0);

        expect(decision.errors).toEqual([]);
        expect(decision.action).toBe('PROCEED');
    });

    it('warns about every later stage the plan leaves without a task', async () => {
        const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
        writePlan([
            envelope('task', makeTask('T-1', {}, { current_stage: 'IMPLEMENT' })),
            envelope('task', makeTask('T-2', {}, { current_stage: 'TEST' })),
        ]);

        await new FilePlanner(planFile).plan(context);

        expect(warn.mock.calls.map((call) => call[0])).toEqual(
            ['REVIEW', 'DISRUPT', 'REVIEW_POST', 'VALIDATE', 'LEARN'].map(
                (stage) => `No task planned for ${stage}; its gate will miss its required records`,
            ),
        );
    });

    it('accepts the { records } form and keeps evidence it already carries', async () => {
        const evidence = envelope('evidence', makeEvidence('E-PLAN-S1-007', '/tmp/plan.md'));
        writePlan({ records: [envelope('task', makeTask('T-1')), evidence] });

        const plan = await new FilePlanner(planFile).plan(context);

        expect(plan.records).toEqual([evidence]);
    });

    it('passes an invalid task envelope on for the gate to report', async () => {
        const broken = { kind: 'task', data: { id: 'T-9' } };
        writePlan([broken]);

        const plan = await new FilePlanner(planFile).plan(context);

        expect(plan.tasks).toEqual([]);
        expect(plan.records[0]).toEqual(broken);
    });

    it('rejects a file of the wrong shape', async () => {
        writePlan({ tasks: [] });
        await expect(new FilePlanner(planFile).plan(context)).rejects.toThrow(ValidationError);
    });
});

describe('unplannedStages', () => {
    it('is empty when every stage after PLAN has a task', () => {
        const tasks = PIPELINE_STAGES.filter((s) => s !== 'PLAN').map((stage, i) => makeTask(`T-${i}`, {}, { current_stage: stage }));
        expect(unplannedStages(tasks)).toEqual([]);
    });

    it('never lists PLAN', () => {
        expect(unplannedStages([])).toEqual(PIPELINE_STAGES.slice(1));
    });
});
