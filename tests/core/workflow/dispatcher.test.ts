/**
 * Tests for the stage dispatcher.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { StageDispatcher, executionLogFileName, topologicalOrder, type DispatchOptions } from '../../../src/core/workflow/dispatcher.js';
import { RecordStore } from '../../../src/core/records/store.js';
import { DependencyCycleError, ValidationError } from '../../../src/core/errors.js';
import type { StageExecutionContext, StageHandlerResult } from '../../../src/collaborators/types.js';
import type { Task } from '../../../src/core/records/types.js';
import { ScriptedStageHandler, type HandlerScript } from '../../helpers/fakes.js';
import { FIXED_NOW, makeTask } from '../../helpers/fixtures.js';

let runDir: string;

beforeEach(() => {
    runDir = mkdtempSync(join(tmpdir(), 'stagegate-dispatch-'));
});

afterEach(() => {
    rmSync(runDir, { recursive: true, force: true });
});

const OPTIONS: DispatchOptions = { workerPoolWidth: 5, parallelThreshold: 3, now: () => FIXED_NOW };

function context(): StageExecutionContext {
    let seq = 0;
    return {
        runId: 'run-1',
        session: 's1',
        stage: 'IMPLEMENT',
        agent: 'primary',
        retryCount: 0,
        runDir,
        nextEvidenceId: () => `E-IMPLEMENT-s1-00${++seq}`,
    };
}

function storeWith(tasks: Task[]): RecordStore {
    const store = new RecordStore();
    for (const task of tasks) store.addTask(task);
    return store;
}

const complete: StageHandlerResult = { status: 'completed', evidenceClaims: [] };

/** Handler that tracks how many executions overlap. */
function concurrencyTracker(): { script: HandlerScript; peak: () => number } {
    let active = 0;
    let peak = 0;
    return {
        script: async () => {
            active++;
            peak = Math.max(peak, active);
            await new Promise((resolve) => setTimeout(resolve, 15));
            active--;
            return complete;
        },
        peak: () => peak,
    };
}

describe('topologicalOrder', () => {
    it('puts predecessors first', () => {
        const tasks = [
            makeTask('C', {}, { blocked_by: ['B'] }),
            makeTask('B', {}, { blocked_by: ['A'] }),
            makeTask('A'),
        ];
        expect(topologicalOrder(tasks).map((t) => t.id)).toEqual(['A', 'B', 'C']);
    });

    it('names the ids on a cycle', () => {
        const tasks = [makeTask('T1', {}, { blocked_by: ['T2'] }), makeTask('T2', {}, { blocked_by: ['T1'] })];
        expect(() => topologicalOrder(tasks)).toThrow('Dependency cycle detected: T1 → T2 → T1');
    });
});

describe('StageDispatcher', () => {
    it('runs three or more independent tasks concurrently', async () => {
        const tasks = [makeTask('T1'), makeTask('T2'), makeTask('T3')];
        const tracker = concurrencyTracker();
        const store = storeWith(tasks);

        const result = await new StageDispatcher(store, new ScriptedStageHandler(tracker.script), OPTIONS).dispatch(
            'IMPLEMENT',
            store.listTasks(),
            context(),
        );

        expect(tracker.peak()).toBe(3);
        expect(result.results.map((r) => r.status)).toEqual(['completed', 'completed', 'completed']);
        expect(store.listTasks().map((t) => t.status)).toEqual(['completed', 'completed', 'completed']);
    });

    it('records overlapping execution windows for pooled tasks', async () => {
        const tasks = [makeTask('T1'), makeTask('T2'), makeTask('T3')];
        const store = storeWith(tasks);
        let tick = 0;
        const clock = (): Date => new Date(FIXED_NOW.getTime() + 1000 * tick++);

        // No handler finishes until all three have started
        let started = 0;
        let releaseAll: () => void = () => undefined;
        const allStarted = new Promise<void>((resolve) => {
            releaseAll = resolve;
        });
        const handler = new ScriptedStageHandler(async () => {
            if (++started === tasks.length) releaseAll();
            await allStarted;
            return complete;
        });

        const result = await new StageDispatcher(store, handler, { ...OPTIONS, now: clock }).dispatch(
            'IMPLEMENT',
            store.listTasks(),
            context(),
        );

        const log = result.executionLog;
        expect(log.map((e) => e.taskId).sort()).toEqual(['T1', 'T2', 'T3']);
        expect(new Set(log.map((e) => e.startedAt)).size).toBe(3);
        const latestStart = Math.max(...log.map((e) => Date.parse(e.startedAt)));
        const earliestFinish = Math.min(...log.map((e) => Date.parse(e.finishedAt)));
        expect(latestStart).toBeLessThan(earliestFinish);
        for (const entry of log) {
            expect(Date.parse(entry.startedAt)).toBeLessThan(Date.parse(entry.finishedAt));
        }
    });

    it('runs fewer independent tasks than the threshold one at a time', async () => {
        const tasks = [makeTask('T1'), makeTask('T2')];
        const tracker = concurrencyTracker();
        const store = storeWith(tasks);

        await new StageDispatcher(store, new ScriptedStageHandler(tracker.script), OPTIONS).dispatch('IMPLEMENT', store.listTasks(), context());

        expect(tracker.peak()).toBe(1);
    });

    it('never exceeds the worker pool width', async () => {
        const tasks = ['T1', 'T2', 'T3', 'T4', 'T5', 'T6'].map((id) => makeTask(id));
        const tracker = concurrencyTracker();
        const store = storeWith(tasks);

        await new StageDispatcher(store, new ScriptedStageHandler(tracker.script), { ...OPTIONS, workerPoolWidth: 2 }).dispatch(
            'IMPLEMENT',
            store.listTasks(),
            context(),
        );

        expect(tracker.peak()).toBe(2);
    });

    it('runs a dependent task after its predecessor completes', async () => {
        const tasks = [makeTask('B', {}, { blocked_by: ['A'] }), makeTask('A')];
        const store = storeWith(tasks);
        const handler = new ScriptedStageHandler(() => complete);

        const result = await new StageDispatcher(store, handler, OPTIONS).dispatch('IMPLEMENT', store.listTasks(), context());

        expect(handler.calls.map((c) => c.taskId)).toEqual(['A', 'B']);
        expect(result.results.map((r) => r.taskId)).toEqual(['B', 'A']);
    });

    it('blocks dependents of a failed task without running them', async () => {
        const tasks = [makeTask('A'), makeTask('B', {}, { blocked_by: ['A'] }), makeTask('C', {}, { blocked_by: ['B'] })];
        const store = storeWith(tasks);
        const handler = new ScriptedStageHandler((task) => ({ status: task.id === 'A' ? 'failed' : 'completed', evidenceClaims: [] }));

        const result = await new StageDispatcher(store, handler, OPTIONS).dispatch('IMPLEMENT', store.listTasks(), context());

        expect(handler.calls.map((c) => c.taskId)).toEqual(['A']);
        expect(result.results.map((r) => [r.taskId, r.status, r.error])).toEqual([
            ['A', 'failed', undefined],
            ['B', 'blocked', 'blocked by A'],
            ['C', 'blocked', 'blocked by B'],
        ]);
        expect(store.getTask('C')?.status).toBe('blocked');
    });

    it('judges predecessors from earlier stages by their stored status', async () => {
        const earlier = makeTask('P', { status: 'failed' }, { current_stage: 'PLAN' });
        const task = makeTask('T1', {}, { blocked_by: ['P'] });
        const store = storeWith([earlier, task]);
        const handler = new ScriptedStageHandler(() => complete);

        const result = await new StageDispatcher(store, handler, OPTIONS).dispatch('IMPLEMENT', [task], context());

        expect(handler.calls).toEqual([]);
        expect(result.results[0]?.status).toBe('blocked');
    });

    it('reports a handler exception as a failed task', async () => {
        const store = storeWith([makeTask('T1')]);
        const handler = new ScriptedStageHandler(() => {
            throw new Error('worker crashed');
        });

        const result = await new StageDispatcher(store, handler, OPTIONS).dispatch('IMPLEMENT', store.listTasks(), context());

        expect(result.results).toEqual([{ taskId: 'T1', status: 'failed', evidenceClaims: [], records: [], error: 'worker crashed' }]);
        expect(store.getTask('T1')?.status).toBe('failed');
    });

    it('rejects a dependency cycle before running anything', async () => {
        const tasks = [makeTask('T1', {}, { blocked_by: ['T2'] }), makeTask('T2', {}, { blocked_by: ['T1'] })];
        const store = storeWith(tasks);
        const handler = new ScriptedStageHandler(() => complete);

        await expect(new StageDispatcher(store, handler, OPTIONS).dispatch('IMPLEMENT', store.listTasks(), context())).rejects.toThrow(
            DependencyCycleError,
        );
        expect(handler.calls).toEqual([]);
    });

    it('rejects a dependency on a task that does not exist', async () => {
        const store = storeWith([makeTask('T1', {}, { blocked_by: ['T9'] })]);
        const handler = new ScriptedStageHandler(() => complete);

        const dispatching = new StageDispatcher(store, handler, OPTIONS).dispatch('IMPLEMENT', store.listTasks(), context());
        await expect(dispatching).rejects.toThrow(ValidationError);
        await expect(dispatching).rejects.toThrow('Task T1 depends on T9, which does not exist');
    });

    it('writes the execution log under parallel/', async () => {
        const store = storeWith([makeTask('T1')]);
        const result = await new StageDispatcher(store, new ScriptedStageHandler(() => complete), OPTIONS).dispatch(
            'IMPLEMENT',
            store.listTasks(),
            context(),
        );

        expect(result.executionLog).toEqual([
            { taskId: 'T1', startedAt: FIXED_NOW.toISOString(), finishedAt: FIXED_NOW.toISOString(), status: 'completed' },
        ]);
        const line = readFileSync(join(runDir, 'parallel', executionLogFileName('IMPLEMENT')), 'utf-8').trim();
        expect(JSON.parse(line)).toEqual({ stage: 'IMPLEMENT', ...result.executionLog[0] });
    });
});
