/**
 * Stage dispatcher — runs a stage's tasks through the stage handler.
 *
 * Independent tasks run on a bounded worker pool once there are enough of
 * them; dependent tasks run afterwards in topological order, each only when
 * every predecessor completed. Every execution is recorded with its start
 * and finish time.
 *
 * Dependency direction: dispatcher.ts → records/store, collaborators/types, utils/parallel, utils/fs
 * Used by: orchestrator
 */

import { join } from 'node:path';
import type { StageExecutionContext, StageHandler } from '../../collaborators/types.js';
import { DependencyCycleError, ValidationError } from '../errors.js';
import type { RecordStore } from '../records/store.js';
import type { Evidence, Task, TaskStatus } from '../records/types.js';
import type { StageName } from '../stages.js';
import { appendLine } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { parallelMap } from '../../utils/parallel.js';

export interface DispatchOptions {
    /** Concurrent workers for independent tasks. */
    workerPoolWidth: number;
    /** Minimum number of independent tasks before the pool is used. */
    parallelThreshold: number;
    now?: () => Date;
}

/** Outcome of one task in a dispatch. */
export interface TaskResult {
    taskId: string;
    status: TaskStatus;
    evidenceClaims: Evidence[];
    records: unknown[];
    error?: string;
}

/** One line of the execution log. */
export interface TaskExecution {
    taskId: string;
    startedAt: string;
    finishedAt: string;
    status: TaskStatus;
}

export interface DispatchResult {
    results: TaskResult[];
    executionLog: TaskExecution[];
}

/** File name of a stage's execution log under `<runDir>/parallel`. */
export function executionLogFileName(stage: StageName): string {
    return `dispatch_${stage.toLowerCase()}.jsonl`;
}

/**
 * Order tasks so every task comes after its in-batch dependencies.
 * Dependencies outside the batch are ignored here.
 *
 * @throws {DependencyCycleError} naming the ids on the cycle
 */
export function topologicalOrder(tasks: readonly Task[]): Task[] {
    const byId = new Map(tasks.map((t) => [t.id, t]));
    const sorted: Task[] = [];
    const visited = new Set<string>();
    const visiting: string[] = [];

    const visit = (task: Task): void => {
        if (visited.has(task.id)) return;
        const onPath = visiting.indexOf(task.id);
        if (onPath !== -1) {
            throw new DependencyCycleError([...visiting.slice(onPath), task.id]);
        }

        visiting.push(task.id);
        for (const dep of task.metadata.blocked_by) {
            const predecessor = byId.get(dep);
            if (predecessor) visit(predecessor);
        }
        visiting.pop();
        visited.add(task.id);
        sorted.push(task);
    };

    for (const task of tasks) visit(task);
    return sorted;
}

export class StageDispatcher {
    private readonly now: () => Date;

    constructor(
        private readonly store: RecordStore,
        private readonly handler: StageHandler,
        private readonly options: DispatchOptions,
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Execute every task of a stage.
     *
     * @throws {ValidationError} when a dependency names no known task
     * @throws {DependencyCycleError} when the batch's dependencies form a cycle
     */
    async dispatch(stage: StageName, tasks: readonly Task[], context: StageExecutionContext): Promise<DispatchResult> {
        this.assertDependenciesKnown(tasks);
        const ordered = topologicalOrder(tasks);

        const batchIds = new Set(tasks.map((t) => t.id));
        const independent = ordered.filter((t) => !t.metadata.blocked_by.some((d) => batchIds.has(d)));
        const dependent = ordered.filter((t) => t.metadata.blocked_by.some((d) => batchIds.has(d)));

        const executionLog: TaskExecution[] = [];
        const results = new Map<string, TaskResult>();

        const ready: Task[] = [];
        for (const task of independent) {
            const unmet = this.unmetDependencies(task, batchIds, results);
            if (unmet.length > 0) results.set(task.id, this.blockTask(task, unmet));
            else ready.push(task);
        }

        const usePool = ready.length >= this.options.parallelThreshold;
        logger.debug(
            `Dispatching ${tasks.length} task(s) for ${stage}: ${ready.length} independent` +
            (usePool ? ` (pool width ${this.options.workerPoolWidth})` : ' (sequential)'),
        );

        if (usePool) {
            const pooled = await parallelMap(ready, (task) => this.runTask(task, context, executionLog), {
                concurrency: this.options.workerPoolWidth,
                continueOnError: true,
            });
            for (const outcome of pooled) {
                // runTask reports handler failures as results; a rejection here is a store fault
                if (!outcome.success) throw outcome.error;
                results.set(outcome.value.taskId, outcome.value);
            }
        } else {
            for (const task of ready) {
                results.set(task.id, await this.runTask(task, context, executionLog));
            }
        }

        for (const task of dependent) {
            const unmet = this.unmetDependencies(task, batchIds, results);
            if (unmet.length > 0) {
                results.set(task.id, this.blockTask(task, unmet));
                continue;
            }
            results.set(task.id, await this.runTask(task, context, executionLog));
        }

        await this.writeExecutionLog(stage, context.runDir, executionLog);

        return {
            results: tasks.flatMap((t) => {
                const result = results.get(t.id);
                return result ? [result] : [];
            }),
            executionLog,
        };
    }

    private async runTask(task: Task, context: StageExecutionContext, log: TaskExecution[]): Promise<TaskResult> {
        const running = this.store.updateTaskStatus(task.id, 'in_progress');
        const startedAt = this.now().toISOString();

        let result: TaskResult;
        try {
            const outcome = await this.handler.execute(running, context);
            result = {
                taskId: task.id,
                status: outcome.status,
                evidenceClaims: outcome.evidenceClaims,
                records: outcome.records ?? [],
            };
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.warn(`Task ${task.id} failed: ${message}`);
            result = { taskId: task.id, status: 'failed', evidenceClaims: [], records: [], error: message };
        }

        this.store.updateTaskStatus(task.id, result.status);
        log.push({ taskId: task.id, startedAt, finishedAt: this.now().toISOString(), status: result.status });
        return result;
    }

    /** Predecessors that have not completed: in-batch ones by their result, earlier ones by the store. */
    private unmetDependencies(task: Task, batchIds: ReadonlySet<string>, results: ReadonlyMap<string, TaskResult>): string[] {
        return task.metadata.blocked_by.filter((dep) => {
            const status = batchIds.has(dep) ? results.get(dep)?.status : this.store.getTask(dep)?.status;
            return status !== 'completed';
        });
    }

    private blockTask(task: Task, unmet: string[]): TaskResult {
        this.store.updateTaskStatus(task.id, 'blocked');
        const error = `blocked by ${unmet.join(', ')}`;
        logger.debug(`Task ${task.id} ${error}`);
        return { taskId: task.id, status: 'blocked', evidenceClaims: [], records: [], error };
    }

    private assertDependenciesKnown(tasks: readonly Task[]): void {
        const batchIds = new Set(tasks.map((t) => t.id));
        for (const task of tasks) {
            for (const dep of task.metadata.blocked_by) {
                if (!batchIds.has(dep) && !this.store.getTask(dep)) {
                    throw new ValidationError(`Task ${task.id} depends on ${dep}, which does not exist`, {
                        taskId: task.id,
                        dependency: dep,
                    });
                }
            }
        }
    }

    private async writeExecutionLog(stage: StageName, runDir: string, log: readonly TaskExecution[]): Promise<void> {
        const filePath = join(runDir, 'parallel', executionLogFileName(stage));
        for (const entry of log) {
            await appendLine(filePath, JSON.stringify({ stage, ...entry }));
        }
    }
}
