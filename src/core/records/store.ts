/**
 * Record store — Task and Evidence records keyed by id, plus the run's
 * append-only control records (handoffs, recovery, review gates, …).
 *
 * Nothing is deleted during a run. Every update replaces the stored record
 * in one synchronous step, so concurrently dispatched tasks never observe a
 * half-written record; the dispatcher guarantees one worker per task id.
 *
 * Dependency direction: store.ts → validator, codec, errors
 * Used by: dispatcher, orchestrator, session persistence
 */

import { ValidationError, WorkflowError } from '../errors.js';
import type { StageName } from '../stages.js';
import { formatEvidenceId } from './codec.js';
import type { Evidence, Task, TaskStatus, WorkflowRecord } from './types.js';
import { validateRecord } from './validator.js';

/** Legal status moves within one dispatch attempt. */
const STATUS_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
    // pending → blocked: a predecessor did not complete, so the task never ran
    pending: ['in_progress', 'blocked'],
    in_progress: ['completed', 'failed', 'blocked'],
    completed: [],
    failed: [],
    blocked: [],
};

/** Serializable copy of the store contents. */
export interface StoreSnapshot {
    tasks: Task[];
    evidence: Evidence[];
    records: WorkflowRecord[];
}

type ControlRecord = Exclude<WorkflowRecord, { kind: 'task' } | { kind: 'evidence' }>;

export class RecordStore {
    private readonly tasks = new Map<string, Task>();
    private readonly evidence = new Map<string, Evidence>();
    private readonly records: ControlRecord[] = [];
    private readonly evidenceSeq = new Map<string, number>();

    /** Rebuild a store from a snapshot. */
    static fromSnapshot(snapshot: StoreSnapshot): RecordStore {
        const store = new RecordStore();
        for (const task of snapshot.tasks) store.addTask(task);
        for (const item of snapshot.evidence) store.addEvidence(item);
        for (const record of snapshot.records) store.append(record);
        return store;
    }

    // ── Tasks ──

    /**
     * Add a new task.
     * @throws {ValidationError} if the task is invalid or its id is taken.
     */
    addTask(task: Task): void {
        assertValid(task, 'task');
        if (this.tasks.has(task.id)) {
            throw new ValidationError(`Task already exists: ${task.id}`, { taskId: task.id });
        }
        this.tasks.set(task.id, task);
    }

    getTask(id: string): Task | undefined {
        return this.tasks.get(id);
    }

    /** All tasks in insertion order, optionally only those owned by one stage. */
    listTasks(stage?: StageName): Task[] {
        const all = Array.from(this.tasks.values());
        return stage ? all.filter((t) => t.metadata.current_stage === stage) : all;
    }

    /**
     * Move a task to a new status.
     * @throws {WorkflowError} for an unknown task or an illegal status move.
     */
    updateTaskStatus(id: string, status: TaskStatus): Task {
        const task = this.requireTask(id);
        if (!STATUS_TRANSITIONS[task.status].includes(status)) {
            throw new WorkflowError(`Illegal task status transition: ${task.status} → ${status}`, {
                taskId: id,
                from: task.status,
                to: status,
            });
        }
        const updated: Task = { ...task, status };
        this.tasks.set(id, updated);
        return updated;
    }

    /**
     * Return a task to `pending` so a stage can be re-entered after REVISE or ESCALATE.
     */
    reopenTask(id: string): Task {
        const task = this.requireTask(id);
        if (task.status === 'pending') return task;
        const reopened: Task = { ...task, status: 'pending' };
        this.tasks.set(id, reopened);
        return reopened;
    }

    /** `blocked_by` references that do not resolve to a stored task. */
    unresolvedDependencies(): string[] {
        const problems: string[] = [];
        for (const task of this.tasks.values()) {
            for (const dep of task.metadata.blocked_by) {
                if (!this.tasks.has(dep)) {
                    problems.push(`${task.id} → ${dep}`);
                }
            }
        }
        return problems;
    }

    // ── Evidence ──

    /**
     * Store a verified evidence record. Evidence is immutable once stored.
     * @throws {ValidationError} if the record is invalid or its id is taken.
     */
    addEvidence(item: Evidence): void {
        assertValid(item, 'evidence');
        if (this.evidence.has(item.id)) {
            throw new ValidationError(`Evidence already recorded: ${item.id}`, { evidenceId: item.id });
        }
        this.evidence.set(item.id, item);
    }

    getEvidence(id: string): Evidence | undefined {
        return this.evidence.get(id);
    }

    listEvidence(): Evidence[] {
        return Array.from(this.evidence.values());
    }

    /** Allocate the next `E-{STAGE}-{SESSION}-{SEQ}` id for a stage. */
    nextEvidenceId(stage: StageName, session: string): string {
        const key = `${stage}:${session}`;
        let seq = this.evidenceSeq.get(key) ?? 0;
        let id: string;
        do {
            seq += 1;
            id = formatEvidenceId(stage, session, seq);
        } while (this.evidence.has(id));
        this.evidenceSeq.set(key, seq);
        return id;
    }

    // ── Control records ──

    /** Append a record; tasks and evidence are routed to their keyed maps. */
    append(record: WorkflowRecord): void {
        switch (record.kind) {
            case 'task':
                this.addTask(record.data);
                return;
            case 'evidence':
                this.addEvidence(record.data);
                return;
            default:
                assertValid(record.data, record.kind);
                this.records.push(record);
        }
    }

    /** Control records in append order. */
    listRecords(): readonly ControlRecord[] {
        return this.records;
    }

    snapshot(): StoreSnapshot {
        return {
            tasks: this.listTasks(),
            evidence: this.listEvidence(),
            records: [...this.records],
        };
    }

    private requireTask(id: string): Task {
        const task = this.tasks.get(id);
        if (!task) {
            throw new WorkflowError(`Unknown task: ${id}`, { taskId: id });
        }
        return task;
    }
}

function assertValid(data: unknown, schemaName: WorkflowRecord['kind']): void {
    const result = validateRecord(data, schemaName);
    if (!result.ok) {
        throw new ValidationError(`Invalid ${schemaName}: ${result.errors.join('; ')}`, {
            errors: result.errors,
        });
    }
}
