/**
 * Run persistence — save, resume and archive run state.
 *
 * Each run lives in `<runsDir>/<runId>/`. The run context and the record
 * store are saved to `state.json` after every step so a run can survive
 * crashes and restarts and be resumed later.
 *
 * Dependency direction: session.ts → state-machine, records, utils/fs
 * Used by: orchestrator, `stagegate run --resume`
 */

import { join } from 'node:path';
import { existsSync, readdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { WorkflowError } from '../errors.js';
import { envelope, serializeRecord } from '../records/codec.js';
import {
    evidenceSchema,
    handoffSchema,
    recoverySchema,
    stageNameSchema,
    startupSchema,
    taskSchema,
    workflowRecordSchema,
} from '../records/schema.js';
import { RecordStore } from '../records/store.js';
import { RunState } from '../stages.js';
import { ensureDir, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { RunContext } from './state-machine.js';

const STATE_FILE = 'state.json';
const ARCHIVE_FILE = 'records.jsonl';

const runStateNameSchema = z.union([
    stageNameSchema,
    z.enum([RunState.Startup, RunState.Complete, RunState.Aborted]),
]);
const runEventTypeSchema = z.enum(['STARTED', 'PROCEED', 'REVISE', 'ESCALATE', 'STOP', 'APPROVED', 'REJECTED', 'RESUMED']);

const runContextSchema = z.object({
    runId: z.string().min(1),
    objective: z.string(),
    state: runStateNameSchema,
    retries: z.record(stageNameSchema, z.number().int().min(0)),
    escalationChain: z.array(z.string()).min(1),
    agentIndex: z.number().int().min(0),
    completedStages: z.array(stageNameSchema),
    history: z.array(z.object({
        from: runStateNameSchema,
        to: runStateNameSchema,
        event: runEventTypeSchema,
        timestamp: z.string(),
    })),
    handoffs: z.array(handoffSchema),
    lastErrors: z.array(z.string()),
    startup: startupSchema.optional(),
    recovery: recoverySchema.optional(),
});

const sessionDataSchema = z.object({
    runId: z.string().min(1),
    session: z.string().min(1),
    createdAt: z.number(),
    updatedAt: z.number(),
    context: runContextSchema,
    store: z.object({
        tasks: z.array(taskSchema),
        evidence: z.array(evidenceSchema),
        records: z.array(workflowRecordSchema),
    }),
});

/** Persisted run data. */
export type SessionData = z.infer<typeof sessionDataSchema>;

/** A run restored from disk. */
export interface LoadedRun {
    runId: string;
    session: string;
    createdAt: number;
    context: RunContext;
    store: RecordStore;
}

export function getRunDir(runsDir: string, runId: string): string {
    return join(runsDir, runId);
}

/**
 * Generate a run id from the objective: a slug plus a base-36 timestamp.
 */
export function generateRunId(objective: string, now: number = Date.now()): string {
    const slug = objective
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 30);
    return `${slug || 'run'}-${now.toString(36)}`;
}

/**
 * Save a run's context and records to `<runDir>/state.json`.
 */
export function saveRun(
    runDir: string,
    session: string,
    context: RunContext,
    store: RecordStore,
    createdAt: number,
): void {
    ensureDir(runDir);
    const data: SessionData = {
        runId: context.runId,
        session,
        createdAt,
        updatedAt: Date.now(),
        context: {
            ...context,
            retries: { ...context.retries },
            escalationChain: [...context.escalationChain],
            completedStages: [...context.completedStages],
            history: [...context.history],
            handoffs: [...context.handoffs],
            lastErrors: [...context.lastErrors],
        },
        store: store.snapshot(),
    };

    writeJsonFile(join(runDir, STATE_FILE), data);
    logger.debug(`Run saved: ${context.runId} (${context.state})`);
}

/**
 * Load a saved run.
 *
 * @returns null when no state file exists
 * @throws {WorkflowError} when the state file is not a valid saved run
 */
export function loadRun(runDir: string): LoadedRun | null {
    const statePath = join(runDir, STATE_FILE);
    if (!existsSync(statePath)) {
        return null;
    }

    const parsed = sessionDataSchema.safeParse(readJsonFile(statePath));
    if (!parsed.success) {
        throw new WorkflowError(`Saved run is corrupt: ${statePath}`, {
            statePath,
            issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
    }

    const data = parsed.data;
    return {
        runId: data.runId,
        session: data.session,
        createdAt: data.createdAt,
        context: Object.freeze(data.context),
        store: RecordStore.fromSnapshot(data.store),
    };
}

/**
 * List saved runs, most recently updated first. Unreadable runs are skipped with a warning.
 */
export function listRuns(runsDir: string): SessionData[] {
    if (!existsSync(runsDir)) {
        return [];
    }

    const runs: SessionData[] = [];
    for (const entry of readdirSync(runsDir, { withFileTypes: true })) {
        if (!entry.isDirectory()) continue;
        const statePath = join(runsDir, entry.name, STATE_FILE);
        if (!existsSync(statePath)) continue;

        const parsed = sessionDataSchema.safeParse(readJsonFile(statePath));
        if (parsed.success) {
            runs.push(parsed.data);
        } else {
            logger.warn(`Skipping unreadable run: ${entry.name}`);
        }
    }

    return runs.sort((a, b) => b.updatedAt - a.updatedAt);
}

/**
 * Archive a run's records: every record as a JSON line in `records.jsonl`,
 * plus the final task list in `todo/tasks.json`. Both files are rewritten
 * on every call, so a resumed run archives its whole history once.
 */
export async function archiveRun(runDir: string, store: RecordStore): Promise<string> {
    const archivePath = join(runDir, ARCHIVE_FILE);
    const snapshot = store.snapshot();
    const lines = [
        ...snapshot.tasks.map((task) => serializeRecord(envelope('task', task))),
        ...snapshot.evidence.map((item) => serializeRecord(envelope('evidence', item))),
        ...snapshot.records.map((record) => serializeRecord(record)),
    ];

    ensureDir(runDir);
    await writeFile(archivePath, lines.map((line) => `${line}\n`).join(''), 'utf-8');

    writeJsonFile(join(runDir, 'todo', 'tasks.json'), snapshot.tasks);
    logger.debug(`Run archived to ${archivePath}`);
    return archivePath;
}
