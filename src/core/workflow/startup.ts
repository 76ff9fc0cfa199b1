/**
 * Startup precondition check.
 *
 * Runs before PLAN: every configured service must answer its probe, the
 * scheduler must accept a timer, the key/value store must return what was
 * just written, and the run directory layout must exist.
 *
 * Dependency direction: startup.ts → collaborators/types, records/types, utils/fs
 * Used by: orchestrator, `stagegate doctor`
 */

import { join } from 'node:path';
import type { KeyValueStore, ServiceProbe, Timer } from '../../collaborators/types.js';
import type { StartupRecord } from '../records/types.js';
import { ensureDir } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/** Directories created under every run directory. */
export const RUN_SUBDIRS = ['todo', 'evidence', 'logs', 'docs', 'test', 'plans', 'parallel'] as const;

const MEMORY_PROBE_KEY = 'stagegate:startup_test';

export interface StartupDependencies {
    probes: readonly ServiceProbe[];
    memory: KeyValueStore;
    timer: Timer;
    runDir: string;
    now?: () => Date;
}

export interface StartupResult {
    /** True when every check passed. */
    ok: boolean;
    record: StartupRecord;
    errors: string[];
}

export async function runStartupChecks(deps: StartupDependencies): Promise<StartupResult> {
    const now = deps.now ?? (() => new Date());
    const errors: string[] = [];

    const servicesVerified = await verifyServices(deps.probes, errors);
    const schedulerActive = verifyScheduler(deps.timer, errors);
    const memoryOk = await verifyMemory(deps.memory, now().toISOString(), errors);
    const envReady = createRunDirs(deps.runDir, errors);

    const record: StartupRecord = {
        services_verified: servicesVerified,
        scheduler_active: schedulerActive,
        memory_ok: memoryOk,
        env_ready: envReady,
        workflow_dir: deps.runDir,
        timestamp: now().toISOString(),
    };

    return { ok: errors.length === 0, record, errors };
}

async function verifyServices(probes: readonly ServiceProbe[], errors: string[]): Promise<boolean> {
    const results = await Promise.all(
        probes.map(async (probe) => {
            try {
                return { name: probe.name, ok: await probe.ping(), detail: 'no response' };
            } catch (err) {
                return { name: probe.name, ok: false, detail: err instanceof Error ? err.message : String(err) };
            }
        }),
    );

    for (const result of results) {
        if (result.ok) {
            logger.debug(`Service ${result.name} reachable`);
        } else {
            errors.push(`Service ${result.name}: ${result.detail}`);
        }
    }
    return results.every((r) => r.ok);
}

function verifyScheduler(timer: Timer, errors: string[]): boolean {
    try {
        timer.every(60_000, () => undefined).cancel();
        return true;
    } catch (err) {
        errors.push(`Scheduler: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}

async function verifyMemory(memory: KeyValueStore, value: string, errors: string[]): Promise<boolean> {
    try {
        await memory.put(MEMORY_PROBE_KEY, value);
        const readBack = await memory.get(MEMORY_PROBE_KEY);
        if (readBack !== value) {
            errors.push('Memory: read-back does not match the written value');
            return false;
        }
        return true;
    } catch (err) {
        errors.push(`Memory: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}

function createRunDirs(runDir: string, errors: string[]): boolean {
    try {
        for (const sub of RUN_SUBDIRS) {
            ensureDir(join(runDir, sub));
        }
        return true;
    } catch (err) {
        errors.push(`Run directory: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}
