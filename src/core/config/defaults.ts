/**
 * Default configuration values.
 *
 * `stagegate init` writes these; a config file only needs the fields it changes.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init.ts
 */

import type { AppConfig } from './types.js';

/**
 * Full default configuration.
 *
 * No stage commands are configured: each stage's handler emits nothing
 * until the project maps the stage to a command.
 */
export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    gate: {
        maxRetry: 3,
        errorCeiling: 10,
        fabricationStopThreshold: 2,
        failureMarkers: ['error', 'exception', 'traceback'],
        evidenceMaxAgeSeconds: 3600,
        reviewerTimeoutMs: 300_000,
    },

    dispatch: {
        parallelThreshold: 3,
        workerPoolWidth: 5,
    },

    run: {
        runsDir: '.stagegate/runs',
        escalationChain: ['primary', 'secondary', 'supervisor'],
        livenessIntervalMs: 60_000,
        handoffDeadlineMinutes: 60,
        planApproval: true,
    },

    stages: {
        commands: {},
        timeoutMs: 600_000,
    },

    plan: {
        file: '.stagegate/plan.json',
    },

    reviewer: {
        type: 'interactive',
    },

    tests: {
        command: 'npm test',
        timeoutMs: 120_000,
    },

    services: [],

    memory: {
        path: '.stagegate/memory.json',
    },
};

/** The directory name where config is stored inside a project. */
export const CONFIG_DIR_NAME = '.stagegate';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';
