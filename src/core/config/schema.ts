/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 * Every field has a default, so a partial config file is valid.
 *
 * Dependency direction: schema.ts → zod, records/schema
 * Used by: manager.ts, init.ts, types.ts
 */

import { z } from 'zod';
import { stageNameSchema } from '../records/schema.js';

/**
 * Gate thresholds and evidence checks.
 */
export const gateConfigSchema = z.object({
    /** Retries allowed before a failing stage escalates. */
    maxRetry: z.number().int().min(0).max(20).default(3),
    /** More errors than this in one batch stops the run. */
    errorCeiling: z.number().int().min(1).default(10),
    /** Fabricated completion claims in one batch that stop the run. */
    fabricationStopThreshold: z.number().int().min(1).default(2),
    /** Case-insensitive strings whose presence disproves an artifact. */
    failureMarkers: z.array(z.string().min(1)).default(['error', 'exception', 'traceback']),
    /** Artifacts older than this are flagged as stale. */
    evidenceMaxAgeSeconds: z.number().int().min(1).default(3600),
    /** How long the external reviewer may take before counting as a rejection. */
    reviewerTimeoutMs: z.number().int().min(1).default(300_000),
});

/**
 * Stage dispatcher settings.
 */
export const dispatchConfigSchema = z.object({
    /** Minimum number of independent tasks before they run concurrently. */
    parallelThreshold: z.number().int().min(1).default(3),
    /** Concurrent workers for independent tasks. */
    workerPoolWidth: z.number().int().min(1).max(64).default(5),
});

/**
 * Run lifecycle settings.
 */
export const runConfigSchema = z.object({
    /** Where run directories are created, relative to the project root. */
    runsDir: z.string().min(1).default('.stagegate/runs'),
    /** Agents a stage is handed to, in order, when its gate escalates. */
    escalationChain: z.array(z.string().min(1)).min(1).default(['primary', 'secondary', 'supervisor']),
    /** Period of the liveness gate re-check. */
    livenessIntervalMs: z.number().int().min(1000).default(60_000),
    /** Time given to the receiving agent of a handoff. */
    handoffDeadlineMinutes: z.number().int().min(1).default(60),
    /** Whether a human must approve the plan before REVIEW. */
    planApproval: z.boolean().default(true),
});

/**
 * Shell commands that do each stage's work, keyed by stage name.
 * The task is passed to the command as JSON on stdin.
 */
export const stagesConfigSchema = z.object({
    commands: z.record(stageNameSchema, z.string().min(1)).default({}),
    /** Per-task command timeout. */
    timeoutMs: z.number().int().min(1).default(600_000),
});

/**
 * Where the plan comes from.
 */
export const planConfigSchema = z.object({
    /** JSON file holding the plan's record envelopes. */
    file: z.string().min(1).default('.stagegate/plan.json'),
});

/**
 * External reviewer used at DISRUPT and VALIDATE.
 */
export const reviewerConfigSchema = z.object({
    /** `command`: a shell command decides by exit code; `interactive`: a terminal prompt; `none`: every review is rejected. */
    type: z.enum(['command', 'interactive', 'none']).default('interactive'),
    command: z.string().min(1).optional(),
});

/**
 * Test suite run during TEST.
 */
export const testsConfigSchema = z.object({
    command: z.string().min(1).default('npm test'),
    timeoutMs: z.number().int().min(1).default(120_000),
});

/**
 * A dependent service verified at startup.
 */
export const serviceConfigSchema = z.object({
    name: z.string().min(1),
    /** `http`: GET the target URL; `command`: run the target command. */
    type: z.enum(['http', 'command']),
    target: z.string().min(1),
});

/**
 * Persistent key/value memory.
 */
export const memoryConfigSchema = z.object({
    path: z.string().min(1).default('.stagegate/memory.json'),
});

/**
 * The complete application configuration schema.
 * This is the single source of truth for config structure.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    gate: gateConfigSchema.default({}),
    dispatch: dispatchConfigSchema.default({}),
    run: runConfigSchema.default({}),
    stages: stagesConfigSchema.default({}),
    plan: planConfigSchema.default({}),
    reviewer: reviewerConfigSchema.default({}),
    tests: testsConfigSchema.default({}),
    services: z.array(serviceConfigSchema).default([]),
    memory: memoryConfigSchema.default({}),
});
