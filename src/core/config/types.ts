/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually — they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import type { z } from 'zod';
import type {
    appConfigSchema,
    dispatchConfigSchema,
    gateConfigSchema,
    reviewerConfigSchema,
    runConfigSchema,
    serviceConfigSchema,
    stagesConfigSchema,
    testsConfigSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Config as written in the file, before defaults are applied. */
export type AppConfigInput = z.input<typeof appConfigSchema>;

/** Gate thresholds and evidence checks. */
export type GateConfig = z.infer<typeof gateConfigSchema>;

/** Stage dispatcher settings. */
export type DispatchConfig = z.infer<typeof dispatchConfigSchema>;

/** Run lifecycle settings. */
export type RunConfig = z.infer<typeof runConfigSchema>;

/** Stage commands. */
export type StagesConfig = z.infer<typeof stagesConfigSchema>;

/** External reviewer selection. */
export type ReviewerConfig = z.infer<typeof reviewerConfigSchema>;

/** Test suite command. */
export type TestsConfig = z.infer<typeof testsConfigSchema>;

/** A dependent service checked at startup. */
export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
