/**
 * Record types inferred from the zod schemas.
 *
 * NEVER define record types manually — they are derived from the schemas
 * so runtime validation and compile-time types always agree.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that handles records
 */

import type { z } from 'zod';
import type {
    conflictSchema,
    evidenceSchema,
    handoffSchema,
    metricsSchema,
    recoverySchema,
    reviewGateSchema,
    skillSchema,
    startupSchema,
    taskMetadataSchema,
    taskSchema,
    taskStatusSchema,
    evidenceTypeSchema,
    workflowRecordSchema,
} from './schema.js';

export type Task = z.infer<typeof taskSchema>;
export type TaskMetadata = z.infer<typeof taskMetadataSchema>;
export type TaskStatus = z.infer<typeof taskStatusSchema>;
export type Evidence = z.infer<typeof evidenceSchema>;
export type EvidenceType = z.infer<typeof evidenceTypeSchema>;
export type ReviewGate = z.infer<typeof reviewGateSchema>;
export type Conflict = z.infer<typeof conflictSchema>;
export type Handoff = z.infer<typeof handoffSchema>;
export type RecoveryRecord = z.infer<typeof recoverySchema>;
export type Metrics = z.infer<typeof metricsSchema>;
export type Skill = z.infer<typeof skillSchema>;
export type StartupRecord = z.infer<typeof startupSchema>;

/** A record in its `{ kind, data }` envelope. */
export type WorkflowRecord = z.infer<typeof workflowRecordSchema>;

/** The envelope for one specific kind. */
export type RecordOfKind<K extends WorkflowRecord['kind']> = Extract<WorkflowRecord, { kind: K }>;
