/**
 * Zod schemas for every record the engine reads or writes.
 *
 * Field names and enum values are part of the on-disk log format and must
 * not change. All record types are inferred from these schemas (see types.ts).
 *
 * Dependency direction: schema.ts → zod, stages.ts, utils/validation.ts
 * Used by: validator, codec, store, gate engine
 */

import { z } from 'zod';
import { PIPELINE_STAGES } from '../stages.js';
import { nonEmptyString, stringList } from '../../utils/validation.js';

/** `E-{STAGE}-{SESSION}-{SEQ:03}` */
export const EVIDENCE_ID_PATTERN = /^E-[A-Z_]+-[\w.]+-\d{3}$/;

/** `C-<compact UTC timestamp>` */
export const CONFLICT_ID_PATTERN = /^C-\d{8}T\d{6}$/;

/** `R-<compact UTC timestamp>` */
export const RECOVERY_ID_PATTERN = /^R-\d{8}T\d{6}$/;

export const taskStatusSchema = z.enum(['pending', 'in_progress', 'completed', 'blocked', 'failed']);
export const taskPrioritySchema = z.enum(['high', 'medium', 'low']);
export const evidenceTypeSchema = z.enum(['log', 'output', 'test_result', 'diff', 'screenshot', 'api_response']);
export const verifiedBySchema = z.enum(['agent', 'external-reviewer', 'human']);
export const stageNameSchema = z.enum(PIPELINE_STAGES);
export const reviewActionSchema = z.enum(['proceed', 'revise', 'escalate']);
export const conflictTypeSchema = z.enum([
    'plan_disagreement',
    'evidence_dispute',
    'priority_conflict',
    'resource_conflict',
]);

/** The 13 metadata fields of a Task. */
export const taskMetadataSchema = z
    .object({
        objective: nonEmptyString,
        success_criteria: nonEmptyString,
        fail_criteria: nonEmptyString,
        evidence_required: evidenceTypeSchema,
        evidence_location: nonEmptyString,
        responsible_agent: nonEmptyString,
        workflow_path: nonEmptyString,
        blocked_by: stringList,
        parallel: z.boolean(),
        current_stage: stageNameSchema,
        instruction_set: nonEmptyString,
        time_budget: nonEmptyString,
        reviewer: nonEmptyString,
    })
    .strict();

/** A unit of work: 4 base fields + 13 metadata fields. */
export const taskSchema = z
    .object({
        id: nonEmptyString,
        content: nonEmptyString,
        status: taskStatusSchema,
        priority: taskPrioritySchema,
        metadata: taskMetadataSchema,
    })
    .strict();

/** Proof of a claim, backed by an artifact on disk. */
export const evidenceSchema = z
    .object({
        id: nonEmptyString.regex(EVIDENCE_ID_PATTERN),
        type: evidenceTypeSchema,
        claim: nonEmptyString,
        location: nonEmptyString,
        timestamp: nonEmptyString,
        verified: z.boolean(),
        verified_by: verifiedBySchema,
    })
    .strict();

export const reviewGateSchema = z
    .object({
        stage: stageNameSchema,
        reviewing_agent: nonEmptyString,
        timestamp: nonEmptyString,
        criteria_checked: stringList,
        approved: z.boolean(),
        action: reviewActionSchema,
    })
    .strict();

export const conflictSchema = z
    .object({
        id: nonEmptyString.regex(CONFLICT_ID_PATTERN),
        type: conflictTypeSchema,
        parties: stringList,
        positions: stringList,
        resolution: z.string().optional(),
    })
    .strict();

export const handoffContextSchema = z
    .object({
        objective: nonEmptyString,
        current_stage: stageNameSchema,
        completed_stages: z.array(stageNameSchema),
        pending_tasks: stringList,
        evidence_refs: stringList,
        blockers: stringList,
    })
    .strict();

export const handoffSchema = z
    .object({
        from: nonEmptyString,
        to: nonEmptyString,
        timestamp: nonEmptyString,
        context: handoffContextSchema,
        instructions: nonEmptyString,
        deadline: nonEmptyString,
    })
    .strict();

export const recoverySchema = z
    .object({
        id: nonEmptyString.regex(RECOVERY_ID_PATTERN),
        trigger: nonEmptyString,
        rollback_to: nonEmptyString,
        resume_stage: stageNameSchema,
        success: z.boolean(),
    })
    .strict();

export const metricsSchema = z
    .object({
        workflow_id: nonEmptyString,
        timestamp: nonEmptyString,
        total_time_min: z.number().int().min(0),
        stages: stringList,
        agents: stringList,
        evidence: stringList,
        quality: z.record(z.number()),
    })
    .strict();

export const skillSchema = z
    .object({
        name: nonEmptyString,
        source: nonEmptyString,
        purpose: nonEmptyString,
        interface: nonEmptyString,
        tested: z.boolean(),
        evidence_location: nonEmptyString,
    })
    .strict();

export const startupSchema = z
    .object({
        services_verified: z.boolean(),
        scheduler_active: z.boolean(),
        memory_ok: z.boolean(),
        env_ready: z.boolean(),
        workflow_dir: nonEmptyString,
        timestamp: nonEmptyString,
    })
    .strict();

/** Schema lookup by name. */
export const RECORD_SCHEMAS = {
    task: taskSchema,
    evidence: evidenceSchema,
    review_gate: reviewGateSchema,
    conflict: conflictSchema,
    handoff: handoffSchema,
    recovery: recoverySchema,
    metrics: metricsSchema,
    skill: skillSchema,
    startup: startupSchema,
} satisfies Record<string, z.ZodTypeAny>;

export type SchemaName = keyof typeof RECORD_SCHEMAS;

export const SCHEMA_NAMES: readonly SchemaName[] = [
    'task',
    'evidence',
    'review_gate',
    'conflict',
    'handoff',
    'recovery',
    'metrics',
    'skill',
    'startup',
];

/**
 * A record inside its tagged envelope. `kind` selects the schema;
 * the data object carries exactly the fields listed above.
 */
export const workflowRecordSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('task'), data: taskSchema }),
    z.object({ kind: z.literal('evidence'), data: evidenceSchema }),
    z.object({ kind: z.literal('review_gate'), data: reviewGateSchema }),
    z.object({ kind: z.literal('conflict'), data: conflictSchema }),
    z.object({ kind: z.literal('handoff'), data: handoffSchema }),
    z.object({ kind: z.literal('recovery'), data: recoverySchema }),
    z.object({ kind: z.literal('metrics'), data: metricsSchema }),
    z.object({ kind: z.literal('skill'), data: skillSchema }),
    z.object({ kind: z.literal('startup'), data: startupSchema }),
]);
