/**
 * Record codec — envelope construction, JSON serialization, and id formatting.
 *
 * Dependency direction: codec.ts → schema.ts, validator.ts, errors.ts
 * Used by: record store, gate log, session persistence, CLI
 */

import { workflowRecordSchema, type SchemaName } from './schema.js';
import { detectSchema, validateRecord } from './validator.js';
import type { RecordOfKind, WorkflowRecord } from './types.js';
import type { StageName } from '../stages.js';
import { ValidationError } from '../errors.js';

/** Wrap record data in its envelope. */
export function envelope<K extends WorkflowRecord['kind']>(
    kind: K,
    data: RecordOfKind<K>['data'],
): { kind: K; data: RecordOfKind<K>['data'] } {
    return { kind, data };
}

/** Serialize a record to a single JSON line. */
export function serializeRecord(record: WorkflowRecord): string {
    return JSON.stringify(record);
}

/**
 * Parse an already-decoded value into a typed record.
 * @throws {ValidationError} naming every field-level problem.
 */
export function toWorkflowRecord(value: unknown): WorkflowRecord {
    const parsed = workflowRecordSchema.safeParse(value);
    if (parsed.success) {
        return parsed.data;
    }

    const kind = detectSchema(value);
    const errors = kind ? validateRecord(value, kind).errors : ['Missing or unknown record kind'];
    throw new ValidationError(`Invalid ${kind ?? 'record'}:\n${errors.map((e) => `  - ${e}`).join('\n')}`, {
        kind,
        errors,
    });
}

/**
 * Parse a JSON string produced by serializeRecord.
 * @throws {ValidationError} for malformed JSON or an invalid record.
 */
export function parseRecord(text: string): WorkflowRecord {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (err) {
        throw new ValidationError('Record is not valid JSON', {
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
    return toWorkflowRecord(value);
}

/** Filter records down to the data of a single kind. */
export function dataOfKind<K extends SchemaName>(records: readonly WorkflowRecord[], kind: K): Array<RecordOfKind<K>['data']> {
    const out: Array<RecordOfKind<K>['data']> = [];
    for (const record of records) {
        if (isKind(record, kind)) out.push(record.data);
    }
    return out;
}

/** Type guard for a record envelope of a given kind. */
export function isKind<K extends SchemaName>(record: WorkflowRecord, kind: K): record is RecordOfKind<K> {
    return record.kind === kind;
}

/** `YYYYMMDDTHHMMSS` in UTC. */
export function compactTimestamp(date: Date): string {
    return date.toISOString().replace(/[-:]/g, '').slice(0, 15);
}

/** `E-{STAGE}-{SESSION}-{SEQ:03}` */
export function formatEvidenceId(stage: StageName, session: string, seq: number): string {
    return `E-${stage}-${session}-${String(seq).padStart(3, '0')}`;
}

export function formatConflictId(date: Date): string {
    return `C-${compactTimestamp(date)}`;
}

export function formatRecoveryId(date: Date): string {
    return `R-${compactTimestamp(date)}`;
}
