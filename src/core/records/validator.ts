/**
 * Schema validator — checks a record against one of the record schemas.
 *
 * Pure and deterministic: no I/O, no shared state. Zod issues are mapped to
 * field-level messages and reported in a fixed check order:
 *   required fields → nested metadata/context fields → enums → patterns → types → the rest.
 *
 * Tasks are also scanned for placeholder text (TODO, TBD, `...`, `<name>`
 * and the like) in every string field, however deeply nested.
 *
 * Dependency direction: validator.ts → schema.ts, zod
 * Used by: gate engine, codec, record store, `stagegate validate`
 */

import { z } from 'zod';
import { RECORD_SCHEMAS, type SchemaName } from './schema.js';

/** Outcome of validating one record. */
export interface ValidationResult {
    ok: boolean;
    errors: string[];
}

const envelopeHeaderSchema = z.object({ kind: z.string() });
const envelopeSchema = z.object({ kind: z.string(), data: z.record(z.unknown()) });

const NESTED_BLOCKS = new Set<string | number>(['metadata', 'context']);

/** Text that marks a field as not filled in yet. */
const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
    /\bTODO\b/,
    /\bFIXME\b/,
    /\bXXX\b/,
    /\bTBD\b/,
    /\bN\/A\b/,
    /\.\.\./,
    /<[^>]*>/,
    /\[[^\]]*\]/,
];

const PLACEHOLDER_CHECKED_SCHEMAS = new Set<SchemaName>(['task']);

enum CheckOrder {
    Required = 0,
    Nested = 1,
    Enum = 2,
    Pattern = 3,
    Type = 4,
    Other = 5,
}

interface FieldError {
    order: CheckOrder;
    field: string;
    message: string;
}

/** Check whether a string names a known record schema. */
export function isSchemaName(value: string): value is SchemaName {
    return Object.prototype.hasOwnProperty.call(RECORD_SCHEMAS, value);
}

/**
 * Resolve a record's schema from its `kind` discriminator.
 * Returns null when the value carries no recognised kind.
 */
export function detectSchema(record: unknown): SchemaName | null {
    const header = envelopeHeaderSchema.safeParse(record);
    if (!header.success) return null;

    const kind = header.data.kind;
    switch (kind) {
        case 'task':
        case 'evidence':
        case 'review_gate':
        case 'conflict':
        case 'handoff':
        case 'recovery':
        case 'metrics':
        case 'skill':
        case 'startup':
            return kind;
        default:
            return null;
    }
}

/**
 * Validate a record against a named schema.
 *
 * Accepts either a `{ kind, data }` envelope (whose kind matches) or the bare
 * data object. An unknown schema name is reported as an error.
 */
export function validateRecord(record: unknown, schemaName: string): ValidationResult {
    if (!isSchemaName(schemaName)) {
        return { ok: false, errors: [`Unknown schema: ${schemaName}`] };
    }

    const schema: z.ZodTypeAny = RECORD_SCHEMAS[schemaName];
    const data = unwrapEnvelope(record, schemaName);
    const result = schema.safeParse(data);

    const fieldErrors: FieldError[] = result.success ? [] : result.error.issues.map(describeIssue);
    if (PLACEHOLDER_CHECKED_SCHEMAS.has(schemaName)) {
        fieldErrors.push(...findPlaceholders(data, []));
    }
    if (fieldErrors.length === 0) {
        return { ok: true, errors: [] };
    }
    return { ok: false, errors: orderFieldErrors(fieldErrors) };
}

// ── Private helpers ──

function unwrapEnvelope(record: unknown, schemaName: SchemaName): unknown {
    const envelope = envelopeSchema.safeParse(record);
    if (envelope.success && envelope.data.kind === schemaName) {
        return envelope.data.data;
    }
    return record;
}

function fieldPath(path: Array<string | number>): string {
    return path.length > 0 ? path.join('.') : 'record';
}

function missing(path: Array<string | number>): FieldError {
    const nested = path.length > 1 && NESTED_BLOCKS.has(path[0] ?? '');
    const field = fieldPath(path);
    return { order: nested ? CheckOrder.Nested : CheckOrder.Required, field, message: `Missing: ${field}` };
}

function describeIssue(issue: z.ZodIssue): FieldError {
    const field = fieldPath(issue.path);

    switch (issue.code) {
        case z.ZodIssueCode.invalid_type:
            if (issue.received === 'undefined' || issue.received === 'null') {
                return missing(issue.path);
            }
            return {
                order: CheckOrder.Type,
                field,
                message: `${field}: expected ${issue.expected}, got ${issue.received}`,
            };
        case z.ZodIssueCode.too_small:
            if (issue.type === 'string') {
                return missing(issue.path);
            }
            return { order: CheckOrder.Other, field, message: `${field}: ${issue.message}` };
        case z.ZodIssueCode.invalid_enum_value:
            return {
                order: CheckOrder.Enum,
                field,
                message: `${field}: '${String(issue.received)}' not in [${issue.options.join(', ')}]`,
            };
        case z.ZodIssueCode.invalid_string:
            return { order: CheckOrder.Pattern, field, message: `${field}: pattern mismatch` };
        case z.ZodIssueCode.unrecognized_keys:
            return {
                order: CheckOrder.Other,
                field,
                message: `Unexpected field(s) in ${field}: ${issue.keys.join(', ')}`,
            };
        default:
            return { order: CheckOrder.Other, field, message: `${field}: ${issue.message}` };
    }
}

/** One error per string field holding placeholder text; the first matching pattern is named. */
function findPlaceholders(value: unknown, path: Array<string | number>): FieldError[] {
    if (typeof value === 'string') {
        for (const pattern of PLACEHOLDER_PATTERNS) {
            const match = pattern.exec(value);
            if (match) {
                const field = fieldPath(path);
                return [{ order: CheckOrder.Other, field, message: `${field}: placeholder '${match[0]}'` }];
            }
        }
        return [];
    }
    if (Array.isArray(value)) {
        return value.flatMap((item: unknown, index) => findPlaceholders(item, [...path, index]));
    }
    if (value !== null && typeof value === 'object') {
        return Object.entries(value).flatMap(([key, item]: [string, unknown]) => findPlaceholders(item, [...path, key]));
    }
    return [];
}

/** Sort by check order (stable) and drop follow-up errors on fields already reported missing. */
function orderFieldErrors(errors: FieldError[]): string[] {
    const missingFields = new Set(
        errors
            .filter((e) => e.order === CheckOrder.Required || e.order === CheckOrder.Nested)
            .map((e) => e.field),
    );

    return errors
        .filter((e) => e.order <= CheckOrder.Nested || !missingFields.has(e.field))
        .sort((a, b) => a.order - b.order)
        .map((e) => e.message)
        .filter((message, index, all) => all.indexOf(message) === index);
}
