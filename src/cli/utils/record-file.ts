/**
 * Reads a batch of record envelopes from a file.
 *
 * `.jsonl` files hold one JSON value per line; anything else is a JSON
 * array, a `{ "records": [...] }` object or a single record.
 *
 * Dependency direction: record-file.ts → utils/fs, zod
 * Used by: `stagegate validate`, `stagegate gate`
 */

import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';
import { readJsonFile, readTextFile } from '../../utils/fs.js';

const recordsObjectSchema = z.object({ records: z.array(z.unknown()) });

export function readRecordFile(filePath: string): unknown[] {
    if (filePath.endsWith('.jsonl')) {
        const records: unknown[] = [];
        readTextFile(filePath)
            .split('\n')
            .forEach((line, index) => {
                if (line.trim()) records.push(parseLine(line, index + 1, filePath));
            });
        return records;
    }

    const raw = readJsonFile(filePath);
    if (Array.isArray(raw)) return raw;

    const wrapped = recordsObjectSchema.safeParse(raw);
    return wrapped.success ? wrapped.data.records : [raw];
}

function parseLine(line: string, lineNumber: number, filePath: string): unknown {
    try {
        return JSON.parse(line);
    } catch (err) {
        throw new ValidationError(`Invalid JSON on line ${lineNumber} of ${filePath}`, {
            filePath,
            lineNumber,
            cause: err instanceof Error ? err.message : String(err),
        });
    }
}
