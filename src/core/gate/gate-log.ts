/**
 * Gate log — append-only JSON lines, one stream per stage occurrence.
 *
 * Appends are chained so concurrent writers never interleave lines.
 *
 * Dependency direction: gate-log.ts → utils/fs, policy
 * Used by: gate engine
 */

import { join } from 'node:path';
import { appendLine } from '../../utils/fs.js';
import type { StageName } from '../stages.js';
import type { SchemaName } from '../records/schema.js';
import type { GateAction } from './policy.js';

/** One persisted gate decision. */
export interface GateLogEntry {
    stage: StageName;
    checked: SchemaName[];
    errors: string[];
    action: GateAction;
    retry: number;
    timestamp: string;
}

export interface GateLog {
    append(entry: GateLogEntry): Promise<void>;
}

/** File name of a stage's gate log stream. */
export function gateLogFileName(stage: StageName): string {
    return `gate_${stage.toLowerCase()}.jsonl`;
}

/** Writes `<logsDir>/gate_<stage>.jsonl`. */
export class FileGateLog implements GateLog {
    private tail: Promise<void> = Promise.resolve();

    constructor(private readonly logsDir: string) {}

    append(entry: GateLogEntry): Promise<void> {
        const filePath = join(this.logsDir, gateLogFileName(entry.stage));
        const next = this.tail.then(() => appendLine(filePath, JSON.stringify(entry)));
        // Later appends still run after a failed write; this caller sees the rejection.
        this.tail = next.catch(() => undefined);
        return next;
    }
}
