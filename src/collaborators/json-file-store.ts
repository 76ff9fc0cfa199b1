/**
 * Key/value store persisted as a single JSON object on disk.
 *
 * Dependency direction: json-file-store.ts → zod, utils/fs
 * Used by: collaborator factory (run memory, startup round trip)
 */

import { z } from 'zod';
import { fileExists, readJsonFile, writeJsonFile } from '../utils/fs.js';
import { ConfigError } from '../core/errors.js';
import type { KeyValueStore } from './types.js';

const storeFileSchema = z.record(z.string());

export class JsonFileStore implements KeyValueStore {
    private writes: Promise<void> = Promise.resolve();

    constructor(private readonly filePath: string) {}

    async get(key: string): Promise<string | undefined> {
        await this.writes;
        return this.read()[key];
    }

    /** Writes are applied one at a time, in call order. */
    put(key: string, value: string): Promise<void> {
        const next = this.writes.then(() => {
            writeJsonFile(this.filePath, { ...this.read(), [key]: value });
        });
        this.writes = next.catch(() => undefined);
        return next;
    }

    private read(): Record<string, string> {
        if (!fileExists(this.filePath)) return {};
        const parsed = storeFileSchema.safeParse(readJsonFile(this.filePath));
        if (!parsed.success) {
            throw new ConfigError(`Memory file is not a JSON object of strings: ${this.filePath}`, {
                filePath: this.filePath,
            });
        }
        return parsed.data;
    }
}
