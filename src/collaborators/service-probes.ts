/**
 * Service probes checked at startup.
 *
 * Dependency direction: service-probes.ts → execa, collaborators/types
 * Used by: collaborator factory, `stagegate doctor`
 */

import { execa } from 'execa';
import type { ServiceProbe } from './types.js';

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/** Reachable when a GET on the URL answers with a 2xx status. */
export class HttpServiceProbe implements ServiceProbe {
    constructor(
        readonly name: string,
        private readonly url: string,
        private readonly timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS,
    ) {}

    async ping(): Promise<boolean> {
        try {
            const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
            return response.ok;
        } catch {
            return false;
        }
    }
}

/** Reachable when the command exits with code 0. */
export class CommandServiceProbe implements ServiceProbe {
    constructor(
        readonly name: string,
        private readonly command: string,
        private readonly timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS,
    ) {}

    async ping(): Promise<boolean> {
        const result = await execa(this.command, { shell: true, reject: false, timeout: this.timeoutMs });
        return result.exitCode === 0;
    }
}
