/**
 * Timer backed by setInterval.
 *
 * Dependency direction: interval-timer.ts → utils/logger
 * Used by: collaborator factory (liveness monitor, startup check)
 */

import { logger } from '../utils/logger.js';
import type { Timer, TimerHandle } from './types.js';

export class IntervalTimer implements Timer {
    every(intervalMs: number, callback: () => void | Promise<void>): TimerHandle {
        const id = setInterval(() => {
            Promise.resolve()
                .then(callback)
                .catch((err: unknown) => logger.warn(`Timer callback failed: ${err instanceof Error ? err.message : String(err)}`));
        }, intervalMs);
        // A pending tick never keeps the process alive
        id.unref();
        return { cancel: () => clearInterval(id) };
    }
}
