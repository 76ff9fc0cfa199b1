/**
 * Shared failure handling for CLI command actions.
 *
 * Dependency direction: errors.ts → core/errors, utils/logger
 * Used by: every CLI command
 */

import { AppError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

/** Log a command failure and mark the process as failed. */
export function reportCommandError(err: unknown, exitCode: number = 1): void {
    if (err instanceof AppError) {
        logger.error(err.message);
        if (err.context) logger.debug(JSON.stringify(err.context));
    } else {
        logger.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exitCode = exitCode;
}
