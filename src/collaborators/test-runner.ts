/**
 * Test runner — executes the project's test command and captures results.
 *
 * Runs the configured test command (e.g., `npm test`) with the suite
 * selector appended, writes the combined output to a log file and counts
 * passed and failed tests from the runner's summary line.
 *
 * Dependency direction: test-runner.ts → execa, utils
 * Used by: test stage handler, collaborator factory
 */

import { join } from 'node:path';
import { writeFile } from 'node:fs/promises';
import { execa } from 'execa';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import type { TestRunResult, TestRunner } from './types.js';

export interface CommandTestRunnerOptions {
    /** The test command, e.g. `npm test --`. */
    command: string;
    cwd: string;
    timeoutMs: number;
}

/**
 * Count passed and failed tests from a runner summary such as
 * `Tests  12 passed | 1 failed (13)` or `3 failed, 40 passed in 2.1s`.
 * The last count of each kind wins.
 */
export function countTestResults(output: string): { passed: number; failed: number } {
    const last = (pattern: RegExp): number => {
        const matches = [...output.matchAll(pattern)];
        const value = matches[matches.length - 1]?.[1];
        return value ? Number.parseInt(value, 10) : 0;
    };
    return {
        passed: last(/(\d+)\s+(?:tests?\s+)?passed/gi),
        failed: last(/(\d+)\s+(?:tests?\s+)?failed/gi),
    };
}

/** File-system safe name for a suite selector. */
export function logFileName(suiteSelector: string): string {
    const slug = suiteSelector
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 40);
    return `${slug || 'all'}.log`;
}

export class CommandTestRunner implements TestRunner {
    constructor(private readonly options: CommandTestRunnerOptions) {}

    async run(suiteSelector: string, logDir: string): Promise<TestRunResult> {
        const { command, cwd, timeoutMs } = this.options;
        const fullCommand = suiteSelector ? `${command} ${suiteSelector}` : command;
        const logPath = join(logDir, logFileName(suiteSelector));

        logger.info(`Running tests: ${fullCommand}`);

        const result = await execa(fullCommand, {
            shell: true,
            cwd,
            reject: false, // Don't throw on non-zero exit
            timeout: timeoutMs,
            all: true,
            env: { FORCE_COLOR: '0' }, // Disable color for cleaner output
        });

        const output = result.all ?? [result.stdout, result.stderr].filter(Boolean).join('\n');
        ensureDir(logDir);
        await writeFile(logPath, output, 'utf-8');

        const counts = countTestResults(output);
        // A failing exit with no parsable summary still counts as a failure
        const failed = result.exitCode !== 0 && counts.failed === 0 ? 1 : counts.failed;

        if (failed === 0) {
            logger.success(`Tests passed (${counts.passed})`);
        } else {
            logger.warn(`Tests failed: ${failed} failed, ${counts.passed} passed (exit code: ${result.exitCode ?? 'none'})`);
        }

        return { passed: counts.passed, failed, logPath };
    }
}
