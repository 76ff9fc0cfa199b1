/**
 * Command stage handler — does a stage's work for one task by running a shell command.
 *
 * The task is written to the command's stdin as JSON; run details arrive in
 * `STAGEGATE_*` environment variables. Exit code 0 completes the task, any
 * other exit fails it. Records printed in ```stagegate-records``` blocks join
 * the stage batch.
 *
 * Dependency direction: command-stage-handler.ts → execa, records-block, collaborators/types
 * Used by: collaborator factory
 */

import { execa } from 'execa';
import type { Task } from '../core/records/types.js';
import { logger } from '../utils/logger.js';
import { extractRecordBlocks } from './records-block.js';
import type { StageExecutionContext, StageHandler, StageHandlerResult } from './types.js';

export interface CommandStageHandlerOptions {
    command: string;
    cwd: string;
    timeoutMs: number;
}

export class CommandStageHandler implements StageHandler {
    constructor(private readonly options: CommandStageHandlerOptions) {}

    async execute(task: Task, context: StageExecutionContext): Promise<StageHandlerResult> {
        const { command, cwd, timeoutMs } = this.options;
        logger.debug(`[${context.stage}] ${task.id}: ${command}`);

        const result = await execa(command, {
            shell: true,
            cwd,
            input: JSON.stringify({ task, handoff: context.handoff ?? null }),
            reject: false,
            timeout: timeoutMs,
            env: {
                FORCE_COLOR: '0',
                STAGEGATE_RUN_ID: context.runId,
                STAGEGATE_RUN_DIR: context.runDir,
                STAGEGATE_STAGE: context.stage,
                STAGEGATE_TASK_ID: task.id,
                STAGEGATE_AGENT: context.agent,
                STAGEGATE_RETRY: String(context.retryCount),
                STAGEGATE_EVIDENCE_ID: context.nextEvidenceId(),
            },
        });

        const { records, errors } = extractRecordBlocks(result.stdout);
        for (const error of errors) {
            logger.warn(`[${context.stage}] ${task.id}: ${error}`);
        }

        if (result.timedOut) {
            logger.warn(`[${context.stage}] ${task.id}: command timed out after ${timeoutMs}ms`);
        }

        const completed = result.exitCode === 0 && errors.length === 0;
        if (!completed && result.stderr) {
            logger.debug(result.stderr);
        }

        return {
            status: completed ? 'completed' : 'failed',
            evidenceClaims: [],
            records,
        };
    }
}
