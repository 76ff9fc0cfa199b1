/**
 * `stagegate run` — Drive a run through the stage pipeline.
 *
 * Starts a new run for an objective, or resumes a saved one with `--resume`.
 * Exits non-zero unless the run reaches COMPLETE.
 *
 * Dependency direction: run.ts → commander, orchestrator, collaborator factory, config
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { loadConfig } from '../../core/config/manager.js';
import { RunState } from '../../core/stages.js';
import { ValidationError } from '../../core/errors.js';
import { Orchestrator, type RunOutcome } from '../../core/workflow/orchestrator.js';
import { createCollaborators } from '../../collaborators/factory.js';
import { LogLevel, logger } from '../../utils/logger.js';
import { reportCommandError } from '../utils/errors.js';

interface RunCommandOptions {
    plan?: string;
    auto?: boolean;
    resume?: string;
    verbose?: boolean;
}

export const runCommand = new Command('run')
    .description('Run the stage pipeline for an objective')
    .argument('[objective]', 'What the run should achieve')
    .option('--plan <file>', 'Plan file of record envelopes (overrides plan.file)')
    .option('--auto', 'Approve the plan without prompting')
    .option('--resume <runId>', 'Resume a saved run instead of starting one')
    .option('-v, --verbose', 'Show debug output')
    .action(async (objective: string | undefined, options: RunCommandOptions) => {
        const projectRoot = process.cwd();
        if (options.verbose) logger.setLogLevel(LogLevel.Debug);

        try {
            const config = loadConfig(projectRoot);
            const orchestrator = new Orchestrator(
                createCollaborators(config, projectRoot, { planFile: options.plan, auto: options.auto }),
            );

            let outcome: RunOutcome;
            if (options.resume) {
                outcome = await orchestrator.resume(options.resume);
            } else if (objective?.trim()) {
                outcome = await orchestrator.run(objective.trim());
            } else {
                throw new ValidationError('An objective is required unless --resume is given');
            }

            if (outcome.context.state !== RunState.Complete) {
                logger.info(`Resume with: stagegate run --resume ${outcome.runId}`);
                process.exitCode = 1;
            }
        } catch (err) {
            reportCommandError(err);
        }
    });
