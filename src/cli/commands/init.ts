/**
 * `stagegate init` — Setup wizard.
 *
 * Writes `.stagegate/config.json` in the current project directory, either
 * from defaults (`--yes`) or from a short series of prompts.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, saveConfig, getDefaultConfig, getConfigPath } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { logger } from '../../utils/logger.js';
import { reportCommandError } from '../utils/errors.js';

export const initCommand = new Command('init')
    .description('Create a stagegate configuration in the current project')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Accept defaults without prompting')
    .action(async (options: { force?: boolean; yes?: boolean }) => {
        const projectRoot = process.cwd();

        logger.header('stagegate — Project Setup');

        try {
            if (configExists(projectRoot) && !options.force) {
                const { overwrite } = await prompts({
                    type: 'confirm',
                    name: 'overwrite',
                    message: 'Configuration already exists. Overwrite?',
                    initial: false,
                });

                if (!overwrite) {
                    logger.info('Setup cancelled.');
                    return;
                }
            }

            const config = options.yes ? getDefaultConfig() : await runWizard();
            if (!config) {
                logger.info('Setup cancelled.');
                return;
            }

            const spinner = ora('Saving configuration...').start();
            saveConfig(projectRoot, config);
            spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);

            console.log();
            logger.success('Setup complete!');
            console.log(chalk.gray('  Next steps:'));
            console.log(chalk.gray('  1. Set a command per stage under "stages.commands"'));
            console.log(chalk.gray(`  2. Write the plan to ${config.plan.file}`));
            console.log(chalk.gray('  3. Run "stagegate doctor", then "stagegate run <objective>"'));
            console.log();
        } catch (err) {
            reportCommandError(err);
        }
    });

/**
 * Ask for the settings most projects change. Returns null when a prompt is dismissed.
 */
async function runWizard(): Promise<AppConfig | null> {
    const config = getDefaultConfig();

    logger.step(1, 3, 'Escalation');
    const { chain } = await prompts({
        type: 'list',
        name: 'chain',
        message: 'Escalation chain, in order (comma-separated):',
        initial: config.run.escalationChain.join(','),
        separator: ',',
    });
    if (!Array.isArray(chain)) return null;
    const escalationChain = chain.map((name: unknown) => String(name).trim()).filter((name) => name.length > 0);
    if (escalationChain.length > 0) config.run.escalationChain = escalationChain;

    logger.step(2, 3, 'Review');
    const reviewAnswers = await prompts([
        {
            type: 'select',
            name: 'reviewer',
            message: 'External reviewer for DISRUPT and VALIDATE:',
            choices: [
                { title: 'Interactive — ask in the terminal', value: 'interactive' },
                { title: 'Command — a shell command decides by exit code', value: 'command' },
                { title: 'None — those stages cannot pass', value: 'none' },
            ],
            initial: 0,
        },
        {
            type: (prev: string) => (prev === 'command' ? 'text' : null),
            name: 'reviewerCommand',
            message: 'Reviewer command:',
        },
        {
            type: 'confirm',
            name: 'planApproval',
            message: 'Require human approval of the plan?',
            initial: config.run.planApproval,
        },
    ]);
    if (reviewAnswers.reviewer !== 'interactive' && reviewAnswers.reviewer !== 'command' && reviewAnswers.reviewer !== 'none') {
        return null;
    }
    config.reviewer.type = reviewAnswers.reviewer;
    if (typeof reviewAnswers.reviewerCommand === 'string' && reviewAnswers.reviewerCommand.trim()) {
        config.reviewer.command = reviewAnswers.reviewerCommand.trim();
    }
    config.run.planApproval = reviewAnswers.planApproval !== false;

    logger.step(3, 3, 'Gate');
    const gateAnswers = await prompts([
        {
            type: 'number',
            name: 'maxRetry',
            message: 'Retries per stage before escalating:',
            initial: config.gate.maxRetry,
            min: 0,
            max: 20,
        },
        {
            type: 'text',
            name: 'testCommand',
            message: 'Test command for the TEST stage:',
            initial: config.tests.command,
        },
    ]);

    if (typeof gateAnswers.maxRetry === 'number') config.gate.maxRetry = gateAnswers.maxRetry;
    if (typeof gateAnswers.testCommand === 'string' && gateAnswers.testCommand.trim()) {
        config.tests.command = gateAnswers.testCommand.trim();
    }

    return config;
}
