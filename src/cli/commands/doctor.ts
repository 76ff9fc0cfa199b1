/**
 * `stagegate doctor` — Health check for configuration and dependent services.
 *
 * Verifies the config, pings every configured service, round-trips the
 * key/value memory and lists which stages have a command.
 *
 * Dependency direction: doctor.ts → commander, ora, chalk, config module, collaborator factory
 * Used by: cli/index.ts
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, loadConfig } from '../../core/config/manager.js';
import { PIPELINE_STAGES } from '../../core/stages.js';
import { StartupError } from '../../core/errors.js';
import { JsonFileStore } from '../../collaborators/json-file-store.js';
import { createServiceProbes } from '../../collaborators/factory.js';
import { fileExists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { reportCommandError } from '../utils/errors.js';

export const doctorCommand = new Command('doctor')
    .description('Check project setup and service health')
    .action(async () => {
        const projectRoot = process.cwd();

        logger.header('stagegate — Health Check');

        if (!configExists(projectRoot)) {
            console.log(chalk.red('  ✘ No configuration file — run "stagegate init"'));
            process.exitCode = 1;
            return;
        }

        try {
            const config = loadConfig(projectRoot);
            console.log(chalk.green('  ✔ Configuration is valid'));
            let allHealthy = true;

            // Services
            const probes = createServiceProbes(config.services);
            if (probes.length > 0) {
                console.log();
                const spinner = ora('Pinging services...').start();
                const results = await Promise.all(probes.map(async (p) => ({ name: p.name, ok: await p.ping() })));
                spinner.stop();
                for (const { name, ok } of results) {
                    console.log(ok ? chalk.green(`  ✔ ${name} — reachable`) : chalk.red(`  ✘ ${name} — unreachable`));
                    allHealthy &&= ok;
                }
            }

            // Memory round trip
            const memory = new JsonFileStore(resolve(projectRoot, config.memory.path));
            const probeValue = new Date().toISOString();
            await memory.put('stagegate:doctor', probeValue);
            const memoryOk = (await memory.get('stagegate:doctor')) === probeValue;
            console.log(memoryOk ? chalk.green('  ✔ Memory store — read/write ok') : chalk.red('  ✘ Memory store — read-back mismatch'));
            allHealthy &&= memoryOk;

            // Plan file
            const planFile = resolve(projectRoot, config.plan.file);
            console.log(
                fileExists(planFile)
                    ? chalk.green(`  ✔ Plan file found (${config.plan.file})`)
                    : chalk.yellow(`  ○ No plan file at ${config.plan.file} — pass --plan to "stagegate run"`),
            );

            // Stage commands
            console.log();
            for (const stage of PIPELINE_STAGES) {
                const command = config.stages.commands[stage];
                if (command) {
                    console.log(chalk.green(`  ✔ ${stage} — ${command}`));
                } else if (stage === 'TEST') {
                    console.log(chalk.gray(`  - ${stage} — test command: ${config.tests.command}`));
                } else if (stage === 'PLAN') {
                    console.log(chalk.gray(`  - ${stage} — plan file`));
                } else {
                    console.log(chalk.yellow(`  ○ ${stage} — no command configured`));
                }
            }

            console.log();
            if (allHealthy) {
                logger.success("All checks passed! You're ready to go.");
            } else {
                throw new StartupError('Some checks failed. Review the output above.', { memoryOk });
            }
        } catch (err) {
            reportCommandError(err);
        }
    });
