/**
 * `stagegate config` — Show the effective configuration, or one setting of it.
 *
 * Dependency direction: config.ts → commander, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, getConfigPath, getConfigValue } from '../../core/config/manager.js';
import { ValidationError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';
import { reportCommandError } from '../utils/errors.js';

interface ConfigOptions {
    path?: boolean;
    get?: string;
}

export const configCommand = new Command('config')
    .description('Show the effective configuration')
    .option('-p, --path', 'Show config file path only')
    .option('-g, --get <key>', 'Print one setting by dotted path (e.g. gate.maxRetry)')
    .action((options: ConfigOptions) => {
        const projectRoot = process.cwd();

        if (options.path) {
            console.log(getConfigPath(projectRoot));
            return;
        }

        try {
            const config = loadConfig(projectRoot);

            if (options.get) {
                const value = getConfigValue(config, options.get);
                if (value === undefined) {
                    throw new ValidationError(`Unknown setting: ${options.get}`, { key: options.get });
                }
                // Scalars print bare so scripts can use the output directly
                console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
                return;
            }

            logger.header('Effective Configuration');
            console.log(chalk.gray(`File: ${getConfigPath(projectRoot)}`));
            console.log();
            console.log(JSON.stringify(config, null, 2));
        } catch (err) {
            reportCommandError(err);
        }
    });
