/**
 * Configuration manager — load, save, validate, and merge configs.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands, orchestrator
 */

import { join, resolve } from 'node:path';
import { appConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { AppConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile, ensureDir } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

/**
 * Check whether a config file exists in the given project root.
 */
export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/**
 * Load and validate the configuration from disk.
 *
 * @param projectRoot - The root directory of the project (where .stagegate/ lives)
 * @returns The validated AppConfig
 * @throws {ConfigError} if the file doesn't exist, is invalid JSON, or fails validation
 */
export function loadConfig(projectRoot: string): AppConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        throw new ConfigError(
            `No configuration found. Run "stagegate init" first.`,
            { configPath, projectRoot },
        );
    }

    logger.debug(`Loading config from ${configPath}`);

    const config = parseConfig(readJsonFile(configPath), 'Invalid configuration file', { configPath });
    logger.debug('Config loaded and validated successfully');
    return config;
}

/**
 * Save configuration to disk, validating before write.
 *
 * @param projectRoot - The root directory of the project
 * @param config - The configuration to save
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const valid = parseConfig(config, 'Cannot save invalid configuration');

    const configDir = getConfigDir(projectRoot);
    const configPath = getConfigPath(projectRoot);

    ensureDir(configDir);
    writeJsonFile(configPath, valid);
    logger.debug(`Config saved to ${configPath}`);
}

/** A JSON object: config files and partial overrides. */
export type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two config objects. Source values override target values.
 * Arrays are replaced, not concatenated.
 */
export function mergeConfig(target: ConfigObject, source: ConfigObject): ConfigObject {
    const result: ConfigObject = { ...target };

    for (const [key, sourceVal] of Object.entries(source)) {
        const targetVal = result[key];

        if (isConfigObject(sourceVal) && isConfigObject(targetVal)) {
            result[key] = mergeConfig(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/**
 * Get the default configuration with optional partial overrides merged in.
 * @throws {ConfigError} if the merged result is not a valid configuration.
 */
export function getDefaultConfig(overrides?: ConfigObject): AppConfig {
    if (!overrides) return structuredClone(DEFAULT_CONFIG);
    return parseConfig(mergeConfig(DEFAULT_CONFIG, overrides), 'Invalid configuration overrides');
}

/**
 * Validate a raw value as configuration, applying defaults.
 * @throws {ConfigError} listing every invalid field.
 */
export function parseConfig(raw: unknown, heading = 'Invalid configuration file', context: Record<string, unknown> = {}): AppConfig {
    const result = appConfigSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map(
            (i) => `  - ${i.path.join('.')}: ${i.message}`,
        ).join('\n');

        throw new ConfigError(
            `${heading}:\n${issues}`,
            { ...context, issues: result.error.issues },
        );
    }

    return result.data;
}

/**
 * Look up a setting by dotted path, e.g. `gate.maxRetry` or `stages.commands.TEST`.
 * @returns `undefined` when any segment is missing.
 */
export function getConfigValue(config: AppConfig, path: string): unknown {
    let current: unknown = config;
    for (const segment of path.split('.').filter(Boolean)) {
        if (Array.isArray(current)) {
            current = current[Number(segment)];
        } else if (isConfigObject(current)) {
            current = current[segment];
        } else {
            return undefined;
        }
    }
    return current;
}
