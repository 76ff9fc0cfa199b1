/**
 * Structured console logger with chalk colors and log levels.
 *
 * Console output is coloured; an optional file sink receives the same
 * lines uncoloured with an ISO timestamp (a run's `logs/workflow.log`).
 *
 * Dependency direction: logger.ts → chalk, node:fs
 * Used by: every layer for consistent logging output
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

let currentLevel: LogLevel = LogLevel.Info;
let logFilePath: string | null = null;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Mirror every log line to a file, or stop mirroring with `null`. */
export function setLogFile(filePath: string | null): void {
    if (filePath) {
        mkdirSync(dirname(filePath), { recursive: true });
    }
    logFilePath = filePath;
}

function writeFileLine(level: string, message: string): void {
    if (!logFilePath) return;
    appendFileSync(logFilePath, `[${new Date().toISOString()}] [${level}] ${message}\n`, 'utf-8');
}

/** Log a debug message (grey, only shown at Debug level). */
export function debug(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Debug) {
        console.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
        writeFileLine('DEBUG', message);
    }
}

/** Log an info message (blue). */
export function info(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.blue(`[INFO]  ${message}`), ...args);
        writeFileLine('INFO', message);
    }
}

/** Log a success message (green). */
export function success(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.green(`✔ ${message}`), ...args);
        writeFileLine('INFO', message);
    }
}

/** Log a warning message (yellow). */
export function warn(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Warn) {
        console.warn(chalk.yellow(`[WARN]  ${message}`), ...args);
        writeFileLine('WARN', message);
    }
}

/** Log an error message (red). */
export function error(message: string, ...args: unknown[]): void {
    if (currentLevel <= LogLevel.Error) {
        console.error(chalk.red(`[ERROR] ${message}`), ...args);
        writeFileLine('ERROR', message);
    }
}

/** Log a step in a process (cyan, with step number). */
export function step(stepNumber: number, total: number, message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.cyan(`[${stepNumber}/${total}] ${message}`));
        writeFileLine('INFO', `[${stepNumber}/${total}] ${message}`);
    }
}

/** Log a header/banner (bold white). */
export function header(message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
        console.log(chalk.bold.white(message));
        console.log(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
    }
}

export const logger = {
    debug,
    info,
    success,
    warn,
    error,
    step,
    header,
    setLogLevel,
    setLogFile,
};
