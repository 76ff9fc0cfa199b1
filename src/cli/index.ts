#!/usr/bin/env node

/**
 * CLI entry point — registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("stagegate" binary)
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';
import { gateCommand } from './commands/gate.js';

const program = new Command();

program
    .name('stagegate')
    .description('Workflow quality gate — evidence-checked stage pipeline with retry, escalation and recovery')
    .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(configCommand);
program.addCommand(doctorCommand);
program.addCommand(runCommand);
program.addCommand(validateCommand);
program.addCommand(gateCommand);

await program.parseAsync();
