/**
 * `stagegate validate` — Check records against a record schema.
 *
 * Exit code 0 when every record is valid, 1 when any is invalid,
 * 2 when the schema name is unknown.
 *
 * Dependency direction: validate.ts → commander, chalk, records/validator
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SCHEMA_NAMES } from '../../core/records/schema.js';
import { isSchemaName, validateRecord } from '../../core/records/validator.js';
import { logger } from '../../utils/logger.js';
import { reportCommandError } from '../utils/errors.js';
import { readRecordFile } from '../utils/record-file.js';

export const VALIDATE_EXIT = { valid: 0, invalid: 1, unknownSchema: 2 } as const;

export const validateCommand = new Command('validate')
    .description('Validate the records in a file against a record schema')
    .argument('<recordFile>', 'JSON file (a record, an array or { records }) or .jsonl file')
    .argument('<schema>', `Schema name: ${SCHEMA_NAMES.join(', ')}`)
    .action((recordFile: string, schema: string) => {
        if (!isSchemaName(schema)) {
            logger.error(`Unknown schema: ${schema}`);
            console.log(chalk.gray(`  Known schemas: ${SCHEMA_NAMES.join(', ')}`));
            process.exitCode = VALIDATE_EXIT.unknownSchema;
            return;
        }

        try {
            const records = readRecordFile(recordFile);
            let invalid = 0;

            records.forEach((record, index) => {
                const result = validateRecord(record, schema);
                if (result.ok) {
                    console.log(chalk.green(`  ✔ #${index + 1} valid ${schema}`));
                    return;
                }
                invalid++;
                console.log(chalk.red(`  ✘ #${index + 1} invalid ${schema}`));
                for (const error of result.errors) {
                    console.log(chalk.gray(`      - ${error}`));
                }
            });

            console.log();
            if (invalid === 0) {
                logger.success(`${records.length} record(s) valid`);
                process.exitCode = VALIDATE_EXIT.valid;
            } else {
                logger.warn(`${invalid} of ${records.length} record(s) invalid`);
                process.exitCode = VALIDATE_EXIT.invalid;
            }
        } catch (err) {
            reportCommandError(err, VALIDATE_EXIT.invalid);
        }
    });
