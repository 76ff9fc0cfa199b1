/**
 * `stagegate gate` — Run the quality gate once over a stage output file.
 *
 * Exit code follows the decision: 0 PROCEED, 1 REVISE, 2 ESCALATE, 3 STOP.
 * Configuration errors also exit 3.
 *
 * Dependency direction: gate.ts → commander, chalk, gate engine, config, factory
 * Used by: cli/index.ts
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, getDefaultConfig, loadConfig } from '../../core/config/manager.js';
import { EvidenceVerifier } from '../../core/gate/evidence-verifier.js';
import { QualityGateEngine } from '../../core/gate/engine.js';
import { FileGateLog } from '../../core/gate/gate-log.js';
import type { GateAction } from '../../core/gate/policy.js';
import { compactTimestamp } from '../../core/records/codec.js';
import { isStageName, PIPELINE_STAGES } from '../../core/stages.js';
import { ValidationError } from '../../core/errors.js';
import { createOrchestratorSettings, createReviewer } from '../../collaborators/factory.js';
import { logger } from '../../utils/logger.js';
import { reportCommandError } from '../utils/errors.js';
import { readRecordFile } from '../utils/record-file.js';

export const GATE_EXIT: Record<GateAction, number> = {
    PROCEED: 0,
    REVISE: 1,
    ESCALATE: 2,
    STOP: 3,
};

interface GateCommandOptions {
    retry: string;
    logDir: string;
    objective: string;
}

export const gateCommand = new Command('gate')
    .description('Gate a stage output file and report the decision')
    .argument('<stage>', `Stage name: ${PIPELINE_STAGES.join(', ')}`)
    .argument('<outputFile>', 'JSON or .jsonl file holding the stage output records')
    .option('--retry <n>', 'Retries already used by this stage', '0')
    .option('--log-dir <dir>', 'Directory for the gate log', '.stagegate/gate-logs')
    .option('--objective <text>', 'Objective shown to the external reviewer', 'standalone gate check')
    .action(async (stage: string, outputFile: string, options: GateCommandOptions) => {
        const projectRoot = process.cwd();

        try {
            if (!isStageName(stage)) {
                throw new ValidationError(`Unknown stage: ${stage}. Expected one of ${PIPELINE_STAGES.join(', ')}`);
            }
            const retry = Number.parseInt(options.retry, 10);
            if (!Number.isInteger(retry) || retry < 0) {
                throw new ValidationError(`--retry must be a non-negative integer, got "${options.retry}"`);
            }

            const config = configExists(projectRoot) ? loadConfig(projectRoot) : getDefaultConfig();
            const settings = createOrchestratorSettings(config, projectRoot);
            const engine = new QualityGateEngine({
                policy: settings.policy,
                verifier: new EvidenceVerifier({
                    failureMarkers: settings.failureMarkers,
                    maxAgeSeconds: settings.evidenceMaxAgeSeconds,
                }),
                gateLog: new FileGateLog(resolve(projectRoot, options.logDir)),
                reviewer: createReviewer(config.reviewer, projectRoot),
                reviewerTimeoutMs: settings.reviewerTimeoutMs,
                runId: `gate-${compactTimestamp(new Date())}`,
                objective: options.objective,
            });

            const decision = await engine.gate(stage, readRecordFile(outputFile), retry);

            console.log();
            if (decision.action === 'PROCEED') {
                logger.success(`${stage}: PROCEED (${decision.records.length} record(s), schemas ${decision.checkedSchemas.join(', ')})`);
            } else {
                console.log(decision.report ?? chalk.yellow(`${stage}: ${decision.action}`));
            }
            process.exitCode = GATE_EXIT[decision.action];
        } catch (err) {
            reportCommandError(err, GATE_EXIT.STOP);
        }
    });
