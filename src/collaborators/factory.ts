/**
 * Collaborator factory — builds the orchestrator's dependencies from config.
 *
 * Wires stage commands, the test runner, the reviewer, service probes and
 * run memory into a ready-to-use `OrchestratorDependencies`.
 *
 * Dependency direction: factory.ts → collaborators/*, config/types
 * Used by: cli/commands/run.ts, cli/commands/doctor.ts
 */

import { resolve } from 'node:path';
import type { AppConfig, ReviewerConfig, ServiceConfig } from '../core/config/types.js';
import { CollaboratorError, ConfigError } from '../core/errors.js';
import type { StageName } from '../core/stages.js';
import type { OrchestratorDependencies, OrchestratorSettings } from '../core/workflow/orchestrator.js';
import { CommandReviewer } from './command-reviewer.js';
import { CommandStageHandler } from './command-stage-handler.js';
import { FilePlanner } from './file-planner.js';
import { InteractivePlanApprover, InteractiveReviewer } from './interactive-approval.js';
import { IntervalTimer } from './interval-timer.js';
import { JsonFileStore } from './json-file-store.js';
import { CommandServiceProbe, HttpServiceProbe } from './service-probes.js';
import { CommandTestRunner } from './test-runner.js';
import { TestStageHandler } from './test-stage-handler.js';
import type { ExternalReviewer, ServiceProbe, StageHandler } from './types.js';

export interface CollaboratorOptions {
    /** Overrides `plan.file`. */
    planFile?: string;
    /** Skip the interactive plan approval. */
    auto?: boolean;
    quiet?: boolean;
}

/** Orchestrator settings from the config, with paths resolved against the project root. */
export function createOrchestratorSettings(config: AppConfig, projectRoot: string): OrchestratorSettings {
    return {
        policy: {
            maxRetry: config.gate.maxRetry,
            errorCeiling: config.gate.errorCeiling,
            fabricationStopThreshold: config.gate.fabricationStopThreshold,
        },
        failureMarkers: config.gate.failureMarkers,
        evidenceMaxAgeSeconds: config.gate.evidenceMaxAgeSeconds,
        reviewerTimeoutMs: config.gate.reviewerTimeoutMs,
        workerPoolWidth: config.dispatch.workerPoolWidth,
        parallelThreshold: config.dispatch.parallelThreshold,
        escalationChain: config.run.escalationChain,
        livenessIntervalMs: config.run.livenessIntervalMs,
        handoffDeadlineMinutes: config.run.handoffDeadlineMinutes,
        runsDir: resolve(projectRoot, config.run.runsDir),
    };
}

/**
 * Build the stage handler for a stage.
 *
 * A configured stage command wins; TEST falls back to the test suite command.
 * Any other unconfigured stage fails each of its tasks.
 */
export function createStageHandler(stage: StageName, config: AppConfig, projectRoot: string): StageHandler {
    const command = config.stages.commands[stage];
    if (command) {
        return new CommandStageHandler({ command, cwd: projectRoot, timeoutMs: config.stages.timeoutMs });
    }

    if (stage === 'TEST') {
        const runner = new CommandTestRunner({
            command: config.tests.command,
            cwd: projectRoot,
            timeoutMs: config.tests.timeoutMs,
        });
        return new TestStageHandler(runner);
    }

    return {
        execute: async () => {
            throw new CollaboratorError(`No command configured for stage ${stage}`, { stage });
        },
    };
}

/** The external reviewer; `undefined` for `none`, which the gate treats as a rejection. */
export function createReviewer(reviewer: ReviewerConfig, projectRoot: string): ExternalReviewer | undefined {
    switch (reviewer.type) {
        case 'command':
            if (!reviewer.command) {
                throw new ConfigError('reviewer.type is "command" but reviewer.command is not set');
            }
            return new CommandReviewer(reviewer.command, projectRoot);
        case 'interactive':
            return new InteractiveReviewer();
        case 'none':
            return undefined;
    }
}

export function createServiceProbes(services: readonly ServiceConfig[]): ServiceProbe[] {
    return services.map((service) =>
        service.type === 'http'
            ? new HttpServiceProbe(service.name, service.target)
            : new CommandServiceProbe(service.name, service.target),
    );
}

/**
 * Create every collaborator the orchestrator needs.
 *
 * @param config - Full application config
 * @param projectRoot - Directory that relative config paths and stage commands resolve against
 */
export function createCollaborators(
    config: AppConfig,
    projectRoot: string,
    options: CollaboratorOptions = {},
): OrchestratorDependencies {
    const root = resolve(projectRoot);
    const planFile = resolve(root, options.planFile ?? config.plan.file);
    const handlers = new Map<StageName, StageHandler>();

    return {
        settings: createOrchestratorSettings(config, root),
        planner: new FilePlanner(planFile),
        handlerFor: (stage) => {
            let handler = handlers.get(stage);
            if (!handler) {
                handler = createStageHandler(stage, config, root);
                handlers.set(stage, handler);
            }
            return handler;
        },
        reviewer: createReviewer(config.reviewer, root),
        approver: config.run.planApproval && !options.auto ? new InteractivePlanApprover() : undefined,
        memory: new JsonFileStore(resolve(root, config.memory.path)),
        timer: new IntervalTimer(),
        probes: createServiceProbes(config.services),
        quiet: options.quiet,
    };
}
