import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import {
    createCollaborators,
    createOrchestratorSettings,
    createReviewer,
    createServiceProbes,
    createStageHandler,
} from '../../src/collaborators/factory.js';
import { CommandStageHandler } from '../../src/collaborators/command-stage-handler.js';
import { TestStageHandler } from '../../src/collaborators/test-stage-handler.js';
import { CommandReviewer } from '../../src/collaborators/command-reviewer.js';
import { InteractivePlanApprover, InteractiveReviewer } from '../../src/collaborators/interactive-approval.js';
import { CommandServiceProbe, HttpServiceProbe } from '../../src/collaborators/service-probes.js';
import type { StageExecutionContext } from '../../src/collaborators/types.js';
import { getDefaultConfig } from '../../src/core/config/manager.js';
import { CollaboratorError, ConfigError } from '../../src/core/errors.js';
import { makeTask } from '../helpers/fixtures.js';

const ROOT = resolve('/projects/demo');

describe('createOrchestratorSettings', () => {
    it('maps the config and resolves the runs directory', () => {
        const settings = createOrchestratorSettings(getDefaultConfig({ gate: { maxRetry: 1 } }), ROOT);

        expect(settings.policy).toEqual({ maxRetry: 1, errorCeiling: 10, fabricationStopThreshold: 2 });
        expect(settings.runsDir).toBe(resolve(ROOT, '.stagegate/runs'));
        expect(settings.escalationChain).toEqual(['primary', 'secondary', 'supervisor']);
    });
});

describe('createStageHandler', () => {
    it('uses the configured stage command', () => {
        const config = getDefaultConfig({ stages: { commands: { TEST: 'make check' } } });
        expect(createStageHandler('TEST', config, ROOT)).toBeInstanceOf(CommandStageHandler);
    });

    it('falls back to the test suite at TEST', () => {
        expect(createStageHandler('TEST', getDefaultConfig(), ROOT)).toBeInstanceOf(TestStageHandler);
    });

    it('fails tasks of a stage with no command', async () => {
        const handler = createStageHandler('REVIEW', getDefaultConfig(), ROOT);
        const context: StageExecutionContext = {
            runId: 'run-1',
            session: 'S1',
            stage: 'REVIEW',
            agent: 'primary',
            retryCount: 0,
            runDir: ROOT,
            nextEvidenceId: () => 'E-REVIEW-S1-001',
        };

        await expect(handler.execute(makeTask('T-1'), context)).rejects.toThrow(CollaboratorError);
        await expect(handler.execute(makeTask('T-1'), context)).rejects.toThrow('No command configured for stage REVIEW');
    });
});

describe('createReviewer', () => {
    it('builds each reviewer type', () => {
        expect(createReviewer({ type: 'command', command: './review.sh' }, ROOT)).toBeInstanceOf(CommandReviewer);
        expect(createReviewer({ type: 'interactive' }, ROOT)).toBeInstanceOf(InteractiveReviewer);
        expect(createReviewer({ type: 'none' }, ROOT)).toBeUndefined();
    });

    it('requires a command for the command reviewer', () => {
        expect(() => createReviewer({ type: 'command' }, ROOT)).toThrow(ConfigError);
    });
});

describe('createServiceProbes', () => {
    it('builds one probe per service', () => {
        const probes = createServiceProbes([
            { name: 'api', type: 'http', target: 'http://localhost:8080/health' },
            { name: 'db', type: 'command', target: 'pg_isready' },
        ]);

        expect(probes.map((p) => p.name)).toEqual(['api', 'db']);
        expect(probes[0]).toBeInstanceOf(HttpServiceProbe);
        expect(probes[1]).toBeInstanceOf(CommandServiceProbe);
    });
});

describe('createCollaborators', () => {
    it('asks for plan approval unless running automatically', () => {
        const config = getDefaultConfig();
        expect(createCollaborators(config, ROOT).approver).toBeInstanceOf(InteractivePlanApprover);
        expect(createCollaborators(config, ROOT, { auto: true }).approver).toBeUndefined();
        expect(createCollaborators(getDefaultConfig({ run: { planApproval: false } }), ROOT).approver).toBeUndefined();
    });

    it('builds each stage handler once', () => {
        const deps = createCollaborators(getDefaultConfig(), ROOT);
        expect(deps.handlerFor('IMPLEMENT')).toBe(deps.handlerFor('IMPLEMENT'));
        expect(deps.handlerFor('IMPLEMENT')).not.toBe(deps.handlerFor('LEARN'));
    });
});
