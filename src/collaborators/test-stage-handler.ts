/**
 * Test stage handler — runs a task's test suite and reports the result as evidence.
 *
 * The suite selector is the task's `instruction_set`. The run log lands in
 * the run's `test/` directory and is copied to the task's
 * `evidence_location`, which is where the evidence points.
 * A metrics record carries the pass/fail counts.
 *
 * Dependency direction: test-stage-handler.ts → collaborators/types, records/codec
 * Used by: collaborator factory
 */

import { copyFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { envelope } from '../core/records/codec.js';
import type { Evidence, Metrics, Task } from '../core/records/types.js';
import { ensureDir } from '../utils/fs.js';
import type { StageExecutionContext, StageHandler, StageHandlerResult, TestRunner } from './types.js';

export class TestStageHandler implements StageHandler {
    constructor(
        private readonly runner: TestRunner,
        private readonly now: () => Date = () => new Date(),
    ) {}

    async execute(task: Task, context: StageExecutionContext): Promise<StageHandlerResult> {
        const started = this.now();
        const result = await this.runner.run(task.metadata.instruction_set, join(context.runDir, 'test'));

        const location = task.metadata.evidence_location;
        if (resolve(result.logPath) !== resolve(location)) {
            ensureDir(dirname(location));
            await copyFile(result.logPath, location);
        }

        const passed = result.failed === 0;
        const evidence: Evidence = {
            id: context.nextEvidenceId(),
            type: 'test_result',
            claim: `${result.passed} passed, ${result.failed} failed`,
            location,
            timestamp: this.now().toISOString(),
            verified: passed,
            verified_by: 'agent',
        };

        const metrics: Metrics = {
            workflow_id: context.runId,
            timestamp: this.now().toISOString(),
            total_time_min: Math.round((this.now().getTime() - started.getTime()) / 60_000),
            stages: [context.stage],
            agents: [context.agent],
            evidence: [evidence.id],
            quality: { tests_passed: result.passed, tests_failed: result.failed },
        };

        return {
            status: passed ? 'completed' : 'failed',
            evidenceClaims: [evidence],
            records: [envelope('metrics', metrics)],
        };
    }
}
