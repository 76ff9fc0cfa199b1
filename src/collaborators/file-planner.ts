/**
 * File planner — reads the plan from a JSON file of record envelopes.
 *
 * The file holds either an array of envelopes or `{ "records": [...] }`.
 * Valid task envelopes become the plan's tasks; everything else goes to the
 * PLAN batch as-is so the gate reports what is wrong with it. When the file
 * carries no evidence, a plan summary is written to `plans/` and claimed.
 * The summary holds the claim alone; run and task ids may contain a failure marker.
 *
 * Every stage after PLAN needs at least one task; the planner warns about
 * each stage the file leaves empty.
 *
 * Dependency direction: file-planner.ts → records, utils/fs
 * Used by: collaborator factory
 */

import { join } from 'node:path';
import { writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { envelope } from '../core/records/codec.js';
import { PIPELINE_STAGES, type StageName } from '../core/stages.js';
import { taskSchema } from '../core/records/schema.js';
import type { Task } from '../core/records/types.js';
import { detectSchema } from '../core/records/validator.js';
import { ValidationError } from '../core/errors.js';
import { ensureDir, readJsonFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import type { PlanContext, PlanResult, Planner } from './types.js';

const planFileSchema = z.union([
    z.array(z.unknown()),
    z.object({ records: z.array(z.unknown()) }),
]);

const taskEnvelopeSchema = z.object({ kind: z.literal('task'), data: taskSchema });

export class FilePlanner implements Planner {
    constructor(private readonly planFile: string) {}

    async plan(context: PlanContext): Promise<PlanResult> {
        const parsed = planFileSchema.safeParse(readJsonFile(this.planFile));
        if (!parsed.success) {
            throw new ValidationError(`Plan file must be an array of records or { "records": [...] }: ${this.planFile}`, {
                planFile: this.planFile,
            });
        }
        const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.records;

        const tasks: Task[] = [];
        const records: unknown[] = [];
        for (const entry of entries) {
            const task = taskEnvelopeSchema.safeParse(entry);
            if (task.success) {
                tasks.push(task.data.data);
            } else {
                records.push(entry);
            }
        }

        for (const stage of unplannedStages(tasks)) {
            logger.warn(`No task planned for ${stage}; its gate will miss its required records`);
        }

        if (!entries.some((e) => detectSchema(e) === 'evidence')) {
            records.push(await this.writeSummaryEvidence(context, tasks));
        }

        logger.debug(`Plan loaded from ${this.planFile}: ${tasks.length} task(s), ${records.length} other record(s)`);
        return { tasks, records };
    }

    private async writeSummaryEvidence(context: PlanContext, tasks: readonly Task[]): Promise<unknown> {
        const plansDir = join(context.runDir, 'plans');
        const location = join(plansDir, 'plan-summary.txt');
        const claim = `Tasks: ${tasks.length}`;

        ensureDir(plansDir);
        await writeFile(location, `${claim}\n`, 'utf-8');

        return envelope('evidence', {
            id: context.nextEvidenceId(),
            type: 'output',
            claim,
            location,
            timestamp: new Date().toISOString(),
            verified: true,
            verified_by: 'agent',
        });
    }
}

/** Stages after PLAN that no task is assigned to. */
export function unplannedStages(tasks: readonly Task[]): StageName[] {
    const planned = new Set(tasks.map((t) => t.metadata.current_stage));
    return PIPELINE_STAGES.filter((stage) => stage !== 'PLAN' && !planned.has(stage));
}
