/**
 * Record builders shared by the tests.
 */

import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Evidence, Task, TaskMetadata } from '../../src/core/records/types.js';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function makeTask(id: string, overrides: Partial<Omit<Task, 'metadata'>> = {}, metadata: Partial<TaskMetadata> = {}): Task {
    return {
        id,
        content: `Do ${id}`,
        status: 'pending',
        priority: 'medium',
        ...overrides,
        metadata: {
            objective: 'Ship the feature',
            success_criteria: 'DONE',
            fail_criteria: 'artifact missing',
            evidence_required: 'log',
            evidence_location: `/tmp/stagegate-fixtures/${id}.log`,
            responsible_agent: 'primary',
            workflow_path: 'default',
            blocked_by: [],
            parallel: true,
            current_stage: 'IMPLEMENT',
            instruction_set: 'build it',
            time_budget: '30m',
            reviewer: 'secondary',
            ...metadata,
        },
    };
}

export function makeEvidence(id: string, location: string, overrides: Partial<Evidence> = {}): Evidence {
    return {
        id,
        type: 'log',
        claim: 'DONE',
        location,
        timestamp: FIXED_NOW.toISOString(),
        verified: true,
        verified_by: 'agent',
        ...overrides,
    };
}

/** Write an artifact file, creating its directory. */
export function writeArtifact(path: string, content: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
}
