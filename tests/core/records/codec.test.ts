/**
 * Tests for record envelopes, serialization and id formatting.
 */

import { describe, it, expect } from 'vitest';
import {
    compactTimestamp,
    dataOfKind,
    envelope,
    formatConflictId,
    formatEvidenceId,
    formatRecoveryId,
    parseRecord,
    serializeRecord,
    toWorkflowRecord,
} from '../../../src/core/records/codec.js';
import type { Conflict } from '../../../src/core/records/types.js';
import { ValidationError } from '../../../src/core/errors.js';
import { FIXED_NOW, makeEvidence, makeTask } from '../../helpers/fixtures.js';

describe('serializeRecord / parseRecord', () => {
    it('keeps a task with all of its fields', () => {
        const record = envelope('task', makeTask('T1'));
        const parsed = parseRecord(serializeRecord(record));
        expect(parsed).toEqual(record);
        if (parsed.kind !== 'task') throw new Error('expected a task record');
        expect(Object.keys(parsed.data.metadata)).toHaveLength(13);
    });

    it('keeps an evidence record with all of its fields', () => {
        const record = envelope('evidence', makeEvidence('E-TEST-20260301T120000-002', '/tmp/run/test.log', { type: 'test_result' }));
        const text = serializeRecord(record);

        expect(text).not.toContain('\n');
        expect(parseRecord(text)).toEqual(record);
    });

    it('keeps an unresolved conflict without adding a resolution', () => {
        const conflict: Conflict = {
            id: 'C-20260301T120000',
            type: 'evidence_dispute',
            parties: ['primary', 'secondary'],
            positions: ['tests pass', 'coverage dropped'],
        };
        const parsed = parseRecord(serializeRecord(envelope('conflict', conflict)));

        expect(parsed).toEqual({ kind: 'conflict', data: conflict });
        if (parsed.kind !== 'conflict') throw new Error('expected a conflict record');
        expect('resolution' in parsed.data).toBe(false);
    });

    it('keeps the resolution of a resolved conflict', () => {
        const conflict: Conflict = {
            id: 'C-20260301T120500',
            type: 'priority_conflict',
            parties: ['primary', 'supervisor'],
            positions: ['fix the flaky test first', 'ship the hotfix first'],
            resolution: 'ship the hotfix first',
        };
        const parsed = parseRecord(serializeRecord(envelope('conflict', conflict)));

        expect(parsed).toEqual({ kind: 'conflict', data: conflict });
        if (parsed.kind !== 'conflict') throw new Error('expected a conflict record');
        expect(parsed.data.resolution).toBe('ship the hotfix first');
    });

    it('throws ValidationError for malformed JSON', () => {
        expect(() => parseRecord('{ nope')).toThrow('Record is not valid JSON');
    });

    it('names the field-level problems of an invalid record', () => {
        const text = JSON.stringify({ kind: 'evidence', data: { ...makeEvidence('E-PLAN-s-001', '/tmp/a'), claim: '' } });
        expect(() => parseRecord(text)).toThrow('Invalid evidence:\n  - Missing: claim');
    });
});

describe('toWorkflowRecord', () => {
    it('rejects a value without a known kind', () => {
        expect(() => toWorkflowRecord({ kind: 'widget', data: {} })).toThrow(ValidationError);
        expect(() => toWorkflowRecord({ kind: 'widget', data: {} })).toThrow('Invalid record:\n  - Missing or unknown record kind');
    });
});

describe('dataOfKind', () => {
    it('filters to the data of one kind, in order', () => {
        const records = [
            envelope('task', makeTask('T1')),
            envelope('evidence', makeEvidence('E-PLAN-s-001', '/tmp/a')),
            envelope('task', makeTask('T2')),
        ];
        expect(dataOfKind(records, 'task').map((t) => t.id)).toEqual(['T1', 'T2']);
    });
});

describe('id formatting', () => {
    it('formats compact UTC timestamps', () => {
        expect(compactTimestamp(FIXED_NOW)).toBe('20260301T120000');
    });

    it('formats evidence ids with a three-digit sequence', () => {
        expect(formatEvidenceId('TEST', '20260301T120000', 7)).toBe('E-TEST-20260301T120000-007');
    });

    it('formats conflict and recovery ids', () => {
        expect(formatConflictId(FIXED_NOW)).toBe('C-20260301T120000');
        expect(formatRecoveryId(FIXED_NOW)).toBe('R-20260301T120000');
    });
});
