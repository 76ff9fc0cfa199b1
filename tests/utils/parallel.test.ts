import { describe, it, expect, vi, afterEach } from 'vitest';
import { parallel, parallelMap, withTimeout } from '../../src/utils/parallel.js';

describe('parallel', () => {
    it('keeps results in input order', async () => {
        const results = await parallel([
            () => new Promise<string>((resolve) => setTimeout(() => resolve('slow'), 20)),
            async () => 'fast',
        ]);
        expect(results.map((r) => (r.success ? r.value : null))).toEqual(['slow', 'fast']);
    });

    it('never runs more operations than the concurrency limit', async () => {
        let running = 0;
        let peak = 0;
        const op = async (): Promise<void> => {
            running++;
            peak = Math.max(peak, running);
            await new Promise((resolve) => setTimeout(resolve, 5));
            running--;
        };

        await parallel([op, op, op, op, op], { concurrency: 2 });
        expect(peak).toBe(2);
    });

    it('rethrows the first failure by default', async () => {
        await expect(parallel([async () => { throw new Error('boom'); }])).rejects.toThrow('boom');
    });

    it('collects failures with continueOnError', async () => {
        const results = await parallel(
            [async () => 1, async () => { throw new Error('boom'); }, async () => 3],
            { continueOnError: true },
        );
        expect(results[1]).toEqual({ index: 1, success: false, error: new Error('boom') });
        expect(results[2]).toEqual({ index: 2, success: true, value: 3 });
    });

    it('wraps non-Error rejections', async () => {
        const [result] = await parallel([() => Promise.reject('plain')], { continueOnError: true });
        expect(result?.success).toBe(false);
        if (result && !result.success) {
            expect(result.error.message).toBe('plain');
        }
    });
});

describe('parallelMap', () => {
    it('passes each item with its index', async () => {
        const results = await parallelMap(['a', 'b'], async (item, index) => `${item}${index}`);
        expect(results.map((r) => (r.success ? r.value : ''))).toEqual(['a0', 'b1']);
    });
});

describe('withTimeout', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('returns the value when the operation finishes first', async () => {
        await expect(withTimeout(async () => 'ok', 1000)).resolves.toBe('ok');
    });

    it('rejects when the deadline passes first', async () => {
        vi.useFakeTimers();
        const pending = withTimeout(() => new Promise<string>(() => undefined), 50);
        const assertion = expect(pending).rejects.toThrow('Operation timed out after 50ms');
        await vi.advanceTimersByTimeAsync(50);
        await assertion;
    });
});
