/**
 * Extract the record envelopes a command printed in a fenced
 * ```stagegate-records``` block.
 *
 * Dependency direction: records-block.ts → nothing (leaf module)
 * Used by: command stage handler, file planner
 */

export const RECORDS_FENCE = 'stagegate-records';

/**
 * Parse every ```stagegate-records``` block in the output, in order.
 * A block holds a JSON array of envelopes or a single envelope.
 *
 * The closing fence must start a line so ``` inside JSON strings does not end the block.
 *
 * @returns the envelopes, unvalidated, and one message per block that is not valid JSON
 */
export function extractRecordBlocks(content: string): { records: unknown[]; errors: string[] } {
    const pattern = new RegExp('```' + RECORDS_FENCE + '[ \\t]*\\n([\\s\\S]*?)\\n```[ \\t]*(?:\\n|$)', 'g');
    const records: unknown[] = [];
    const errors: string[] = [];

    let blockIndex = 0;
    for (const match of content.matchAll(pattern)) {
        blockIndex++;
        const raw = (match[1] ?? '').trim();
        try {
            const parsed: unknown = JSON.parse(raw);
            if (Array.isArray(parsed)) {
                records.push(...parsed);
            } else {
                records.push(parsed);
            }
        } catch (err) {
            errors.push(`${RECORDS_FENCE} block #${blockIndex}: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    return { records, errors };
}
