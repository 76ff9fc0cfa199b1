/**
 * Evidence verifier — confirms a claimed artifact exists and substantiates the claim.
 *
 * An artifact proves a claim when it contains the success marker
 * (case-insensitive) and none of the configured failure markers.
 * Every artifact that could be read is fingerprinted (SHA-256) and aged;
 * one older than `maxAgeSeconds` carries a staleness warning but still proves.
 *
 * Dependency direction: evidence-verifier.ts → node:fs, node:crypto, records/types
 * Used by: gate engine
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import type { Evidence } from '../records/types.js';

export const DEFAULT_FAILURE_MARKERS: readonly string[] = ['error', 'exception', 'traceback'];

export const DEFAULT_MAX_EVIDENCE_AGE_SECONDS = 3600;

export type UnprovenReason = 'missing_file' | 'unreadable' | 'criteria_not_found' | 'failure_marker_present';

/** What was read from an artifact. */
export interface ArtifactFingerprint {
    sha256: string;
    ageSeconds: number;
}

export type VerificationResult =
    | { proven: true; detail: string; artifact: ArtifactFingerprint; warning?: string }
    | { proven: false; reason: UnprovenReason; detail: string; artifact?: ArtifactFingerprint; warning?: string };

export interface EvidenceVerifierOptions {
    failureMarkers?: readonly string[];
    maxAgeSeconds?: number;
    now?: () => Date;
}

type ArtifactRead =
    | { ok: true; content: string; fingerprint: ArtifactFingerprint }
    | { ok: false; reason: 'missing_file' | 'unreadable'; detail: string };

export class EvidenceVerifier {
    private readonly failureMarkers: readonly string[];
    private readonly maxAgeSeconds: number;
    private readonly now: () => Date;

    constructor(options: EvidenceVerifierOptions = {}) {
        this.failureMarkers = (options.failureMarkers ?? DEFAULT_FAILURE_MARKERS).map((m) => m.toLowerCase());
        this.maxAgeSeconds = options.maxAgeSeconds ?? DEFAULT_MAX_EVIDENCE_AGE_SECONDS;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Verify one evidence record. Never throws: an artifact that cannot be
     * read is an unproven claim.
     *
     * @param successCriteria - The owning task's success criteria; falls back to the evidence claim.
     */
    async verify(evidence: Evidence, successCriteria?: string): Promise<VerificationResult> {
        const read = await this.readArtifact(evidence.location);
        if (!read.ok) {
            return { proven: false, reason: read.reason, detail: read.detail };
        }

        const artifact = read.fingerprint;
        const warning = artifact.ageSeconds > this.maxAgeSeconds
            ? `${evidence.location} is stale: ${artifact.ageSeconds}s old (max ${this.maxAgeSeconds}s)`
            : undefined;
        const extras = warning ? { artifact, warning } : { artifact };

        const marker = (successCriteria ?? evidence.claim).trim();
        const haystack = read.content.toLowerCase();

        if (!haystack.includes(marker.toLowerCase())) {
            return {
                proven: false,
                reason: 'criteria_not_found',
                detail: `${evidence.location} does not contain "${marker}"`,
                ...extras,
            };
        }

        const found = this.failureMarkers.find((m) => haystack.includes(m));
        if (found) {
            return {
                proven: false,
                reason: 'failure_marker_present',
                detail: `${evidence.location} contains failure marker "${found}"`,
                ...extras,
            };
        }

        return { proven: true, detail: `${evidence.location} contains "${marker}"`, ...extras };
    }

    private async readArtifact(location: string): Promise<ArtifactRead> {
        try {
            const [bytes, info] = await Promise.all([readFile(location), stat(location)]);
            const ageMs = Math.max(0, this.now().getTime() - info.mtime.getTime());
            return {
                ok: true,
                content: bytes.toString('utf-8'),
                fingerprint: {
                    sha256: createHash('sha256').update(bytes).digest('hex'),
                    ageSeconds: Math.floor(ageMs / 1000),
                },
            };
        } catch (err) {
            if (isMissingFileError(err)) {
                return { ok: false, reason: 'missing_file', detail: `artifact not found at ${location}` };
            }
            const message = err instanceof Error ? err.message : String(err);
            return { ok: false, reason: 'unreadable', detail: `cannot read ${location}: ${message}` };
        }
    }
}

function isMissingFileError(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR' || err.code === 'ENOTDIR');
}
