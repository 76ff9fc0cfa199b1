/**
 * Liveness monitor — periodically re-checks the current stage's latest batch.
 *
 * Dependency direction: liveness.ts → gate/engine, collaborators/types
 * Used by: orchestrator
 */

import type { Timer, TimerHandle } from '../../collaborators/types.js';
import type { GateDecision } from '../gate/engine.js';
import { logger } from '../../utils/logger.js';

/** Produces a side-effect-free gate decision for the current batch, or null when there is none. */
export type LivenessCheck = () => Promise<GateDecision | null>;

export class LivenessMonitor {
    private handle: TimerHandle | null = null;
    private running = false;
    private lastReport: string | null = null;

    constructor(
        private readonly timer: Timer,
        private readonly intervalMs: number,
        private readonly check: LivenessCheck,
    ) {}

    start(): void {
        if (this.handle) return;
        this.handle = this.timer.every(this.intervalMs, () => this.tick());
    }

    stop(): void {
        this.handle?.cancel();
        this.handle = null;
    }

    /** Report of the last check that would not proceed. */
    get latestReport(): string | null {
        return this.lastReport;
    }

    /** Run one check. Overlapping ticks are skipped. */
    async tick(): Promise<void> {
        if (this.running) return;
        this.running = true;
        try {
            const decision = await this.check();
            if (decision && decision.action !== 'PROCEED') {
                this.lastReport = decision.report ?? null;
                logger.warn(`Liveness check: ${decision.stage} would ${decision.action}`);
                if (decision.report) logger.info(decision.report);
            }
        } catch (err) {
            logger.warn(`Liveness check failed: ${err instanceof Error ? err.message : String(err)}`);
        } finally {
            this.running = false;
        }
    }
}
