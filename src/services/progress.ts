import { DEFAULT_PROGRESS_INTERVAL_MS } from '@/constants/map';
import type { ProgressEvent, ProgressPhase, ProgressReporter } from '@/types';

/**
 * Forwards at most one event per phase every `intervalMs`. The event that
 * reaches fraction 1 is always forwarded.
 */
export class ThrottledProgress {
    private readonly reporter: ProgressReporter;
    private readonly intervalMs: number;
    private readonly now: () => number;
    private readonly lastSent = new Map<ProgressPhase, number>();

    constructor(
        reporter: ProgressReporter,
        intervalMs: number = DEFAULT_PROGRESS_INTERVAL_MS,
        now: () => number = Date.now,
    ) {
        this.reporter = reporter;
        this.intervalMs = intervalMs;
        this.now = now;
    }

    report(event: ProgressEvent): void {
        const fraction = Math.min(1, Math.max(0, event.fraction));
        const current = this.now();
        const last = this.lastSent.get(event.phase);
        const isFinal = fraction >= 1;
        if (!isFinal && last !== undefined && current - last < this.intervalMs) {
            return;
        }
        this.lastSent.set(event.phase, current);
        this.reporter({ ...event, fraction });
    }

    /** Convenience for counted work: `done` of `total` items. */
    step(phase: ProgressPhase, done: number, total: number, message?: string): void {
        this.report({ phase, fraction: total > 0 ? done / total : 1, message });
    }
}
