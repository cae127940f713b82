/**
 * Download progress throttling
 *
 * Two independent cadences:
 * - ProgressThrottle gates user-visible status edits on a jittered time window
 * - ProgressMilestones emits operational log lines every N percentage points
 *
 * @module bot/utils/progress
 */

import { PROGRESS_LOG_STEP, PROGRESS_MAX_INTERVAL_MS, PROGRESS_MIN_INTERVAL_MS } from '../config';

export interface ProgressUpdate {
    downloaded: number;
    /** Declared size, null when the server sent no Content-Length */
    total: number | null;
    /** Whole percentage, null when total is unknown */
    percent: number | null;
}

export interface ProgressThrottleOptions {
    minIntervalMs?: number;
    maxIntervalMs?: number;
    now?: () => number;
    random?: () => number;
}

export function computePercent(downloaded: number, total: number | null): number | null {
    if (total === null || total <= 0) return null;
    return Math.min(100, Math.floor((downloaded * 100) / total));
}

export class ProgressThrottle {
    private readonly minIntervalMs: number;
    private readonly maxIntervalMs: number;
    private readonly now: () => number;
    private readonly random: () => number;

    private nextReportAt: number;
    private lastPercent: number | null = null;

    constructor(options: ProgressThrottleOptions = {}) {
        this.minIntervalMs = options.minIntervalMs ?? PROGRESS_MIN_INTERVAL_MS;
        this.maxIntervalMs = options.maxIntervalMs ?? PROGRESS_MAX_INTERVAL_MS;
        this.now = options.now ?? Date.now;
        this.random = options.random ?? Math.random;
        this.nextReportAt = this.now() + this.nextInterval();
    }

    /**
     * Returns the update to show, or null when it should be suppressed.
     * An unchanged percentage keeps the window open for the next chunk.
     */
    check(downloaded: number, total: number | null): ProgressUpdate | null {
        const now = this.now();
        if (now < this.nextReportAt) return null;

        const percent = computePercent(downloaded, total);
        if (percent !== null && percent === this.lastPercent) return null;

        this.lastPercent = percent;
        this.nextReportAt = now + this.nextInterval();
        return { downloaded, total: percent === null ? null : total, percent };
    }

    private nextInterval(): number {
        const span = this.maxIntervalMs - this.minIntervalMs;
        return this.minIntervalMs + Math.floor(this.random() * (span + 1));
    }
}

export class ProgressMilestones {
    private lastStep = 0;

    constructor(private readonly step: number = PROGRESS_LOG_STEP) {}

    /** Highest newly crossed boundary, or null */
    check(percent: number | null): number | null {
        if (percent === null) return null;
        const reached = Math.floor(percent / this.step) * this.step;
        if (reached <= this.lastStep) return null;
        this.lastStep = reached;
        return reached;
    }
}
