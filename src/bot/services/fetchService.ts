/**
 * Streaming Fetcher
 *
 * Downloads a media URL into a caller-owned file:
 * - bounded retry with a fixed pause, each attempt restarting at byte 0
 * - Content-Length guard against the upload ceiling (never retried)
 * - throttled progress callback plus 10% log milestones
 *
 * The destination is never deleted here; cleanup belongs to the caller.
 *
 * @module bot/services/fetchService
 */

import { open, type FileHandle } from 'fs/promises';
import type { Readable } from 'stream';
import type { AxiosInstance } from 'axios';

import { httpClient } from '@/lib/http/client';
import { DownloadError, TooLargeError } from '@/lib/errors';
import { withRetry, sleep } from '@/lib/utils/retry';
import { describeError, logger } from '@/lib/services/shared/logger';
import {
    DOWNLOAD_TIMEOUT_MS,
    FETCH_ATTEMPTS,
    FETCH_RETRY_DELAY_MS,
    MAX_UPLOAD_BYTES,
} from '../config';
import {
    ProgressMilestones,
    ProgressThrottle,
    computePercent,
    type ProgressThrottleOptions,
    type ProgressUpdate,
} from '../utils/progress';
import { formatBytes } from '../utils/format';

// ============================================================================
// Types
// ============================================================================

export interface FetchCallbacks {
    /** Throttled, user-visible progress */
    onProgress?: (update: ProgressUpdate) => void | Promise<void>;
    /** Called after a failed attempt, before the pause */
    onRetry?: (attempt: number, error: unknown) => void | Promise<void>;
    /** Called once when the attempt budget is exhausted */
    onFailure?: (error: DownloadError) => void | Promise<void>;
}

export interface FetchServiceOptions {
    client?: AxiosInstance;
    attempts?: number;
    retryDelayMs?: number;
    timeoutMs?: number;
    maxBytes?: number;
    sleep?: (ms: number) => Promise<void>;
    throttle?: ProgressThrottleOptions;
}

/** Per-attempt counters */
interface TransferState {
    downloaded: number;
    total: number | null;
    throttle: ProgressThrottle;
    milestones: ProgressMilestones;
}

// ============================================================================
// Helpers
// ============================================================================

export function parseContentLength(value: unknown): number | null {
    const raw = Array.isArray(value) ? value[0] : value;
    if (typeof raw !== 'string' && typeof raw !== 'number') return null;
    const size = typeof raw === 'number' ? raw : parseInt(raw, 10);
    return Number.isFinite(size) && size >= 0 ? size : null;
}

function toBuffer(chunk: unknown): Buffer {
    if (Buffer.isBuffer(chunk)) return chunk;
    if (chunk instanceof Uint8Array) return Buffer.from(chunk);
    return Buffer.from(String(chunk));
}

class HttpStatusError extends Error {
    constructor(readonly status: number) {
        super(`HTTP ${status}`);
        this.name = 'HttpStatusError';
    }
}

// ============================================================================
// Fetcher
// ============================================================================

export class FetchService {
    private readonly client: AxiosInstance;
    private readonly attempts: number;
    private readonly retryDelayMs: number;
    private readonly timeoutMs: number;
    private readonly maxBytes: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly throttleOptions: ProgressThrottleOptions;

    constructor(options: FetchServiceOptions = {}) {
        this.client = options.client ?? httpClient;
        this.attempts = options.attempts ?? FETCH_ATTEMPTS;
        this.retryDelayMs = options.retryDelayMs ?? FETCH_RETRY_DELAY_MS;
        this.timeoutMs = options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;
        this.maxBytes = options.maxBytes ?? MAX_UPLOAD_BYTES;
        this.sleep = options.sleep ?? sleep;
        this.throttleOptions = options.throttle ?? {};
    }

    get attemptBudget(): number {
        return this.attempts;
    }

    get retryDelaySeconds(): number {
        return Math.round(this.retryDelayMs / 1000);
    }

    /**
     * Download `url` into `destination`.
     * Resolves with the byte count; rejects with TooLargeError or DownloadError.
     */
    async fetchToFile(url: string, destination: string, callbacks: FetchCallbacks = {}): Promise<number> {
        try {
            return await withRetry((attempt) => this.attempt(url, destination, attempt, callbacks), {
                attempts: this.attempts,
                delayMs: this.retryDelayMs,
                isRetryable: (error) => !(error instanceof TooLargeError),
                sleep: this.sleep,
                onRetry: async (attempt, error) => {
                    logger.warn('fetch', `Attempt ${attempt}/${this.attempts} failed: ${describeError(error)}`);
                    await callbacks.onRetry?.(attempt, error);
                },
            });
        } catch (error) {
            if (error instanceof TooLargeError) {
                logger.warn('fetch', `Rejected: ${error.message}`);
                throw error;
            }
            const failure = new DownloadError(describeError(error), { cause: error });
            logger.error('fetch', failure, 'DOWNLOAD');
            await callbacks.onFailure?.(failure);
            throw failure;
        }
    }

    private async attempt(
        url: string,
        destination: string,
        attempt: number,
        callbacks: FetchCallbacks
    ): Promise<number> {
        logger.debug('fetch', `Attempt ${attempt}/${this.attempts}: ${url.substring(0, 100)}`);

        const response = await this.client.get<Readable>(url, {
            responseType: 'stream',
            signal: AbortSignal.timeout(this.timeoutMs),
        });
        const body = response.data;

        if (response.status < 200 || response.status >= 300) {
            body.destroy();
            throw new HttpStatusError(response.status);
        }

        const total = parseContentLength(response.headers['content-length']);
        if (total !== null && total > this.maxBytes) {
            body.destroy();
            throw new TooLargeError(total, this.maxBytes);
        }

        const state: TransferState = {
            downloaded: 0,
            total,
            throttle: new ProgressThrottle(this.throttleOptions),
            milestones: new ProgressMilestones(),
        };

        let file: FileHandle | undefined;
        try {
            file = await open(destination, 'w');
            for await (const chunk of body) {
                const buffer = toBuffer(chunk);
                state.downloaded += buffer.length;
                if (state.downloaded > this.maxBytes) {
                    throw new TooLargeError(state.downloaded, this.maxBytes);
                }
                await file.write(buffer);
                await this.reportProgress(state, callbacks);
            }
        } finally {
            body.destroy();
            await file?.close();
        }

        logger.success('fetch', `Downloaded ${formatBytes(state.downloaded)}`);
        return state.downloaded;
    }

    private async reportProgress(state: TransferState, callbacks: FetchCallbacks): Promise<void> {
        const milestone = state.milestones.check(computePercent(state.downloaded, state.total));
        if (milestone !== null && state.total !== null) {
            logger.progress('fetch', milestone, `${formatBytes(state.downloaded)} / ${formatBytes(state.total)}`);
        }

        const update = state.throttle.check(state.downloaded, state.total);
        if (update && callbacks.onProgress) {
            await callbacks.onProgress(update);
        }
    }
}
