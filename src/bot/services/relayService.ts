/**
 * Relay Pipeline
 *
 * resolve → (direct URL send | download + upload) → schedule deletion
 *
 * The two send strategies are chained by `relayWithFallback`; each returns a
 * typed result instead of throwing. One status message per request is edited
 * in place and deleted on success.
 *
 * @module bot/services/relayService
 */

import { randomUUID } from 'crypto';
import { rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import {
    RelayError,
    RelayErrorCode,
    ResolveError,
    UploadError,
    toRelayError,
} from '@/lib/errors';
import { describeError, logger } from '@/lib/services/shared/logger';
import { MESSAGES } from '../config';
import { StatusMessage } from '../helpers/message';
import { buildCaption, formatProgress } from '../utils/format';
import type { ChatGateway, ResolvedMedia, SentMessageRef } from '../types';
import type { DeletionScheduler } from './deletionScheduler';
import type { FetchService } from './fetchService';
import type { ResolverService } from './resolverService';

// ============================================================================
// Types
// ============================================================================

export type RelayStrategyName = 'direct' | 'download';

export type RelayResult =
    | { success: true; strategy: RelayStrategyName; message: SentMessageRef }
    | { success: false; strategy: RelayStrategyName; error: RelayError };

/** Everything a strategy needs for one request */
export interface RelayJob {
    chatId: number;
    media: ResolvedMedia;
    caption: string;
    status: StatusMessage;
}

export interface RelayStrategy {
    readonly name: RelayStrategyName;
    run(job: RelayJob): Promise<RelayResult>;
}

export interface RelayRequest {
    chatId: number;
    userId: number;
    baseUrl: string;
    link: string;
    /** User message the status message replies to */
    replyTo?: number;
}

export type RelayOutcome =
    | { success: true; message: SentMessageRef; strategy: RelayStrategyName }
    | { success: false; error: RelayError };

// ============================================================================
// Fallback combinator
// ============================================================================

/**
 * Run strategies in order until one succeeds. `onFallback` sees every failure
 * that is followed by another strategy; the last failure is returned as is.
 */
export async function relayWithFallback(
    strategies: readonly RelayStrategy[],
    job: RelayJob,
    onFallback?: (failed: RelayResult, next: RelayStrategy) => void | Promise<void>
): Promise<RelayResult> {
    if (strategies.length === 0) {
        throw new Error('relayWithFallback needs at least one strategy');
    }

    let result: RelayResult | null = null;
    for (const [index, strategy] of strategies.entries()) {
        result = await strategy.run(job);
        if (result.success) return result;

        const next = strategies[index + 1];
        if (next) await onFallback?.(result, next);
    }
    return result ?? { success: false, strategy: strategies[0].name, error: new UploadError('no strategy ran') };
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * Hand the remote URL straight to Telegram; no local copy.
 */
export class DirectUrlStrategy implements RelayStrategy {
    readonly name = 'direct' as const;

    constructor(private readonly gateway: ChatGateway) {}

    async run(job: RelayJob): Promise<RelayResult> {
        await job.status.update(MESSAGES.SENDING_DIRECT);
        try {
            const messageId = await this.gateway.sendVideo(
                job.chatId,
                { kind: 'url', url: job.media.directUrl },
                job.caption
            );
            return { success: true, strategy: this.name, message: { chatId: job.chatId, messageId } };
        } catch (error) {
            logger.debug('relay', `Direct send rejected: ${describeError(error)}`);
            return { success: false, strategy: this.name, error: new UploadError(describeError(error), { cause: error }) };
        }
    }
}

/**
 * Download into a fresh temp file, upload it, and always remove the file.
 */
export class DownloadUploadStrategy implements RelayStrategy {
    readonly name = 'download' as const;

    constructor(
        private readonly gateway: ChatGateway,
        private readonly fetcher: FetchService,
        private readonly tempDir: string = os.tmpdir()
    ) {}

    async run(job: RelayJob): Promise<RelayResult> {
        const tempPath = await botRelayCreateTempFile(this.tempDir);
        try {
            return await this.transfer(job, tempPath);
        } finally {
            await botRelayRemoveTempFile(tempPath);
        }
    }

    private async transfer(job: RelayJob, tempPath: string): Promise<RelayResult> {
        await job.status.update(MESSAGES.DOWNLOADING);

        try {
            await this.fetcher.fetchToFile(job.media.directUrl, tempPath, {
                onProgress: async (update) => {
                    await job.status.update(MESSAGES.DOWNLOAD_PROGRESS(formatProgress(update)));
                },
                onRetry: async (attempt) => {
                    await job.status.update(
                        MESSAGES.RETRYING(attempt, this.fetcher.attemptBudget, this.fetcher.retryDelaySeconds)
                    );
                },
            });
        } catch (error) {
            return { success: false, strategy: this.name, error: toRelayError(error) };
        }

        await job.status.update(MESSAGES.UPLOADING);
        try {
            const messageId = await this.gateway.sendVideo(job.chatId, { kind: 'file', path: tempPath }, job.caption);
            return { success: true, strategy: this.name, message: { chatId: job.chatId, messageId } };
        } catch (error) {
            return { success: false, strategy: this.name, error: new UploadError(describeError(error), { cause: error }) };
        }
    }
}

// ============================================================================
// Temp files
// ============================================================================

/**
 * Create an empty, uniquely named .mp4 file owned by one request
 */
export async function botRelayCreateTempFile(dir: string = os.tmpdir()): Promise<string> {
    const tempPath = path.join(dir, `relay-${randomUUID()}.mp4`);
    await writeFile(tempPath, '', { flag: 'wx' });
    return tempPath;
}

/**
 * Remove a temp file. Errors are logged, never thrown, so they cannot mask
 * the error being reported.
 */
export async function botRelayRemoveTempFile(tempPath: string): Promise<boolean> {
    try {
        await rm(tempPath, { force: true });
        return true;
    } catch (error) {
        logger.error('relay', error, 'CLEANUP');
        return false;
    }
}

// ============================================================================
// Error text
// ============================================================================

export function botRelayErrorMessage(error: RelayError): string {
    switch (error.code) {
        case RelayErrorCode.RESOLVE_FAILED:
            // A bad payload keeps the fixed text; request failures carry their cause
            return error instanceof ResolveError && error.source === 'payload'
                ? MESSAGES.RESOLVE_FAILED
                : MESSAGES.RESOLVE_UNREACHABLE(error.message);
        case RelayErrorCode.TOO_LARGE:
            return MESSAGES.TOO_LARGE;
        case RelayErrorCode.DOWNLOAD_FAILED:
            return MESSAGES.DOWNLOAD_FAILED(error.message);
        case RelayErrorCode.UPLOAD_FAILED:
            return MESSAGES.UPLOAD_FAILED(error.message);
        default:
            return MESSAGES.UNEXPECTED_ERROR(error.message);
    }
}

// ============================================================================
// Pipeline
// ============================================================================

export interface RelayServiceDeps {
    gateway: ChatGateway;
    resolver: ResolverService;
    fetcher: FetchService;
    scheduler: DeletionScheduler;
    /** Try the direct-URL strategy before downloading */
    directUrlFirst?: boolean;
    tempDir?: string;
}

export class RelayService {
    private readonly gateway: ChatGateway;
    private readonly resolver: ResolverService;
    private readonly scheduler: DeletionScheduler;
    private readonly strategies: readonly RelayStrategy[];

    constructor(deps: RelayServiceDeps) {
        this.gateway = deps.gateway;
        this.resolver = deps.resolver;
        this.scheduler = deps.scheduler;

        const download = new DownloadUploadStrategy(deps.gateway, deps.fetcher, deps.tempDir);
        this.strategies = (deps.directUrlFirst ?? true)
            ? [new DirectUrlStrategy(deps.gateway), download]
            : [download];
    }

    /**
     * Run one request end to end. Never throws: every failure ends up in the
     * status message and in the returned outcome.
     */
    async process(request: RelayRequest): Promise<RelayOutcome> {
        const { chatId, userId } = request;
        logger.info('relay', `Request from user ${userId} in chat ${chatId}`);

        let status: StatusMessage;
        try {
            status = await StatusMessage.open(this.gateway, chatId, MESSAGES.PROCESSING, request.replyTo);
        } catch (error) {
            logger.error('relay', error, 'STATUS');
            return { success: false, error: toRelayError(error, RelayErrorCode.UPLOAD_FAILED) };
        }

        try {
            return await this.run(request, status);
        } catch (error) {
            const failure = toRelayError(error);
            logger.error('relay', failure, 'UNEXPECTED');
            await status.update(MESSAGES.UNEXPECTED_ERROR(failure.message));
            return { success: false, error: failure };
        }
    }

    private async run(request: RelayRequest, status: StatusMessage): Promise<RelayOutcome> {
        let media: ResolvedMedia;
        try {
            media = await this.resolver.resolve(request.baseUrl, request.link);
        } catch (error) {
            const failure = error instanceof ResolveError
                ? error
                : new ResolveError(describeError(error), { cause: error });
            logger.error('relay', failure, 'RESOLVE');
            await status.update(botRelayErrorMessage(failure));
            return { success: false, error: failure };
        }

        const job: RelayJob = { chatId: request.chatId, media, caption: buildCaption(media), status };
        const result = await relayWithFallback(this.strategies, job, async (failed) => {
            logger.info('relay', `Strategy ${failed.strategy} failed, falling back`);
            await status.update(MESSAGES.DIRECT_FALLBACK);
        });

        if (!result.success) {
            logger.error('relay', result.error, result.error.code);
            await status.update(botRelayErrorMessage(result.error));
            return { success: false, error: result.error };
        }

        this.scheduler.schedule(result.message);
        await status.remove();
        logger.success('relay', `Sent "${media.displayName}" via ${result.strategy} to chat ${request.chatId}`);
        return { success: true, message: result.message, strategy: result.strategy };
    }
}
