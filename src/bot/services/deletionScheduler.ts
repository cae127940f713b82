/**
 * Deferred Deletion Scheduler
 *
 * Timers never call Telegram themselves: when one fires it pushes a
 * DeletionTask onto a channel, and the bot's drain loop performs the delete
 * with a bounded wait. Failures are logged and dropped.
 *
 * Pending deletions live in memory only and are lost on restart.
 *
 * @module bot/services/deletionScheduler
 */

import { DeletionError } from '@/lib/errors';
import { withTimeout } from '@/lib/utils/retry';
import { describeError, logger } from '@/lib/services/shared/logger';
import { DELETE_HANDOFF_TIMEOUT_MS, RETENTION_MS } from '../config';
import { AsyncQueue } from '../queue/asyncQueue';
import type { DeletionTask, SentMessageRef } from '../types';

export type DeleteMessageFn = (chatId: number, messageId: number) => Promise<void>;

export interface DeletionSchedulerOptions {
    retentionMs?: number;
    handoffTimeoutMs?: number;
    now?: () => number;
}

function taskKey(ref: SentMessageRef): string {
    return `${ref.chatId}:${ref.messageId}`;
}

export class DeletionScheduler {
    private readonly channel = new AsyncQueue<DeletionTask>();
    private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
    private readonly retentionMs: number;
    private readonly handoffTimeoutMs: number;
    private readonly now: () => number;
    private draining: Promise<void> | null = null;

    constructor(private readonly deleteMessage: DeleteMessageFn, options: DeletionSchedulerOptions = {}) {
        this.retentionMs = options.retentionMs ?? RETENTION_MS;
        this.handoffTimeoutMs = options.handoffTimeoutMs ?? DELETE_HANDOFF_TIMEOUT_MS;
        this.now = options.now ?? Date.now;
    }

    /** Deletions waiting on their timer */
    get pending(): number {
        return this.timers.size;
    }

    /**
     * Register a one-shot deletion. Rescheduling the same message replaces the old timer.
     */
    schedule(ref: SentMessageRef, afterMs: number = this.retentionMs): DeletionTask {
        const task: DeletionTask = { chatId: ref.chatId, messageId: ref.messageId, fireAt: this.now() + afterMs };
        const key = taskKey(ref);

        const existing = this.timers.get(key);
        if (existing) clearTimeout(existing);

        const timer = setTimeout(() => {
            this.timers.delete(key);
            if (!this.channel.push(task)) {
                logger.debug('scheduler', `Dropped deletion ${key}: scheduler stopped`);
            }
        }, afterMs);
        timer.unref();
        this.timers.set(key, timer);

        logger.debug('scheduler', `Deletion of ${key} scheduled at ${new Date(task.fireAt).toISOString()}`);
        return task;
    }

    /** Start draining the channel on the caller's context */
    start(): void {
        if (this.draining) return;
        this.draining = this.drain();
    }

    /**
     * Perform one deletion. Never throws.
     */
    async execute(task: DeletionTask): Promise<boolean> {
        const key = taskKey(task);
        try {
            await withTimeout(
                this.deleteMessage(task.chatId, task.messageId),
                this.handoffTimeoutMs,
                `deletion hand-off exceeded ${this.handoffTimeoutMs}ms`
            );
            logger.info('scheduler', `Deleted message ${key}`);
            return true;
        } catch (error) {
            const failure = new DeletionError(`could not delete ${key}: ${describeError(error)}`, { cause: error });
            logger.warn('scheduler', failure.message);
            return false;
        }
    }

    /** Cancel pending timers and wait for the drain loop to finish */
    async stop(): Promise<void> {
        for (const timer of this.timers.values()) clearTimeout(timer);
        this.timers.clear();
        this.channel.close();
        await this.draining;
        this.draining = null;
    }

    private async drain(): Promise<void> {
        for await (const task of this.channel) {
            await this.execute(task);
        }
    }
}
