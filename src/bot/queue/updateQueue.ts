/**
 * Webhook → bot hand-off
 * The HTTP route only enqueues. The drain loop starts each update without
 * awaiting it; per-user ordering is left to the bot's `sequentialize`.
 */

import type { Update } from 'grammy/types';

import { AsyncQueue } from './asyncQueue';
import { TaskTracker } from './taskTracker';

export type UpdateHandler = (update: Update) => Promise<void>;

export class UpdateQueue {
    private readonly channel = new AsyncQueue<Update>();
    private readonly inFlight = new TaskTracker();
    private draining: Promise<void> | null = null;

    get size(): number {
        return this.channel.size;
    }

    /** Updates handed to the handler that have not settled yet */
    get active(): number {
        return this.inFlight.size;
    }

    /** False once the queue is stopped */
    enqueue(update: Update): boolean {
        return this.channel.push(update);
    }

    start(handler: UpdateHandler): void {
        if (this.draining) return;
        this.draining = this.drain(handler);
    }

    /** Stop accepting updates, then finish the queued and in-flight ones */
    async stop(): Promise<void> {
        this.channel.close();
        await this.draining;
        await this.inFlight.drain();
        this.draining = null;
    }

    private async drain(handler: UpdateHandler): Promise<void> {
        for await (const update of this.channel) {
            this.inFlight.track(`Update ${update.update_id}`, () => handler(update));
        }
    }
}
