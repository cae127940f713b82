/**
 * Detached work tracker
 * Relay requests run outside the update handler; shutdown waits for them here.
 */

import { describeError, logger } from '@/lib/services/shared/logger';

export class TaskTracker {
    private readonly tasks = new Set<Promise<void>>();

    get size(): number {
        return this.tasks.size;
    }

    /**
     * Start `work` without awaiting it. Rejections are logged.
     */
    track(label: string, work: () => Promise<unknown>): void {
        const task = work()
            .then(() => undefined)
            .catch((error: unknown) => {
                logger.error('tasks', `${label} failed: ${describeError(error)}`);
            })
            .finally(() => {
                this.tasks.delete(task);
            });
        this.tasks.add(task);
    }

    /** Wait for everything currently running */
    async drain(): Promise<void> {
        while (this.tasks.size > 0) {
            await Promise.allSettled([...this.tasks]);
        }
    }
}
