/**
 * Async Queue
 * Unbounded in-process channel: producers push, one consumer iterates.
 *
 * Used for the webhook → bot hand-off and for deletion requests fired by timers.
 */

export class AsyncQueue<T> implements AsyncIterable<T> {
    private readonly items: T[] = [];
    private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
    private closed = false;

    get size(): number {
        return this.items.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /** Returns false once the queue is closed */
    push(item: T): boolean {
        if (this.closed) return false;
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
        } else {
            this.items.push(item);
        }
        return true;
    }

    /** Stop accepting items; the consumer still drains what is buffered */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const waiter of this.waiters.splice(0)) {
            waiter({ value: undefined, done: true });
        }
    }

    next(): Promise<IteratorResult<T, undefined>> {
        if (this.items.length > 0) {
            const [value] = this.items.splice(0, 1);
            return Promise.resolve({ value, done: false });
        }
        if (this.closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => this.waiters.push(resolve));
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return { next: () => this.next() };
    }
}
