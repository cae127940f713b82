/**
 * Greeted users
 * Append-only; only decides which /start greeting a user gets.
 */

export interface SeenUserStore {
    has(userId: number): boolean;
    add(userId: number): void;
}

export class MemorySeenUserStore implements SeenUserStore {
    private readonly users = new Set<number>();

    get size(): number {
        return this.users.size;
    }

    has(userId: number): boolean {
        return this.users.has(userId);
    }

    add(userId: number): void {
        this.users.add(userId);
    }
}
