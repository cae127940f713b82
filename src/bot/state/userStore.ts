/**
 * Per-User State Store
 * Keyed by Telegram user ID. Absence means the initial state.
 */

import type { UserConfig } from '../types';

export interface UserStateStore {
    /** Current config; a fresh default for unknown users */
    get(userId: number): UserConfig;
    set(userId: number, config: UserConfig): void;
    clear(userId: number): void;
}

const INITIAL_CONFIG: UserConfig = { awaitingBaseUrl: false };

/**
 * In-memory store. Lost on restart.
 */
export class MemoryUserStateStore implements UserStateStore {
    private readonly users = new Map<number, UserConfig>();

    get size(): number {
        return this.users.size;
    }

    get(userId: number): UserConfig {
        const config = this.users.get(userId);
        return config ? { ...config } : { ...INITIAL_CONFIG };
    }

    set(userId: number, config: UserConfig): void {
        if (!config.baseUrl && !config.awaitingBaseUrl) {
            this.users.delete(userId);
            return;
        }
        this.users.set(userId, { ...config });
    }

    clear(userId: number): void {
        this.users.delete(userId);
    }
}
