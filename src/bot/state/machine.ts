/**
 * Per-User State Machine
 *
 *   NORMAL --/baseurl--> AWAITING_BASE_URL
 *   AWAITING_BASE_URL --text--> NORMAL   (text stored as base URL)
 *   ANY --/stop--> NORMAL                (base URL cleared)
 *   NORMAL --text--> submission, if a base URL is configured
 *
 * @module bot/state/machine
 */

import type { UserStateStore } from './userStore';

export enum UserState {
    NORMAL = 'NORMAL',
    AWAITING_BASE_URL = 'AWAITING_BASE_URL',
}

/** Outcome of one plain text message */
export type TextRoute =
    | { kind: 'base-url-saved'; baseUrl: string }
    | { kind: 'base-url-empty' }
    | { kind: 'submission'; baseUrl: string; link: string }
    | { kind: 'base-url-required' };

export function botStateOf(store: UserStateStore, userId: number): UserState {
    return store.get(userId).awaitingBaseUrl ? UserState.AWAITING_BASE_URL : UserState.NORMAL;
}

/** Trim, then strip every trailing slash */
export function normalizeBaseUrl(text: string): string {
    return text.trim().replace(/\/+$/, '');
}

export function botStateBeginBaseUrlSetup(store: UserStateStore, userId: number): void {
    const config = store.get(userId);
    store.set(userId, { ...config, awaitingBaseUrl: true });
}

export function botStateStop(store: UserStateStore, userId: number): void {
    store.clear(userId);
}

/**
 * Apply one plain text message. Exactly one transition per call.
 */
export function botStateApplyText(store: UserStateStore, userId: number, text: string): TextRoute {
    const config = store.get(userId);

    if (config.awaitingBaseUrl) {
        const baseUrl = normalizeBaseUrl(text);
        store.set(userId, { baseUrl: baseUrl || undefined, awaitingBaseUrl: false });
        return baseUrl ? { kind: 'base-url-saved', baseUrl } : { kind: 'base-url-empty' };
    }

    if (!config.baseUrl) {
        return { kind: 'base-url-required' };
    }
    return { kind: 'submission', baseUrl: config.baseUrl, link: text.trim() };
}
