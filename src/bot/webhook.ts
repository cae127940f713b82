/**
 * Webhook registration
 * Shared by startup and the set/delete scripts.
 */

import type { Api } from 'grammy';

import { log } from './helpers';

/**
 * Delete any existing webhook, then point Telegram at `url`
 */
export async function botWebhookReset(api: Api, url: string, secretToken?: string): Promise<void> {
    await api.deleteWebhook();
    await api.setWebhook(url, { secret_token: secretToken });
    log.info(`Webhook set to ${url}${secretToken ? ' (secret token enabled)' : ''}`);
}

export async function botWebhookDelete(api: Api): Promise<void> {
    await api.deleteWebhook();
    log.info('Webhook deleted');
}
