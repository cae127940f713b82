/**
 * Remove the webhook so the bot can long-poll
 *
 * Usage: npm run webhook:delete
 */

import 'dotenv/config';
import { Api } from 'grammy';

import { loadConfig } from '@/lib/config';
import { logger } from '@/lib/services/shared/logger';
import { botWebhookDelete } from '@/bot/webhook';

async function main(): Promise<void> {
    const config = loadConfig();
    const api = new Api(config.BOT_TOKEN, config.BOT_API_ROOT ? { apiRoot: config.BOT_API_ROOT } : undefined);
    await botWebhookDelete(api);
}

main().catch((error: unknown) => {
    logger.error('webhook', error, 'DELETE_WEBHOOK');
    process.exitCode = 1;
});
