/**
 * Point Telegram at WEBHOOK_URL
 *
 * Usage: npm run webhook:set
 */

import 'dotenv/config';
import { Api } from 'grammy';

import { loadConfig } from '@/lib/config';
import { logger } from '@/lib/services/shared/logger';
import { botWebhookReset } from '@/bot/webhook';

async function main(): Promise<void> {
    const config = loadConfig();
    if (!config.WEBHOOK_URL) {
        throw new Error('WEBHOOK_URL is not set');
    }

    const api = new Api(config.BOT_TOKEN, config.BOT_API_ROOT ? { apiRoot: config.BOT_API_ROOT } : undefined);
    await botWebhookReset(api, config.WEBHOOK_URL, config.WEBHOOK_SECRET);
}

main().catch((error: unknown) => {
    logger.error('webhook', error, 'SET_WEBHOOK');
    process.exitCode = 1;
});
