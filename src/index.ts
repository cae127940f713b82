/**
 * Relay bot entry point
 *
 * WEBHOOK_URL set   → HTTP server on PORT, updates arrive via POST /webhook
 * WEBHOOK_URL unset → long polling through @grammyjs/runner
 */

import 'dotenv/config';
import { run, type RunnerHandle } from '@grammyjs/runner';
import type { ServerType } from '@hono/node-server';

import { createServerApp, startServer, stopServer } from '@/app/server';
import { botInit, botShutdown, createRelayBot, type RelayBot } from '@/bot';
import { botWebhookReset } from '@/bot/webhook';
import { loadConfig, type AppConfig } from '@/lib/config';
import { logger, maskSecret } from '@/lib/services/shared/logger';
import { setupGracefulShutdown } from '@/lib/shutdown';

function logEnvSummary(config: AppConfig): void {
    logger.info('startup', 'Starting service');
    logger.info(
        'startup',
        `Env summary: PORT=${config.PORT}, LOG_LEVEL=${config.LOG_LEVEL}, ` +
            `MODE=${config.WEBHOOK_URL ? 'webhook' : 'polling'}, ` +
            `RELAY_DIRECT_URL=${config.RELAY_DIRECT_URL}, BOT_TOKEN=${maskSecret(config.BOT_TOKEN)}`
    );
}

async function startWebhookMode(relayBot: RelayBot, config: AppConfig, webhookUrl: string): Promise<ServerType> {
    const { bot, updates } = relayBot;
    updates.start((update) => bot.handleUpdate(update));

    const app = createServerApp({
        enqueue: (update) => updates.enqueue(update),
        secretToken: config.WEBHOOK_SECRET,
    });
    const server = startServer(app, config.PORT);

    try {
        await botWebhookReset(bot.api, webhookUrl, config.WEBHOOK_SECRET);
    } catch (error) {
        logger.error('startup', error, 'SET_WEBHOOK');
    }
    return server;
}

function startPollingMode(relayBot: RelayBot): RunnerHandle {
    const runner = run(relayBot.bot);
    logger.info('startup', 'Long polling started');
    return runner;
}

async function main(): Promise<void> {
    const config = loadConfig();
    logEnvSummary(config);

    const relayBot = createRelayBot(config);
    await botInit(relayBot);

    let server: ServerType | null = null;
    let runner: RunnerHandle | null = null;

    if (config.WEBHOOK_URL) {
        server = await startWebhookMode(relayBot, config, config.WEBHOOK_URL);
    } else {
        await relayBot.bot.api.deleteWebhook();
        runner = startPollingMode(relayBot);
    }

    setupGracefulShutdown(async () => {
        if (server) await stopServer(server);
        if (runner?.isRunning()) await runner.stop();
        await botShutdown(relayBot);
    });
}

main().catch((error: unknown) => {
    logger.error('startup', error, 'FATAL');
    process.exit(1);
});
