/**
 * Telegram Bot Main Entry
 *
 * Builds the bot with its middleware, dispatcher and relay services.
 * Transport (webhook or long polling) is chosen by the caller.
 *
 * @see https://grammy.dev/guide/deployment-types
 * @module bot
 */

import { Bot } from 'grammy';
import { sequentialize } from '@grammyjs/runner';
import type { UserFromGetMe } from 'grammy/types';

import type { AppConfig } from '@/lib/config';
import { BOT_COMMANDS } from './config';
import { UpdateDispatcher } from './dispatcher';
import { registerDispatcher } from './handlers';
import { log } from './helpers';
import { botSequenceKey, observerMiddleware } from './middleware';
import { TaskTracker, UpdateQueue } from './queue';
import { DeletionScheduler, FetchService, RelayService, ResolverService, createTelegramGateway } from './services';
import { MemorySeenUserStore, MemoryUserStateStore, type SeenUserStore, type UserStateStore } from './state';
import type { BotContext, ChatGateway } from './types';

// ============================================================================
// Types
// ============================================================================

export interface RelayBotOptions {
    store?: UserStateStore;
    seenUsers?: SeenUserStore;
    /** Skips the getMe call in `botInit` */
    botInfo?: UserFromGetMe;
    tempDir?: string;
}

export interface RelayBot {
    bot: Bot<BotContext>;
    gateway: ChatGateway;
    store: UserStateStore;
    seenUsers: SeenUserStore;
    dispatcher: UpdateDispatcher;
    scheduler: DeletionScheduler;
    tasks: TaskTracker;
    /** Webhook hand-off; unused in polling mode */
    updates: UpdateQueue;
}

// ============================================================================
// Factory
// ============================================================================

export function createRelayBot(config: AppConfig, options: RelayBotOptions = {}): RelayBot {
    const bot = new Bot<BotContext>(config.BOT_TOKEN, {
        botInfo: options.botInfo,
        client: config.BOT_API_ROOT ? { apiRoot: config.BOT_API_ROOT } : undefined,
    });

    const gateway = createTelegramGateway(bot.api);
    const store = options.store ?? new MemoryUserStateStore();
    const seenUsers = options.seenUsers ?? new MemorySeenUserStore();
    const scheduler = new DeletionScheduler((chatId, messageId) => gateway.deleteMessage(chatId, messageId));
    const tasks = new TaskTracker();
    const relay = new RelayService({
        gateway,
        resolver: new ResolverService(),
        fetcher: new FetchService(),
        scheduler,
        directUrlFirst: config.RELAY_DIRECT_URL,
        tempDir: options.tempDir,
    });
    const dispatcher = new UpdateDispatcher({ gateway, store, seenUsers, relay, tasks }, options.botInfo?.username);

    // 1. Per-user ordering
    bot.use(sequentialize(botSequenceKey));
    // 2. Observer
    bot.use(observerMiddleware);
    // 3. Commands and text
    registerDispatcher(bot, dispatcher);

    bot.catch((err) => {
        log.error(`Error while handling update ${err.ctx.update.update_id}`, err.error);
    });

    log.info('Bot instance created');
    return { bot, gateway, store, seenUsers, dispatcher, scheduler, tasks, updates: new UpdateQueue() };
}

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Fetch bot info, publish the command list and start the deletion drain loop
 */
export async function botInit(relayBot: RelayBot): Promise<void> {
    const { bot, dispatcher, scheduler } = relayBot;

    await bot.init();
    dispatcher.setBotUsername(bot.botInfo.username);

    try {
        await bot.api.setMyCommands(BOT_COMMANDS.map(({ command, description }) => ({ command, description })));
    } catch (error) {
        log.warn(`setMyCommands failed: ${String(error)}`);
    }

    scheduler.start();
    log.info(`Bot @${bot.botInfo.username} initialized`);
}

/**
 * Stop taking updates, wait for in-flight relays, then cancel pending deletions
 */
export async function botShutdown(relayBot: RelayBot): Promise<void> {
    await relayBot.updates.stop();
    if (relayBot.tasks.size > 0) {
        log.info(`Waiting for ${relayBot.tasks.size} relay request(s)`);
    }
    await relayBot.tasks.drain();
    await relayBot.scheduler.stop();
    log.info('Bot stopped');
}

// ============================================================================
// Re-exports
// ============================================================================

export { BOT_COMMANDS, MESSAGES } from './config';
export { UpdateDispatcher, classifyMessage, parseCommand } from './dispatcher';
export type { BotContext, ChatGateway, InboundMessage } from './types';
