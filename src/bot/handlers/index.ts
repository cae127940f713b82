/**
 * Bot Handlers Exports
 *
 * Usage:
 * ```typescript
 * import { registerDispatcher } from '@/bot/handlers';
 *
 * registerDispatcher(bot, dispatcher);
 * ```
 */

import type { Bot } from 'grammy';
import type { Message, User } from 'grammy/types';

import type { UpdateDispatcher } from '../dispatcher';
import type { BotContext, InboundMessage } from '../types';

export { botHandleText, type TextHandlerDeps } from './text';

/**
 * Normalize a Telegram text message. Null when there is no sender.
 */
export function toInboundMessage(from: User | undefined, message: Message & { text: string }): InboundMessage | null {
    if (!from) return null;
    return {
        userId: from.id,
        chatId: message.chat.id,
        messageId: message.message_id,
        text: message.text,
    };
}

/**
 * Route every text message through the dispatcher
 */
export function registerDispatcher(bot: Bot<BotContext>, dispatcher: UpdateDispatcher): void {
    bot.on('message:text', async (ctx) => {
        const message = toInboundMessage(ctx.from, ctx.message);
        if (!message) return;
        await dispatcher.dispatch(message);
    });
}
