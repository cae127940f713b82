/**
 * /status command - shows the caller's base URL and whether the bot is waiting for one
 */

import { MESSAGES } from '../config';
import type { CommandHandler } from './types';

export const botCommandStatus: CommandHandler = async (message, { gateway, store }) => {
    const config = store.get(message.userId);
    await gateway.sendText(message.chatId, MESSAGES.STATUS(config.baseUrl, config.awaitingBaseUrl));
};
