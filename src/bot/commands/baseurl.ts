/**
 * /baseurl command - the next plain text message becomes the resolver base URL
 */

import { MESSAGES } from '../config';
import { botStateBeginBaseUrlSetup } from '../state';
import type { CommandHandler } from './types';

export const botCommandBaseUrl: CommandHandler = async (message, { gateway, store }) => {
    botStateBeginBaseUrlSetup(store, message.userId);
    await gateway.sendText(message.chatId, MESSAGES.ASK_BASE_URL);
};
