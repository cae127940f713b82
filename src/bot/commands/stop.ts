/**
 * /stop command - clear the base URL from any state
 *
 * Requests already in flight keep running; they captured the base URL when they started.
 */

import { MESSAGES } from '../config';
import { botStateStop } from '../state';
import { log } from '../helpers';
import type { CommandHandler } from './types';

export const botCommandStop: CommandHandler = async (message, { gateway, store }) => {
    botStateStop(store, message.userId);
    log.debug(`Base URL cleared for user ${message.userId}`);
    await gateway.sendText(message.chatId, MESSAGES.BASE_URL_CLEARED);
};
