/**
 * /start command - liveness check plus usage; returning users get a short banner
 */

import { MESSAGES } from '../config';
import type { CommandHandler } from './types';

export const botCommandStart: CommandHandler = async (message, { gateway, seenUsers }) => {
    if (seenUsers.has(message.userId)) {
        await gateway.sendText(message.chatId, `${MESSAGES.ACTIVE}\n\n${MESSAGES.WELCOME_BACK}`);
        return;
    }
    seenUsers.add(message.userId);
    await gateway.sendText(message.chatId, `${MESSAGES.ACTIVE}\n\n${MESSAGES.WELCOME}`);
};
