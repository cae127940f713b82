/**
 * Plain text handler
 * Either stores a base URL or submits a link to the relay pipeline
 */

import { MESSAGES } from '../config';
import { log } from '../helpers';
import { botStateApplyText, type UserStateStore } from '../state';
import type { TaskTracker } from '../queue/taskTracker';
import type { RelayService } from '../services/relayService';
import type { ChatGateway, InboundMessage } from '../types';

export interface TextHandlerDeps {
    gateway: ChatGateway;
    store: UserStateStore;
    relay: Pick<RelayService, 'process'>;
    tasks: TaskTracker;
}

export async function botHandleText(message: InboundMessage, deps: TextHandlerDeps): Promise<void> {
    const { gateway, store, relay, tasks } = deps;
    const route = botStateApplyText(store, message.userId, message.text);

    switch (route.kind) {
        case 'base-url-saved':
            log.info(`User ${message.userId} set base URL ${route.baseUrl}`);
            await gateway.sendText(message.chatId, MESSAGES.BASE_URL_SAVED(route.baseUrl));
            return;

        case 'base-url-empty':
            await gateway.sendText(message.chatId, MESSAGES.BASE_URL_CLEARED);
            return;

        case 'base-url-required':
            await gateway.sendText(message.chatId, MESSAGES.BASE_URL_REQUIRED);
            return;

        case 'submission':
            // Detached so a long download never holds up this user's next update
            tasks.track(`relay ${message.chatId}/${message.messageId}`, () =>
                relay.process({
                    chatId: message.chatId,
                    userId: message.userId,
                    baseUrl: route.baseUrl,
                    link: route.link,
                    replyTo: message.messageId,
                })
            );
            return;
    }
}
