import type { SeenUserStore, UserStateStore } from '../state';
import type { ChatGateway, InboundMessage } from '../types';

export interface CommandDeps {
    gateway: ChatGateway;
    store: UserStateStore;
    seenUsers: SeenUserStore;
}

export type CommandHandler = (message: InboundMessage, deps: CommandDeps) => Promise<void>;
