/**
 * Update Dispatcher
 *
 * Classifies a text message as one of the bot commands or plain text.
 * Commands always win, even while the user is expected to send a base URL.
 *
 * @module bot/dispatcher
 */

import { COMMAND_HANDLERS, type CommandDeps } from './commands';
import { BOT_COMMANDS, MESSAGES, type BotCommandName } from './config';
import { botHandleText, type TextHandlerDeps } from './handlers/text';
import { log } from './helpers';
import type { InboundMessage } from './types';

// ============================================================================
// Classification
// ============================================================================

export interface ParsedCommand {
    name: string;
    /** `@username` suffix, lowercased, if present */
    target?: string;
}

export type Classification =
    | { kind: 'command'; command: BotCommandName }
    | { kind: 'unknown-command'; name: string }
    | { kind: 'foreign-command' }
    | { kind: 'text' };

const COMMAND_NAMES = new Set<string>(BOT_COMMANDS.map(c => c.command));

function isBotCommand(name: string): name is BotCommandName {
    return COMMAND_NAMES.has(name);
}

/**
 * `/name@bot args` → { name, target }. Null when the text is not a command.
 */
export function parseCommand(text: string): ParsedCommand | null {
    const match = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s|$)/.exec(text.trimStart());
    if (!match) return null;
    return { name: match[1].toLowerCase(), target: match[2]?.toLowerCase() };
}

export function classifyMessage(text: string, botUsername?: string): Classification {
    const parsed = parseCommand(text);
    if (!parsed) return { kind: 'text' };

    if (parsed.target && botUsername && parsed.target !== botUsername.toLowerCase()) {
        return { kind: 'foreign-command' };
    }
    return isBotCommand(parsed.name)
        ? { kind: 'command', command: parsed.name }
        : { kind: 'unknown-command', name: parsed.name };
}

// ============================================================================
// Dispatcher
// ============================================================================

export type DispatcherDeps = TextHandlerDeps & CommandDeps;

export class UpdateDispatcher {
    constructor(
        private readonly deps: DispatcherDeps,
        private botUsername?: string
    ) {}

    /** Set once the bot knows its own username */
    setBotUsername(username: string): void {
        this.botUsername = username;
    }

    async dispatch(message: InboundMessage): Promise<Classification> {
        const classification = classifyMessage(message.text, this.botUsername);

        switch (classification.kind) {
            case 'command':
                log.debug(`/${classification.command} from user ${message.userId}`);
                await COMMAND_HANDLERS[classification.command](message, this.deps);
                break;

            case 'unknown-command':
                await this.deps.gateway.sendText(message.chatId, MESSAGES.UNKNOWN_COMMAND);
                break;

            case 'foreign-command':
                break;

            case 'text':
                await botHandleText(message, this.deps);
                break;
        }
        return classification;
    }
}
