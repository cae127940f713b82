/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOT COMMANDS - Barrel Export
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Commands:
 * - /start - Liveness check and usage
 * - /status - Current base URL and state
 * - /baseurl - Set the resolver base URL
 * - /stop - Clear the resolver base URL
 *
 * @module bot/commands
 */

import type { BotCommandName } from '../config';
import { botCommandBaseUrl } from './baseurl';
import { botCommandStart } from './start';
import { botCommandStatus } from './status';
import { botCommandStop } from './stop';
import type { CommandHandler } from './types';

export const COMMAND_HANDLERS: Record<BotCommandName, CommandHandler> = {
    start: botCommandStart,
    status: botCommandStatus,
    baseurl: botCommandBaseUrl,
    stop: botCommandStop,
};

export { botCommandStart, botCommandStatus, botCommandBaseUrl, botCommandStop };
export type { CommandDeps, CommandHandler } from './types';
