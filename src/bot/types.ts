/**
 * Telegram Bot Types
 * Type definitions for bot context, per-user state and relay values
 */

import type { Context } from 'grammy';

// ============================================================================
// USER STATE
// ============================================================================

/** Per-user configuration, keyed by Telegram user ID */
export interface UserConfig {
    /** Resolver base URL, trailing slashes stripped */
    baseUrl?: string;
    /** Next plain text message is the base URL */
    awaitingBaseUrl: boolean;
}

// ============================================================================
// RELAY VALUES
// ============================================================================

/** Resolver output for one request */
export interface ResolvedMedia {
    directUrl: string;
    displayName: string;
    sizeLabel: string;
}

/** A media message the bot has sent */
export interface SentMessageRef {
    chatId: number;
    messageId: number;
}

export interface DeletionTask extends SentMessageRef {
    /** Epoch ms at which the message is deleted */
    fireAt: number;
}

export type VideoSource =
    | { kind: 'url'; url: string }
    | { kind: 'file'; path: string };

// ============================================================================
// CHAT GATEWAY
// ============================================================================

/**
 * The chat operations the relay core needs.
 * Implemented over grammY's Api in production, faked in tests.
 */
export interface ChatGateway {
    /** Send a text message and return its message ID */
    sendText(chatId: number, text: string, replyTo?: number): Promise<number>;
    editText(chatId: number, messageId: number, text: string): Promise<void>;
    deleteMessage(chatId: number, messageId: number): Promise<void>;
    /** Send a video with caption and return its message ID */
    sendVideo(chatId: number, video: VideoSource, caption: string): Promise<number>;
}

// ============================================================================
// INBOUND MESSAGES
// ============================================================================

/** A text message normalized from a Telegram update */
export interface InboundMessage {
    userId: number;
    chatId: number;
    messageId: number;
    text: string;
}

// ============================================================================
// CUSTOM CONTEXT
// ============================================================================

/** Extended context */
export interface BotContext extends Context {
    /** Update start time, set by the observer middleware */
    receivedAt?: number;
}
