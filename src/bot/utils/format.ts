/**
 * Bot Format Utilities
 * Text formatting for captions and progress messages
 *
 * @module bot/utils/format
 */

import { MAX_CAPTION_LENGTH } from '../config';
import type { ResolvedMedia } from '../types';
import type { ProgressUpdate } from './progress';

// ============================================================================
// SIZES
// ============================================================================

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable byte count, 1024-based
 *
 * @example formatBytes(1536) // "1.5 KB"
 */
export function formatBytes(bytes: number): string {
    if (!Number.isFinite(bytes) || bytes < 1024) return `${Math.max(0, Math.floor(bytes || 0))} B`;

    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    return `${value.toFixed(1)} ${UNITS[unit]}`;
}

// ============================================================================
// CAPTION
// ============================================================================

/**
 * Caption for a relayed video: "name (size)"
 * The name is shortened so the whole caption fits Telegram's limit.
 */
export function buildCaption(media: ResolvedMedia): string {
    const suffix = ` (${media.sizeLabel})`;
    const room = MAX_CAPTION_LENGTH - suffix.length;
    const name = media.displayName.length > room
        ? media.displayName.substring(0, Math.max(0, room - 1)).trimEnd() + '…'
        : media.displayName;
    return `${name}${suffix}`;
}

// ============================================================================
// PROGRESS
// ============================================================================

/**
 * "42% (5.0 MB / 12.0 MB)" when the total is known, "5.0 MB" otherwise
 */
export function formatProgress(update: ProgressUpdate): string {
    if (update.percent === null || update.total === null) {
        return formatBytes(update.downloaded);
    }
    return `${update.percent}% (${formatBytes(update.downloaded)} / ${formatBytes(update.total)})`;
}
