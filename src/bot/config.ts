/**
 * Telegram Bot Configuration
 * Relay constants and user-facing messages
 */

// ============================================================================
// Relay Limits
// ============================================================================

/** Hard ceiling for a single upload (Telegram's own limit, minus headroom) */
export const MAX_UPLOAD_BYTES = 1_990_000_000;

/** Download attempts before giving up */
export const FETCH_ATTEMPTS = 3;

/** Fixed pause between download attempts (ms) */
export const FETCH_RETRY_DELAY_MS = 3_000;

/** Total time one download attempt may take (ms) */
export const DOWNLOAD_TIMEOUT_MS = 3_600_000;

/** Total time one resolver call may take (ms) */
export const RESOLVER_TIMEOUT_MS = 600_000;

/** User-visible progress edits happen at most once per [min, max] ms window */
export const PROGRESS_MIN_INTERVAL_MS = 30_000;
export const PROGRESS_MAX_INTERVAL_MS = 35_000;

/** Percentage step for operational progress log lines */
export const PROGRESS_LOG_STEP = 10;

/** Sent media is deleted after this long (ms) */
export const RETENTION_MS = 24 * 60 * 60 * 1000;

/** Bound on handing a deletion to the bot's context (ms) */
export const DELETE_HANDOFF_TIMEOUT_MS = 10_000;

/** Telegram caption limit */
export const MAX_CAPTION_LENGTH = 1024;

// ============================================================================
// Commands
// ============================================================================

export const BOT_COMMANDS = [
  { command: 'start', description: 'Check that the bot is alive' },
  { command: 'status', description: 'Show your current configuration' },
  { command: 'baseurl', description: 'Set the resolver base URL' },
  { command: 'stop', description: 'Clear the resolver base URL' },
] as const;

export type BotCommandName = (typeof BOT_COMMANDS)[number]['command'];

// ============================================================================
// Messages
// ============================================================================

export const MESSAGES = {
  WELCOME: `👋 Welcome!

1. Send /baseurl and then the resolver base URL
2. Send any share link
3. Receive the video here

Videos are deleted automatically after 24 hours.`,

  ACTIVE: 'Bot is Active ✅',

  WELCOME_BACK: '👋 Welcome back! Send a share link, or /status to check your setup.',

  STATUS: (baseUrl: string | undefined, awaiting: boolean) =>
    `📊 Status\n\nBase URL: ${baseUrl || 'not set'}\nWaiting for base URL: ${awaiting ? 'yes' : 'no'}`,

  ASK_BASE_URL: '🔗 Send the resolver base URL (for example https://api.example.com).',

  BASE_URL_SAVED: (baseUrl: string) => `✅ Base URL saved: ${baseUrl}`,

  BASE_URL_CLEARED: '🛑 Base URL cleared. Send /baseurl to set a new one.',

  BASE_URL_REQUIRED: '⚠️ No base URL configured. Send /baseurl first.',

  UNKNOWN_COMMAND: '❓ Unknown command.',

  PROCESSING: '⏳ Processing your link...',

  SENDING_DIRECT: '📤 Sending video...',

  DIRECT_FALLBACK: 'ℹ️ Direct send not accepted, downloading the video instead...',

  DOWNLOADING: '⬇️ Downloading...',

  DOWNLOAD_PROGRESS: (detail: string) => `⬇️ Downloading... ${detail}`,

  RETRYING: (attempt: number, attempts: number, delaySeconds: number) =>
    `⚠️ Download attempt ${attempt}/${attempts} failed, retrying in ${delaySeconds}s...`,

  UPLOADING: '📤 Uploading to Telegram...',

  RESOLVE_FAILED: '❌ Failed to fetch video from API.',

  RESOLVE_UNREACHABLE: (cause: string) => `❌ Failed to fetch video from API: ${cause}`,

  TOO_LARGE: '❌ File is too large for Telegram (limit 1.99 GB).',

  DOWNLOAD_FAILED: (cause: string) => `❌ Download failed: ${cause}`,

  UPLOAD_FAILED: (cause: string) => `❌ Upload failed: ${cause}`,

  UNEXPECTED_ERROR: (cause: string) => `❌ Something went wrong: ${cause}`,
} as const;
