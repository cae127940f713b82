/**
 * Logger for the relay bot
 * Clean, consistent console logging with secret redaction
 */

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// ═══════════════════════════════════════════════════════════════
// SECURITY: Patterns to detect and redact sensitive data in logs
// ═══════════════════════════════════════════════════════════════

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
    // Bot API URLs embed the token in the path
    { pattern: /\/bot\d{6,12}:[A-Za-z0-9_-]+/g, replacement: '/bot[BOT_TOKEN_REDACTED]' },
    // Telegram bot tokens (format: 123456789:ABCdefGHI...)
    { pattern: /\d{8,10}:[A-Za-z0-9_-]{35}/g, replacement: '[BOT_TOKEN_REDACTED]' },
    // Generic secrets in env format
    { pattern: /(SECRET|TOKEN|PASSWORD)['"=:\s]+[^\s'"]+/gi, replacement: '$1=[REDACTED]' },
];

/**
 * Sanitize log message to prevent secret leakage
 */
export function sanitizeLogMessage(message: string): string {
    let sanitized = message;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
        sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
}

/**
 * Keep the first characters of a secret for log summaries
 */
export function maskSecret(value: string | undefined, keep: number = 6): string {
    if (!value) return '';
    return value.length > keep ? `${value.slice(0, keep)}...` : '***';
}

const COLORS = {
    info: '\x1b[36m',
    error: '\x1b[31m',
    debug: '\x1b[90m',
    success: '\x1b[32m',
    warn: '\x1b[33m',
    reset: '\x1b[0m',
};

const LOG_LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function getLogLevel(): LogLevel {
    const env = process.env.LOG_LEVEL?.toLowerCase();
    if (env === 'error' || env === 'warn' || env === 'info' || env === 'debug') return env;
    return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[getLogLevel()];
}

function capitalize(s: string): string {
    return s.charAt(0).toUpperCase() + s.slice(1);
}

function tag(scope: string, sub?: string): string {
    const base = capitalize(scope);
    return sub ? `[${base}.${sub}]` : `[${base}]`;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const logger = {
    info: (scope: string, message: string) => {
        if (shouldLog('info')) console.log(`${COLORS.info}${tag(scope)}${COLORS.reset} ${sanitizeLogMessage(message)}`);
    },

    success: (scope: string, message: string) => {
        if (shouldLog('info')) console.log(`${COLORS.success}${tag(scope)}${COLORS.reset} ✓ ${sanitizeLogMessage(message)}`);
    },

    progress: (scope: string, percent: number, detail: string) => {
        if (shouldLog('info')) console.log(`${COLORS.info}${tag(scope, 'Progress')}${COLORS.reset} ${percent}% ${sanitizeLogMessage(detail)}`);
    },

    error: (scope: string, error: unknown, errorType?: string) => {
        if (!shouldLog('error')) return;
        const typeTag = errorType ? ` [${errorType}]` : '';
        console.error(`${COLORS.error}${tag(scope)}${COLORS.reset} ✗${typeTag} ${sanitizeLogMessage(describeError(error))}`);
    },

    warn: (scope: string, message: string) => {
        if (shouldLog('warn')) console.warn(`${COLORS.warn}${tag(scope)}${COLORS.reset} ⚠ ${sanitizeLogMessage(message)}`);
    },

    debug: (scope: string, message: string) => {
        if (shouldLog('debug')) console.log(`${COLORS.debug}${tag(scope)}${COLORS.reset} ${sanitizeLogMessage(message)}`);
    },
};
