/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * GRACEFUL SHUTDOWN HANDLER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Handles SIGTERM/SIGINT signals for clean shutdown.
 * In-flight relay requests finish; pending deletions are cancelled.
 *
 * @module lib/shutdown
 */

import { logger } from '@/lib/services/shared/logger';

export type ShutdownHook = (signal: string) => Promise<void>;

let isShuttingDown = false;
let shutdownHandlersRegistered = false;

/**
 * Register SIGTERM and SIGINT handlers. `onShutdown` gets `timeoutMs` before
 * the process is forced out. Call once during startup.
 */
export function setupGracefulShutdown(onShutdown: ShutdownHook, timeoutMs: number = 60_000): void {
    if (shutdownHandlersRegistered) {
        return;
    }
    shutdownHandlersRegistered = true;

    const shutdown = async (signal: string) => {
        if (isShuttingDown) {
            return;
        }
        isShuttingDown = true;

        logger.warn('shutdown', `${signal} received, starting graceful shutdown...`);

        const shutdownTimeout = setTimeout(() => {
            logger.error('shutdown', 'Shutdown timeout reached, forcing exit');
            process.exit(1);
        }, timeoutMs);
        shutdownTimeout.unref();

        try {
            await onShutdown(signal);
            logger.success('shutdown', 'Graceful shutdown complete');
            clearTimeout(shutdownTimeout);
            process.exit(0);
        } catch (error) {
            logger.error('shutdown', error, 'SHUTDOWN');
            clearTimeout(shutdownTimeout);
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    logger.debug('shutdown', 'Graceful shutdown handlers registered');
}
