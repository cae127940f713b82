/**
 * Bot Logging Utility
 * Bot-scoped wrapper around the shared logger
 *
 * Usage:
 * import { log } from '@/bot/helpers';
 * log.debug('Processing...'); // Only shows with LOG_LEVEL=debug
 * log.info('Success');
 * log.error('Failed', err);
 */

import { describeError, logger } from '@/lib/services/shared/logger';

export const log = {
  debug: (message: string) => logger.debug('bot', message),

  info: (message: string) => logger.info('bot', message),

  warn: (message: string) => logger.warn('bot', message),

  error: (message: string, err?: unknown) => {
    logger.error('bot', err === undefined ? message : `${message}: ${describeError(err)}`);
  },
};
