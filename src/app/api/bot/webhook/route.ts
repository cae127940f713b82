/**
 * Telegram Bot Webhook API Route
 * POST /webhook
 *
 * Validates the optional secret token, enqueues the update and answers
 * immediately. The bot drains the queue on its own loop.
 */

import { Hono } from 'hono';
import type { Update } from 'grammy/types';

import { describeError, logger } from '@/lib/services/shared/logger';

export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

export interface WebhookRouteDeps {
  enqueue: (update: Update) => boolean;
  secretToken?: string;
}

export function isUpdate(value: unknown): value is Update {
  return typeof value === 'object'
    && value !== null
    && 'update_id' in value
    && typeof value.update_id === 'number';
}

export function createWebhookRoutes(deps: WebhookRouteDeps) {
  const app = new Hono();

  app.post('/webhook', async (c) => {
    if (deps.secretToken && c.req.header(SECRET_TOKEN_HEADER) !== deps.secretToken) {
      logger.warn('webhook', 'Rejected: secret token mismatch');
      return c.text('unauthorized', 401);
    }

    try {
      const body: unknown = await c.req.json();
      if (!isUpdate(body)) {
        throw new Error('body is not a Telegram update');
      }
      if (!deps.enqueue(body)) {
        return c.text('shutting down', 503);
      }
      return c.text('ok');
    } catch (error) {
      logger.error('webhook', `Bad update: ${describeError(error)}`);
      return c.text('error', 500);
    }
  });

  return app;
}
