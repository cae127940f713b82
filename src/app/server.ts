/**
 * HTTP server for webhook mode
 *
 * @module app/server
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';

import { logger } from '@/lib/services/shared/logger';
import { createHealthRoutes } from './api/health/route';
import { createWebhookRoutes, type WebhookRouteDeps } from './api/bot/webhook/route';

export function createServerApp(deps: WebhookRouteDeps) {
  const app = new Hono();

  app.route('/', createHealthRoutes());
  app.route('/', createWebhookRoutes(deps));

  app.notFound((c) => c.text('not found', 404));

  return app;
}

export function startServer(app: Hono, port: number): ServerType {
  return serve({ fetch: app.fetch, port, hostname: '0.0.0.0' }, (info) => {
    logger.info('server', `Listening on port ${info.port}`);
  });
}

export function stopServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
