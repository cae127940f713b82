/**
 * Health Check Endpoints
 * Used by the hosting platform for liveness checks
 *
 * - GET /        → plain banner
 * - GET /healthz → `ok`
 *
 * @module health
 */

import { Hono } from 'hono';

export function createHealthRoutes() {
  const app = new Hono();

  app.get('/', (c) => c.text('Bot is running!'));

  app.get('/healthz', (c) => c.text('ok'));

  return app;
}
