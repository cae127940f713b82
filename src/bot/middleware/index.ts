/**
 * Bot Middleware Exports
 *
 * Usage:
 * ```typescript
 * import { observerMiddleware, botSequenceKey } from '@/bot/middleware';
 *
 * bot.use(sequentialize(botSequenceKey)); // per-user ordering first
 * bot.use(observerMiddleware);
 * ```
 */

export { observerMiddleware, botUpdateKind } from './observer';
export { botSequenceKey } from './sequence';
