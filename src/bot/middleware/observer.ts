/**
 * Update observer
 * Logs every update at debug level; never changes dispatch.
 */

import type { MiddlewareFn } from 'grammy';

import type { BotContext } from '../types';
import { log } from '../helpers';

/** First payload key of an update, e.g. `message` or `edited_message` */
export function botUpdateKind(update: object): string {
    return Object.keys(update).find(key => key !== 'update_id') ?? 'unknown';
}

export const observerMiddleware: MiddlewareFn<BotContext> = async (ctx, next) => {
    const receivedAt = Date.now();
    ctx.receivedAt = receivedAt;
    log.debug(
        `Update ${ctx.update.update_id} (${botUpdateKind(ctx.update)}) user=${ctx.from?.id ?? '-'} chat=${ctx.chat?.id ?? '-'}`
    );
    await next();
    log.debug(`Update ${ctx.update.update_id} handled in ${Date.now() - receivedAt}ms`);
};
