import type { Context } from 'grammy';

/**
 * Sequencing key for @grammyjs/runner's `sequentialize`.
 * Updates from one user are handled in order; different users run concurrently.
 */
export function botSequenceKey(ctx: Context): string | undefined {
    return ctx.from?.id.toString();
}
