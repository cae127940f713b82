/**
 * Resolver Client
 * Turns a shared-storage link into a direct media URL via the user's resolver API
 *
 * GET {baseUrl}/api?link={link} → { success, dlink: { dlink, name, size } }
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { httpClient } from '@/lib/http/client';
import { ResolveError } from '@/lib/errors';
import { describeError, logger } from '@/lib/services/shared/logger';
import { RESOLVER_TIMEOUT_MS } from '../config';
import type { ResolvedMedia } from '../types';

// ============================================================================
// Payload
// ============================================================================

const resolverPayloadSchema = z.object({
  success: z.literal(true),
  dlink: z.object({
    dlink: z.string().trim().min(1),
    name: z.string().optional(),
    size: z.string().optional(),
  }),
});

const DEFAULT_NAME = 'video';
const DEFAULT_SIZE = 'unknown size';

/**
 * Build the resolver request URL. The link is percent-encoded.
 */
export function botResolverBuildUrl(baseUrl: string, link: string): string {
  return `${baseUrl}/api?link=${encodeURIComponent(link)}`;
}

/**
 * Parse a resolver body. Strings are parsed as JSON whatever the content type.
 */
export function botResolverParsePayload(body: unknown): ResolvedMedia {
  let payload = body;
  if (typeof body === 'string') {
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new ResolveError('malformed response', { cause: error, source: 'payload' });
    }
  }

  const parsed = resolverPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ResolveError('malformed response', { cause: parsed.error, source: 'payload' });
  }

  const { dlink } = parsed.data;
  return {
    directUrl: dlink.dlink,
    displayName: dlink.name?.trim() || DEFAULT_NAME,
    sizeLabel: dlink.size?.trim() || DEFAULT_SIZE,
  };
}

// ============================================================================
// Client
// ============================================================================

export interface ResolverServiceOptions {
  client?: AxiosInstance;
  timeoutMs?: number;
}

export class ResolverService {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: ResolverServiceOptions = {}) {
    this.client = options.client ?? httpClient;
    this.timeoutMs = options.timeoutMs ?? RESOLVER_TIMEOUT_MS;
  }

  /**
   * One GET, no retries. `baseUrl` must already be non-empty.
   */
  async resolve(baseUrl: string, link: string): Promise<ResolvedMedia> {
    const url = botResolverBuildUrl(baseUrl, link);
    logger.debug('resolver', `GET ${url}`);

    let status: number;
    let data: unknown;
    try {
      const response = await this.client.get<string>(url, {
        responseType: 'text',
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw new ResolveError(`resolver request failed: ${describeError(error)}`, { cause: error });
    }

    if (status < 200 || status >= 300) {
      throw new ResolveError(`resolver returned HTTP ${status}`);
    }

    const media = botResolverParsePayload(data);
    logger.info('resolver', `Resolved "${media.displayName}" (${media.sizeLabel})`);
    return media;
  }
}
