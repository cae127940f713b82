/**
 * HTTP Client Module
 *
 * Pooled axios instance shared by the resolver client and the media fetcher.
 *
 * @module http/client
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import http from 'http';
import https from 'https';
import { logger } from '@/lib/services/shared/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// CONNECTION POOL CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

const POOL_CONFIG = {
  keepAlive: true,
  keepAliveMsecs: 30 * 1000,
  maxSockets: 50,
  maxFreeSockets: 10,
  scheduling: 'fifo' as const,
};

const httpAgent = new http.Agent(POOL_CONFIG);

// The resolver and its CDN serve certificates that do not validate.
// Verification is off for every request made through this client.
const httpsAgent = new https.Agent({ ...POOL_CONFIG, rejectUnauthorized: false });

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// ═══════════════════════════════════════════════════════════════════════════════
// AXIOS CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create an axios instance on the shared agents.
 * Status codes are never thrown; callers check `response.status` themselves.
 */
export function createHttpClient(overrides: CreateAxiosDefaults = {}): AxiosInstance {
  const client = axios.create({
    maxRedirects: 10,
    validateStatus: () => true,
    decompress: true,
    httpAgent,
    httpsAgent,
    headers: {
      'User-Agent': USER_AGENT,
      'Accept': '*/*',
    },
    ...overrides,
  });

  client.interceptors.response.use(
    (res) => res,
    (err: unknown) => {
      if (axios.isAxiosError(err) && err.code === 'ECONNABORTED') {
        logger.warn('http', `Timeout: ${err.config?.url ?? 'unknown url'}`);
      }
      return Promise.reject(err);
    }
  );

  return client;
}

export const httpClient = createHttpClient();
