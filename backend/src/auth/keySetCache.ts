import { createLogger } from '../logger.js';
import { ServiceUnavailableError } from '../utils/errors.js';
import type { JsonWebKey, JsonWebKeySet, KeySetFetcher } from './keySetFetcher.js';

const logger = createLogger('KeySetCache');

export const DEFAULT_KEY_SET_TTL_MS = 60 * 60 * 1000;

export interface KeySet {
  readonly keys: ReadonlyMap<string, JsonWebKey>;
  /** Epoch ms of the fetch that produced this set. */
  readonly fetchedAt: number;
}

export interface KeySetCache {
  getKeySet(): Promise<KeySet>;
  isFresh(): boolean;
}

export interface KeySetCacheOptions {
  fetcher: KeySetFetcher;
  ttlMs?: number;
  now?: () => number;
}

/**
 * Process-wide holder for the identity provider's signing keys.
 *
 * A cached set is fresh on [fetchedAt, fetchedAt + ttl). Concurrent callers
 * that find it stale share one in-flight refresh. The slot is only written
 * after a refresh fully succeeds; when a refresh fails the previous set (if
 * any) keeps being served, otherwise the failure surfaces as 503.
 */
export function createKeySetCache(options: KeySetCacheOptions): KeySetCache {
  const ttlMs = options.ttlMs ?? DEFAULT_KEY_SET_TTL_MS;
  const now = options.now ?? Date.now;
  let cached: KeySet | null = null;
  let inflight: Promise<KeySet> | null = null;

  function isFresh(): boolean {
    return cached !== null && now() - cached.fetchedAt < ttlMs;
  }

  async function refresh(): Promise<KeySet> {
    const startedAt = now();
    let document: JsonWebKeySet;
    try {
      document = await options.fetcher.fetchKeySet();
    } catch (error) {
      if (cached) {
        logger.warn({ err: error, fetchedAt: cached.fetchedAt }, 'JWKS refresh failed, serving stale key set');
        return cached;
      }
      logger.error({ err: error }, 'JWKS fetch failed');
      throw new ServiceUnavailableError('Failed to fetch JWKS from authentication server');
    }

    const keys = new Map<string, JsonWebKey>();
    for (const key of document.keys) {
      if (key.kid !== undefined) {
        keys.set(key.kid, key);
      }
    }

    const next: KeySet = Object.freeze({ keys, fetchedAt: startedAt });
    cached = next;
    logger.info({ keyCount: keys.size, ttlMs }, 'JWKS cache refreshed');
    return next;
  }

  return {
    async getKeySet() {
      if (cached && isFresh()) {
        return cached;
      }
      if (!inflight) {
        inflight = refresh().finally(() => {
          inflight = null;
        });
      }
      return inflight;
    },
    isFresh,
  };
}
