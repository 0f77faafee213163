import { z } from 'zod';
import { createLogger } from '../logger.js';
import { retry } from '../utils/retry.js';

const logger = createLogger('KeySetFetcher');

const JsonWebKeySchema = z.object({
  kid: z.string().optional(),
  kty: z.string(),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

export const JsonWebKeySetSchema = z.object({
  keys: z.array(JsonWebKeySchema),
});

export type JsonWebKey = z.infer<typeof JsonWebKeySchema>;
export type JsonWebKeySet = z.infer<typeof JsonWebKeySetSchema>;

export interface KeySetFetcher {
  /** Resolves with a validated key set document or rejects; never partial. */
  fetchKeySet(): Promise<JsonWebKeySet>;
}

export interface HttpKeySetFetcherOptions {
  timeoutMs?: number;
  retries?: number;
  retryBaseDelayMs?: number;
}

export function createHttpKeySetFetcher(jwksUri: string, options: HttpKeySetFetcherOptions = {}): KeySetFetcher {
  const timeoutMs = options.timeoutMs ?? 10_000;

  async function fetchOnce(): Promise<JsonWebKeySet> {
    const response = await fetch(jwksUri, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`JWKS fetch failed: ${response.status} ${response.statusText}`);
    }

    const body: unknown = await response.json();
    const parsed = JsonWebKeySetSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Invalid JWKS response: missing or malformed keys array');
    }
    return parsed.data;
  }

  return {
    fetchKeySet() {
      return retry(fetchOnce, {
        retries: options.retries ?? 0,
        baseDelayMs: options.retryBaseDelayMs ?? 500,
        maxDelayMs: 5_000,
        onRetry: (err, attempt) => {
          logger.warn({ err, attempt, uri: jwksUri }, 'Retrying JWKS fetch');
        },
      });
    },
  };
}
