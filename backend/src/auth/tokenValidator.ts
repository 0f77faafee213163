import { decodeProtectedHeader, errors, importJWK, jwtVerify, type JWTPayload, type KeyLike } from 'jose';
import { createLogger } from '../logger.js';
import { AppError, AuthError } from '../utils/errors.js';
import { formatTokenForLogging } from '../utils/jwt.js';
import { parseTokenClaims, type TokenClaims } from './context.js';
import type { KeySetCache } from './keySetCache.js';
import type { JsonWebKey } from './keySetFetcher.js';

const logger = createLogger('TokenValidator');

const DEFAULT_ALGORITHM = 'RS256';

export interface TokenValidator {
  validate(token: string): Promise<TokenClaims>;
}

export interface TokenValidatorOptions {
  keySets: KeySetCache;
  now?: () => number;
}

function readKeyId(token: string): string | undefined {
  try {
    const header = decodeProtectedHeader(token);
    return typeof header.kid === 'string' ? header.kid : undefined;
  } catch {
    return undefined;
  }
}

async function importVerificationKey(jwk: JsonWebKey, algorithm: string): Promise<KeyLike | Uint8Array> {
  try {
    return await importJWK({ ...jwk }, algorithm);
  } catch (error) {
    logger.error({ err: error, kid: jwk.kid, algorithm }, 'Failed to import signing key');
    throw new AuthError('invalid_token');
  }
}

/**
 * Expiry is enforced once, inside jwtVerify: it receives this validator's
 * clock and no tolerance, so `exp <= now` is rejected after the signature
 * has been checked.
 */
export function createTokenValidator(options: TokenValidatorOptions): TokenValidator {
  const now = options.now ?? Date.now;

  async function verify(token: string): Promise<TokenClaims> {
    const keySet = await options.keySets.getKeySet();

    const kid = readKeyId(token);
    const jwk = kid === undefined ? undefined : keySet.keys.get(kid);
    if (!jwk) {
      throw new AuthError('key_not_found');
    }

    const algorithm = jwk.alg ?? DEFAULT_ALGORITHM;
    const key = await importVerificationKey(jwk, algorithm);

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, key, {
        algorithms: [algorithm],
        currentDate: new Date(now()),
        clockTolerance: 0,
      }));
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw new AuthError('token_expired');
      }
      if (error instanceof errors.JOSEError) {
        logger.debug({ code: error.code, kid, token: formatTokenForLogging(token) }, 'Token verification failed');
        throw new AuthError('invalid_token');
      }
      throw error;
    }

    const claims = parseTokenClaims(payload);
    if (!claims) {
      throw new AuthError('invalid_claims');
    }
    return claims;
  }

  return {
    async validate(token: string) {
      if (!token) {
        throw new AuthError('missing_token');
      }

      try {
        return await verify(token);
      } catch (error) {
        // Typed failures (auth and 503 from the key set) pass through as-is.
        if (error instanceof AppError) {
          throw error;
        }
        logger.error({ err: error }, 'Unexpected error while validating token');
        throw new AuthError('validation_failed');
      }
    },
  };
}
