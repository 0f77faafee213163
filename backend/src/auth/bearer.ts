import { AuthError } from '../utils/errors.js';
import type { TokenClaims } from './context.js';
import type { TokenValidator } from './tokenValidator.js';

export interface Authenticator {
  authenticate(authorizationHeader: string | undefined): Promise<TokenClaims>;
}

/** Expects exactly `Bearer <token>`; the scheme is case-insensitive. */
export function extractBearerToken(headerValue: string | undefined): string {
  if (!headerValue) {
    throw new AuthError('missing_header');
  }

  const parts = headerValue.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    throw new AuthError('invalid_header');
  }
  return parts[1];
}

export function createAuthenticator(validator: TokenValidator): Authenticator {
  return {
    async authenticate(authorizationHeader) {
      const token = extractBearerToken(authorizationHeader);
      return validator.validate(token);
    },
  };
}
