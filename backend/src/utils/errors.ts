import type { FastifyReply } from 'fastify';

export interface ErrorResponse {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'internal_error',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503, 'service_unavailable');
    this.name = 'ServiceUnavailableError';
  }
}

export type AuthErrorKind =
  | 'missing_header'
  | 'invalid_header'
  | 'missing_token'
  | 'key_not_found'
  | 'invalid_token'
  | 'token_expired'
  | 'invalid_claims'
  | 'validation_failed'
  | 'access_denied';

// Only these fixed strings ever reach a client.
const AUTH_ERROR_MESSAGES: Record<AuthErrorKind, string> = {
  missing_header: 'Missing authorization header',
  invalid_header: 'Invalid authorization header format',
  missing_token: 'Missing authentication token',
  key_not_found: 'Invalid token signature: Key not found',
  invalid_token: 'Invalid authentication token',
  token_expired: 'Token has expired',
  invalid_claims: 'Invalid authentication token claims',
  validation_failed: 'Error validating authentication token',
  access_denied: 'Access denied',
};

export class AuthError extends AppError {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, statusCode: 401 | 403 = kind === 'access_denied' ? 403 : 401) {
    super(AUTH_ERROR_MESSAGES[kind], statusCode, kind);
    this.name = 'AuthError';
    this.kind = kind;
  }

  get forbidden(): boolean {
    return this.statusCode === 403;
  }
}

export function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ErrorResponse {
  reply.status(status);
  const payload: ErrorResponse = { status, code, message };
  if (details !== undefined) payload.details = details;
  return payload;
}
