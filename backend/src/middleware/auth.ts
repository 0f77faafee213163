import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Authenticator } from '../auth/bearer.js';
import type { TokenClaims } from '../auth/context.js';
import { requireAnyRole, requireRole } from '../rbac/index.js';
import { AuthError } from '../utils/errors.js';

type RequestHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

function parsePatterns(rawPatterns: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const pattern of rawPatterns) {
    const trimmed = pattern.trim();
    if (!trimmed) continue;
    unique.add(trimmed.toLowerCase());
  }
  return [...unique];
}

export function matchPattern(value: string, pattern: string): boolean {
  if (!pattern.includes('*')) {
    return value === pattern;
  }

  const star = pattern.indexOf('*');
  const prefix = pattern.slice(0, star);
  const suffix = pattern.slice(star + 1);
  if (prefix && !value.startsWith(prefix)) {
    return false;
  }
  if (suffix && !value.endsWith(suffix)) {
    return false;
  }
  return value.length >= prefix.length + suffix.length;
}

/** Patterns are `/path` or `METHOD /path`, compared case-insensitively. */
export function matchesAnyPattern(pathname: string, method: string, patterns: readonly string[]): boolean {
  if (!patterns.length) {
    return false;
  }

  const target = pathname.toLowerCase();
  const targetWithMethod = `${method.toLowerCase()} ${target}`;

  return patterns.some((candidate) => {
    if (candidate.includes(' ')) {
      return matchPattern(targetWithMethod, candidate);
    }
    return matchPattern(target, candidate);
  });
}

function normalisePath(rawUrl: string | undefined): string {
  const path = rawUrl ? rawUrl.split('?')[0] : '';
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path || '/';
}

export function buildAuthHook(authenticator: Authenticator, publicPaths: readonly string[]): RequestHook {
  const publicPathPatterns = parsePatterns(publicPaths);

  return async function authHook(request: FastifyRequest) {
    if (request.method.toUpperCase() === 'OPTIONS') {
      return;
    }
    const path = normalisePath(request.raw.url);
    if (matchesAnyPattern(path, request.method, publicPathPatterns)) {
      return;
    }

    try {
      request.auth = await authenticator.authenticate(request.headers.authorization);
    } catch (error) {
      if (error instanceof AuthError) {
        request.log.warn({ path, reason: error.kind }, 'Request authentication failed');
      }
      throw error;
    }
  };
}

export function authenticatedClaims(request: FastifyRequest): TokenClaims {
  if (!request.auth) {
    throw new AuthError('missing_token');
  }
  return request.auth;
}

export function requireRoleHandler(role: string): RequestHook {
  return async function roleGuard(request: FastifyRequest) {
    requireRole(authenticatedClaims(request), role);
  };
}

export function requireAnyRoleHandler(roles: readonly string[]): RequestHook {
  return async function anyRoleGuard(request: FastifyRequest) {
    requireAnyRole(authenticatedClaims(request), roles);
  };
}
