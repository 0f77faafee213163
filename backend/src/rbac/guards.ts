import type { TokenClaims } from '../auth/context.js';
import { AuthError } from '../utils/errors.js';

type RoleHolder = Pick<TokenClaims, 'roles'>;

export function hasRole(claims: RoleHolder, role: string): boolean {
  return claims.roles.includes(role);
}

export function hasAnyRole(claims: RoleHolder, roles: readonly string[]): boolean {
  return roles.some((role) => claims.roles.includes(role));
}

export function hasAllRoles(claims: RoleHolder, roles: readonly string[]): boolean {
  return roles.every((role) => claims.roles.includes(role));
}

export function requireRole<T extends RoleHolder>(claims: T, role: string): T {
  if (!hasRole(claims, role)) {
    throw new AuthError('access_denied');
  }
  return claims;
}

export function requireAnyRole<T extends RoleHolder>(claims: T, roles: readonly string[]): T {
  if (!hasAnyRole(claims, roles)) {
    throw new AuthError('access_denied');
  }
  return claims;
}

export function requireAllRoles<T extends RoleHolder>(claims: T, roles: readonly string[]): T {
  if (!hasAllRoles(claims, roles)) {
    throw new AuthError('access_denied');
  }
  return claims;
}
