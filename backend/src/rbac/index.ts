export { hasRole, hasAnyRole, hasAllRoles, requireRole, requireAnyRole, requireAllRoles } from './guards.js';

export const Roles = {
  admin: 'ROLE_ADMIN',
  user: 'ROLE_USER',
} as const;

export type Role = (typeof Roles)[keyof typeof Roles];
