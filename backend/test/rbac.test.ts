import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  hasAllRoles,
  hasAnyRole,
  hasRole,
  requireAllRoles,
  requireAnyRole,
  requireRole,
  Roles,
} from '../src/rbac/index.js';
import { AuthError } from '../src/utils/errors.js';

const user = { sub: 'user-1', roles: ['ROLE_USER'] };
const admin = { sub: 'admin-1', roles: ['ROLE_USER', 'ROLE_ADMIN'] };

function isAccessDenied(error: unknown) {
  assert.ok(error instanceof AuthError);
  assert.equal(error.kind, 'access_denied');
  assert.equal(error.message, 'Access denied');
  assert.equal(error.statusCode, 403);
  assert.equal(error.forbidden, true);
  return true;
}

test('rozpoznaje posiadane role', () => {
  assert.equal(hasRole(admin, Roles.admin), true);
  assert.equal(hasRole(user, Roles.admin), false);
  assert.equal(hasAnyRole(user, [Roles.admin, Roles.user]), true);
  assert.equal(hasAnyRole(user, []), false);
  assert.equal(hasAllRoles(admin, [Roles.admin, Roles.user]), true);
  assert.equal(hasAllRoles(user, [Roles.admin, Roles.user]), false);
});

test('requireRole zwraca te same claims gdy rola jest obecna', () => {
  assert.equal(requireRole(admin, Roles.admin), admin);
});

test('requireRole odrzuca brak roli kodem 403', () => {
  assert.throws(() => requireRole(user, Roles.admin), isAccessDenied);
});

test('porównanie ról rozróżnia wielkość liter', () => {
  assert.throws(() => requireRole(admin, 'role_admin'), isAccessDenied);
});

test('requireAnyRole przepuszcza gdy pasuje choć jedna rola', () => {
  assert.equal(requireAnyRole(user, [Roles.admin, Roles.user]), user);
  assert.throws(() => requireAnyRole(user, [Roles.admin]), isAccessDenied);
});

test('requireAnyRole z pustą listą zawsze odmawia', () => {
  assert.throws(() => requireAnyRole(admin, []), isAccessDenied);
});

test('requireAllRoles wymaga kompletu ról', () => {
  assert.equal(requireAllRoles(admin, [Roles.admin, Roles.user]), admin);
  assert.equal(requireAllRoles(user, []), user);
  assert.throws(() => requireAllRoles(user, [Roles.admin, Roles.user]), isAccessDenied);
});
