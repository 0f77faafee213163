import { before, test } from 'node:test';
import assert from 'node:assert/strict';
import { SignJWT } from 'jose';
import { createKeySetCache, type KeySetCache } from '../../src/auth/keySetCache.js';
import { createTokenValidator } from '../../src/auth/tokenValidator.js';
import { AuthError, ServiceUnavailableError } from '../../src/utils/errors.js';
import {
  createFakeFetcher,
  createSigningKey,
  keySetOf,
  NOW_MS,
  NOW_SECONDS,
  signToken,
  tokenPayload,
  type SigningKey,
} from '../helpers/tokens.js';

let signingKey: SigningKey;
let foreignKey: SigningKey;

before(async () => {
  signingKey = await createSigningKey('test-key');
  foreignKey = await createSigningKey('test-key');
});

function createValidator(keySets?: KeySetCache) {
  return createTokenValidator({
    keySets: keySets ?? createKeySetCache({ fetcher: createFakeFetcher(keySetOf(signingKey)), now: () => NOW_MS }),
    now: () => NOW_MS,
  });
}

function isAuthError(kind: string, message: string) {
  return (error: unknown) => {
    assert.ok(error instanceof AuthError);
    assert.equal(error.kind, kind);
    assert.equal(error.message, message);
    assert.equal(error.statusCode, 401);
    return true;
  };
}

test('zwraca claims dla poprawnego tokenu', async () => {
  const token = await signToken(signingKey, tokenPayload({ realm_access: { roles: ['ROLE_USER', 'ROLE_ADMIN'] } }));

  const claims = await createValidator().validate(token);

  assert.equal(claims.sub, 'user-1');
  assert.equal(claims.email, 'jan@example.com');
  assert.deepEqual(claims.roles, ['ROLE_USER', 'ROLE_ADMIN']);
});

test('odrzuca pusty token bez pobierania JWKS', async () => {
  const fetcher = createFakeFetcher(keySetOf(signingKey));
  const keySets = createKeySetCache({ fetcher, now: () => NOW_MS });

  await assert.rejects(createValidator(keySets).validate(''), isAuthError('missing_token', 'Missing authentication token'));
  assert.equal(fetcher.calls, 0);
});

test('uwzględnia role klienta z resource_access', async () => {
  const token = await signToken(
    signingKey,
    tokenPayload({ resource_access: { 'oil-api': { roles: ['ROLE_ADMIN'] } } }),
  );

  const claims = await createValidator().validate(token);
  assert.deepEqual(claims.roles, ['ROLE_USER', 'ROLE_ADMIN']);
  assert.deepEqual(claims.resourceRoles, { 'oil-api': ['ROLE_ADMIN'] });
});

test('odrzuca token z nieznanym kid', async () => {
  const token = await signToken(signingKey, tokenPayload(), 'rotated-away');

  await assert.rejects(
    createValidator().validate(token),
    isAuthError('key_not_found', 'Invalid token signature: Key not found'),
  );
});

test('odrzuca token bez kid w nagłówku', async () => {
  const token = await new SignJWT(tokenPayload()).setProtectedHeader({ alg: 'RS256' }).sign(signingKey.privateKey);

  await assert.rejects(
    createValidator().validate(token),
    isAuthError('key_not_found', 'Invalid token signature: Key not found'),
  );
});

test('odrzuca ciąg, który nie jest tokenem JWT', async () => {
  await assert.rejects(
    createValidator().validate('not-a-token'),
    isAuthError('key_not_found', 'Invalid token signature: Key not found'),
  );
});

test('odrzuca token podpisany innym kluczem', async () => {
  const token = await signToken(foreignKey);

  await assert.rejects(createValidator().validate(token), isAuthError('invalid_token', 'Invalid authentication token'));
});

test('odrzuca token, którego exp już minął', async () => {
  const token = await signToken(signingKey, tokenPayload({ exp: NOW_SECONDS - 60 }));

  await assert.rejects(createValidator().validate(token), isAuthError('token_expired', 'Token has expired'));
});

test('traktuje exp równy bieżącej chwili jako wygasły', async () => {
  const token = await signToken(signingKey, tokenPayload({ exp: NOW_SECONDS }));

  await assert.rejects(createValidator().validate(token), isAuthError('token_expired', 'Token has expired'));
});

test('akceptuje token ważny jeszcze przez sekundę', async () => {
  const token = await signToken(signingKey, tokenPayload({ exp: NOW_SECONDS + 1 }));

  const claims = await createValidator().validate(token);
  assert.equal(claims.expiresAt, NOW_SECONDS + 1);
});

test('odrzuca token bez wymaganych claimów', async () => {
  const payload = tokenPayload();
  delete payload.sid;
  const token = await signToken(signingKey, payload);

  await assert.rejects(
    createValidator().validate(token),
    isAuthError('invalid_claims', 'Invalid authentication token claims'),
  );
});

test('przepuszcza 503 gdy JWKS jest niedostępny', async () => {
  const keySets = createKeySetCache({ fetcher: createFakeFetcher(new Error('connection refused')), now: () => NOW_MS });
  const token = await signToken(signingKey);

  await assert.rejects(createValidator(keySets).validate(token), (error: unknown) => {
    assert.ok(error instanceof ServiceUnavailableError);
    assert.equal(error.statusCode, 503);
    return true;
  });
});

test('zamienia nieoczekiwany błąd na ogólny błąd walidacji', async () => {
  const keySets: KeySetCache = {
    async getKeySet() {
      throw new RangeError('unexpected');
    },
    isFresh: () => false,
  };
  const token = await signToken(signingKey);

  await assert.rejects(
    createValidator(keySets).validate(token),
    isAuthError('validation_failed', 'Error validating authentication token'),
  );
});
