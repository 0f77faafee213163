import { z } from 'zod';

const RoleMapSchema = z.record(z.string(), z.array(z.string()));

/**
 * Shape of a Keycloak access token payload. Every listed claim is required
 * unless marked optional; anything missing or mistyped rejects the token.
 */
export const TokenPayloadSchema = z.object({
  sub: z.string(),
  exp: z.number().int(),
  iat: z.number().int(),
  jti: z.string(),
  iss: z.string(),
  typ: z.string(),
  azp: z.string(),
  sid: z.string(),
  realm_access: RoleMapSchema,
  scope: z.string(),
  preferred_username: z.string(),
  email: z.string(),
  aud: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (typeof value === 'string' ? [value] : value)),
  resource_access: z.record(z.string(), RoleMapSchema).optional(),
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

export interface TokenClaims {
  /** Subject identifier (Keycloak user id). */
  readonly sub: string;
  /** Expiry, epoch seconds. */
  readonly expiresAt: number;
  /** Issued-at, epoch seconds. */
  readonly issuedAt: number;
  readonly tokenId: string;
  readonly issuer: string;
  readonly tokenType: string;
  readonly authorizedParty: string;
  readonly sessionId: string;
  readonly realmRoles: readonly string[];
  /** Space separated OAuth scopes. */
  readonly scope: string;
  readonly username: string;
  readonly email: string;
  readonly audience?: readonly string[];
  /** Client roles keyed by resource (client) name. */
  readonly resourceRoles?: Readonly<Record<string, readonly string[]>>;
  /** Realm roles plus every resource role, de-duplicated. */
  readonly roles: readonly string[];
}

export function collectRoles(payload: Pick<TokenPayload, 'realm_access' | 'resource_access'>): string[] {
  const roles = new Set<string>(payload.realm_access.roles ?? []);
  for (const access of Object.values(payload.resource_access ?? {})) {
    for (const role of access.roles ?? []) {
      roles.add(role);
    }
  }
  return [...roles];
}

function resourceRoleMap(
  resourceAccess: TokenPayload['resource_access'],
): Record<string, readonly string[]> | undefined {
  if (!resourceAccess) {
    return undefined;
  }
  const mapped: Record<string, readonly string[]> = {};
  for (const [resource, access] of Object.entries(resourceAccess)) {
    mapped[resource] = Object.freeze([...(access.roles ?? [])]);
  }
  return Object.freeze(mapped);
}

export function buildTokenClaims(payload: TokenPayload): TokenClaims {
  return Object.freeze({
    sub: payload.sub,
    expiresAt: payload.exp,
    issuedAt: payload.iat,
    tokenId: payload.jti,
    issuer: payload.iss,
    tokenType: payload.typ,
    authorizedParty: payload.azp,
    sessionId: payload.sid,
    realmRoles: Object.freeze([...(payload.realm_access.roles ?? [])]),
    scope: payload.scope,
    username: payload.preferred_username,
    email: payload.email,
    audience: payload.aud ? Object.freeze([...payload.aud]) : undefined,
    resourceRoles: resourceRoleMap(payload.resource_access),
    roles: Object.freeze(collectRoles(payload)),
  });
}

/**
 * Validates a verified JWT payload and turns it into claims. Returns null
 * when the payload does not have the expected shape.
 */
export function parseTokenClaims(payload: unknown): TokenClaims | null {
  const parsed = TokenPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  return buildTokenClaims(parsed.data);
}
