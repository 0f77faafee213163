import { config as loadEnv } from 'dotenv';
import path from 'node:path';
import { z } from 'zod';

loadEnv();

const DEFAULT_JWKS_URI = 'http://localhost:8080/realms/master/protocol/openid-connect/certs';

function parseEnvList(raw: string | undefined): string[] {
  const unique = new Set<string>();
  if (!raw) {
    return [];
  }
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return [...unique];
}

function trimTrailingSlash(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value;
}

const ConfigSchema = z.object({
  projectName: z.string().min(1).default('Oil API'),
  apiPrefix: z
    .string()
    .regex(/^\/[^\s]*$/, 'API_PREFIX must start with "/"')
    .default('/api/v1')
    .transform(trimTrailingSlash),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8000),
  corsOrigins: z.array(z.string().min(1)).default(['http://localhost:3000']),
  databasePath: z.string().min(1).default(path.resolve('data/oil.sqlite')),
  auth: z.object({
    jwksUri: z.string().url().default(DEFAULT_JWKS_URI),
    // Seconds; a cached key set is reused for this long before refetching.
    jwksCacheTtlSeconds: z.coerce.number().int().positive().default(3600),
    jwksFetchTimeoutMs: z.coerce.number().int().positive().default(10_000),
    jwksFetchRetries: z.coerce.number().int().nonnegative().max(5).default(0),
    publicPaths: z.array(z.string().min(1)),
  }),
  storage: z.object({
    accessKeyId: z.string({ required_error: 'R2_ACCESS_KEY_ID is required' }).min(1),
    secretAccessKey: z.string({ required_error: 'R2_SECRET_ACCESS_KEY is required' }).min(1),
    bucketName: z.string({ required_error: 'R2_BUCKET_NAME is required' }).min(1),
    region: z.string().min(1).default('auto'),
    endpointUrl: z.string().url().default('https://r2.cloudflarestorage.com'),
    publicUrl: z.string({ required_error: 'R2_PUBLIC_URL is required' }).url().transform(trimTrailingSlash),
    presignedUrlExpiration: z.coerce.number().int().positive().default(20),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type StorageConfig = AppConfig['storage'];

export function defaultPublicPaths(apiPrefix: string): string[] {
  const prefix = trimTrailingSlash(apiPrefix);
  const paths = ['/', `${prefix}/health`, `${prefix}/ready`];
  return paths.flatMap((route) => [`GET ${route}`, `HEAD ${route}`]);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiPrefix = env.API_PREFIX ?? '/api/v1';
  const corsOrigins = parseEnvList(env.CORS_ORIGINS);
  const publicPaths = parseEnvList(env.AUTH_PUBLIC_PATHS);

  return ConfigSchema.parse({
    projectName: env.PROJECT_NAME,
    apiPrefix,
    host: env.HOST,
    port: env.PORT,
    corsOrigins: corsOrigins.length ? corsOrigins : undefined,
    databasePath: env.DATABASE_FILE,
    auth: {
      jwksUri: env.JWKS_URI,
      jwksCacheTtlSeconds: env.JWKS_CACHE_TTL_SECONDS,
      jwksFetchTimeoutMs: env.JWKS_FETCH_TIMEOUT_MS,
      jwksFetchRetries: env.JWKS_FETCH_RETRIES,
      publicPaths: publicPaths.length ? publicPaths : defaultPublicPaths(apiPrefix),
    },
    storage: {
      accessKeyId: env.R2_ACCESS_KEY_ID,
      secretAccessKey: env.R2_SECRET_ACCESS_KEY,
      bucketName: env.R2_BUCKET_NAME,
      region: env.R2_REGION,
      endpointUrl: env.R2_ENDPOINT_URL,
      publicUrl: env.R2_PUBLIC_URL,
      presignedUrlExpiration: env.R2_PRESIGNED_URL_EXPIRATION,
    },
  });
}
