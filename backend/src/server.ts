import { buildApp } from './app.js';
import { createAuthenticator } from './auth/bearer.js';
import { createKeySetCache } from './auth/keySetCache.js';
import { createHttpKeySetFetcher } from './auth/keySetFetcher.js';
import { createTokenValidator } from './auth/tokenValidator.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db/index.js';
import logger from './logger.js';
import { createR2StorageClient } from './storage/r2StorageClient.js';

async function bootstrap() {
  const config = loadConfig();

  logger.info(
    {
      jwksUri: config.auth.jwksUri,
      jwksCacheTtlSeconds: config.auth.jwksCacheTtlSeconds,
      publicPaths: config.auth.publicPaths,
    },
    'Auth configuration loaded',
  );

  const db = openDatabase(config.databasePath);

  const keySets = createKeySetCache({
    fetcher: createHttpKeySetFetcher(config.auth.jwksUri, {
      timeoutMs: config.auth.jwksFetchTimeoutMs,
      retries: config.auth.jwksFetchRetries,
    }),
    ttlMs: config.auth.jwksCacheTtlSeconds * 1000,
  });
  const authenticator = createAuthenticator(createTokenValidator({ keySets }));
  const storage = createR2StorageClient(config.storage);

  const app = await buildApp({ config, db, storage, authenticator, logger });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => {
          db.close();
          process.exit(0);
        },
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, prefix: config.apiPrefix }, `${config.projectName} listening`);
}

bootstrap().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
