import cors from '@fastify/cors';
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { Authenticator } from './auth/bearer.js';
import type { AppConfig } from './config.js';
import { createOilRepository } from './db/oilRepository.js';
import type { BetterSqlite3Database } from './db/index.js';
import defaultLogger from './logger.js';
import { buildAuthHook } from './middleware/auth.js';
import { registerHealthRoute } from './routes/health.js';
import { registerOilRoutes } from './routes/oil.js';
import { createOilService } from './services/oilService.js';
import type { StorageClient } from './types/storage.js';
import { AppError, AuthError, sendError } from './utils/errors.js';

export interface BuildAppOptions {
  config: Pick<AppConfig, 'projectName' | 'apiPrefix' | 'corsOrigins' | 'auth'>;
  db: BetterSqlite3Database;
  storage: StorageClient;
  authenticator: Authenticator;
  logger?: FastifyBaseLogger;
}

function challengeFor(error: AuthError): string {
  return error.forbidden ? 'Bearer error="insufficient_scope"' : 'Bearer error="invalid_token"';
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, db, storage, authenticator } = options;
  const logger: FastifyBaseLogger = options.logger ?? defaultLogger;

  const app = Fastify({ logger });
  await app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type'],
  });

  app.setErrorHandler((error, request, reply) => {
    const context = { path: request.url, method: request.method };

    if (error instanceof AuthError) {
      request.log.error({ ...context, status: error.statusCode, reason: error.kind }, `Auth error: ${error.message}`);
      reply.header('WWW-Authenticate', challengeFor(error));
      return reply.send(sendError(reply, error.statusCode, error.code, error.message));
    }

    if (error instanceof AppError) {
      const level = error.statusCode >= 500 ? 'error' : 'info';
      request.log[level]({ ...context, status: error.statusCode, err: error }, error.message);
      return reply.send(sendError(reply, error.statusCode, error.code, error.message));
    }

    // Fastify's own client errors: malformed JSON, unsupported media type.
    const statusCode = error.statusCode;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      // Parse errors carry a status but not always a code.
      const code = typeof error.code === 'string' ? error.code : 'bad_request';
      return reply.send(sendError(reply, statusCode, code, error.message));
    }

    request.log.fatal({ ...context, err: error }, 'Unhandled exception');
    return reply.send(sendError(reply, 500, 'internal_error', 'Internal server error'));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.send(sendError(reply, 404, 'not_found', `Route ${request.method} ${request.url} not found`));
  });

  app.addHook('onRequest', buildAuthHook(authenticator, config.auth.publicPaths));

  const oilService = createOilService(createOilRepository(db), storage);

  await registerHealthRoute(app, { prefix: config.apiPrefix, projectName: config.projectName, db });
  await registerOilRoutes(app, { prefix: config.apiPrefix, oilService });

  return app;
}
