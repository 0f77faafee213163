import type { FastifyInstance } from 'fastify';
import { pingDatabase, type BetterSqlite3Database } from '../db/index.js';

export const API_VERSION = '1.0.0';

interface RegisterHealthRouteOptions {
  prefix: string;
  projectName: string;
  db: BetterSqlite3Database;
}

export async function registerHealthRoute(app: FastifyInstance, options: RegisterHealthRouteOptions) {
  const { prefix, projectName, db } = options;

  app.get('/', async () => ({
    message: `Welcome to ${projectName}`,
    version: API_VERSION,
  }));

  app.get(`${prefix}/health`, async () => ({ status: 'ok', version: API_VERSION }));

  // Readiness probe: 200 once the database answers.
  app.get(`${prefix}/ready`, async (request, reply) => {
    try {
      pingDatabase(db);
      reply.code(200);
      return { status: 'ready' } as const;
    } catch (error) {
      request.log.error({ err: error }, 'Readiness check failed');
      reply.code(503);
      return { status: 'not-ready', error: error instanceof Error ? error.message : String(error) } as const;
    }
  });
}
