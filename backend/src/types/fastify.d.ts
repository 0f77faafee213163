import 'fastify';
import type { TokenClaims } from '../auth/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    auth?: TokenClaims;
  }
}
