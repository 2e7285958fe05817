import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { loadConfig, type AppConfig } from '../core/config.js';
import { registerReconstructRoutes } from './routes/reconstruct.js';
import { registerMetaRoutes } from './routes/meta.js';

/**
 * Build the HTTP API without listening, so tests can drive it with inject().
 */
export function buildServer(config: AppConfig = loadConfig()): FastifyInstance {
  const server = Fastify({ logger: false, bodyLimit: 10 * 1024 * 1024 });

  registerReconstructRoutes(server, config);
  registerMetaRoutes(server, config);

  // Global error handler
  server.setErrorHandler((error: FastifyError, _request, reply) => {
    // Malformed JSON, oversized bodies and the like keep fastify's 4xx status
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: { type: 'validation', message: error.message } });
    }
    console.error('Server error:', error.message);
    return reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}
