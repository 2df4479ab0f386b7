import Fastify, { FastifyInstance } from 'fastify';
import { config } from './config';
import type { LicenseEngine } from './engine';
import { registerLicenseRoutes } from './routes/license.routes';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('app');

export async function buildApp(engine: LicenseEngine): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own pino logger
  });

  // ─── API Routes ──────────────────────────────────────────
  registerLicenseRoutes(app, engine);

  app.setNotFoundHandler((_request, reply) => reply.status(404).send({ error: 'Not found' }));

  // ─── Global Error Handler ────────────────────────────────
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    log.error(
      {
        error: error.message,
        stack: error.stack,
        url: request.url,
        method: request.method,
      },
      'Unhandled error',
    );

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: config.isDev || statusCode < 500 ? error.message : 'Internal server error',
      ...(config.isDev && { stack: error.stack }),
    });
  });

  // ─── Health Check ────────────────────────────────────────
  app.get('/api/health', async () => ({
    status: 'ok',
    version: config.version,
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  }));

  await app.ready();
  return app;
}
