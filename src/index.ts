import { buildApp } from './app';
import { config } from './config';
import { openDatabase } from './db';
import { createLicenseEngine } from './engine';
import type { SchedulerWarning } from './services/scheduler.service';
import { logger } from './utils/logger';

async function main(): Promise<void> {
  logger.info(`Water Balance license engine v${config.version}`);

  // ─── Initialize Database ──────────────────────────────────
  const database = openDatabase(config.db.path);

  // ─── Initialize Services ──────────────────────────────────
  const engine = createLicenseEngine({ db: database.db });

  const startup = await engine.validator.validateStartup();
  if (startup.ok) {
    logger.info({ state: startup.value.state, recovered: startup.value.recovered }, startup.value.message);
    for (const warning of startup.value.warnings) logger.warn(warning);
  } else {
    // The shell reads the blocking reason from /api/license/status
    logger.warn({ code: startup.error.code, terminal: startup.error.terminal }, startup.error.message);
  }

  engine.scheduler.on('warning', (warning: SchedulerWarning) => {
    logger.warn({ source: 'background' }, warning.message);
  });
  await engine.scheduler.start();

  // ─── Build and Start HTTP Server ──────────────────────────
  const app = await buildApp(engine);

  try {
    await app.listen({ port: config.api.port, host: config.api.host });
    logger.info(`License API listening at http://${config.api.host}:${config.api.port}/api`);
  } catch (error) {
    logger.fatal({ error }, 'Failed to start license API');
    process.exit(1);
  }

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
      engine.scheduler.stop();
      await app.close();
      await engine.registry.flush();
      database.close();

      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}

main().catch((error) => {
  logger.fatal({ error }, 'Failed to start application');
  process.exit(1);
});
