import pino from 'pino';
import path from 'path';
import fs from 'fs';
import { config } from '../config';

function buildLogger(): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    serializers: {
      err: pino.stdSerializers.err,
    },
    base: {
      version: config.version,
    },
  };

  // Tests log nowhere; the transports below spawn worker threads
  if (config.isTest) {
    return pino({ ...options, level: 'silent' });
  }

  fs.mkdirSync(config.paths.logs, { recursive: true });

  const targets: pino.TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
      level: config.isDev ? 'debug' : 'info',
    },
    {
      target: 'pino/file',
      options: {
        destination: path.join(config.paths.logs, 'app.log'),
        mkdir: true,
      },
      level: 'info',
    },
    {
      target: 'pino/file',
      options: {
        destination: path.join(config.paths.logs, 'error.log'),
        mkdir: true,
      },
      level: 'error',
    },
  ];

  return pino({ ...options, transport: { targets } });
}

export const logger = buildLogger();

export function createChildLogger(name: string): pino.Logger {
  return logger.child({ module: name });
}
