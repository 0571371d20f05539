// ============================================================================
// RUTA: src/shared/logger/pino.ts
// ============================================================================

import pinoLogger, { type Bindings, type Logger, type LoggerOptions, type TransportTargetOptions } from 'pino';

import { env } from '@/shared/config/env';

const isDevelopment = env.NODE_ENV === 'development';

const options: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: {
    env: env.NODE_ENV,
  },
  redact: {
    paths: ['token', 'client.token', 'interaction.token'],
    remove: true,
  },
};

const targets: TransportTargetOptions[] = [];

if (isDevelopment) {
  targets.push({
    target: 'pino-pretty',
    level: env.LOG_LEVEL,
    options: {
      colorize: true,
      translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
      ignore: 'pid,hostname',
    },
  });
}

if (env.LOG_FILE) {
  if (!isDevelopment) {
    targets.push({ target: 'pino/file', level: env.LOG_LEVEL, options: { destination: 1 } });
  }

  targets.push({
    target: 'pino/file',
    level: env.LOG_LEVEL,
    options: { destination: env.LOG_FILE, mkdir: true },
  });
}

if (targets.length > 0) {
  options.transport = { targets };
}

export const logger = pinoLogger(options);

export const createChildLogger = (bindings: Bindings): Logger => logger.child(bindings);
