import { z } from 'zod';

import { initLogger, LOG_LEVELS } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_COLOR: booleanFlag('false'),
  LOGGER_CONSOLE_ENABLED: booleanFlag('false'),
  LOGGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}

/**
 * Configure the global logger from LOGGER_* variables.
 * With the console disabled the logger stays silent.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);

  initLogger({
    level: config.LOGGER_LOG_LEVEL,
    sinks: config.LOGGER_CONSOLE_ENABLED ? [new ConsoleSink({ color: config.LOGGER_CONSOLE_COLOR })] : [],
  });

  return config;
}
