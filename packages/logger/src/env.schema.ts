import { z } from 'zod';

import { ConsoleSink } from './sinks/console.js';
import { initLogger, LOG_LEVELS, type LogLevel, type Sink } from './logger.js';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  RIVULET_LOG_COLOR: booleanString,
  RIVULET_LOG_CONSOLE: booleanString,
  RIVULET_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => (LOG_LEVELS as readonly string[]).includes(val), {
      message: `Invalid log level, expected one of: ${LOG_LEVELS.join(', ')}`,
    })
    .default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Configure the global logger from environment variables.
 * Extra sinks are always attached; the console sink only when RIVULET_LOG_CONSOLE=true.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env, extraSinks: Sink[] = []): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = [...extraSinks];
  if (config.RIVULET_LOG_CONSOLE) {
    sinks.push(new ConsoleSink({ color: config.RIVULET_LOG_COLOR }));
  }

  initLogger({ level: toLogLevel(config.RIVULET_LOG_LEVEL), sinks });
  return config;
}

function toLogLevel(value: string): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}
