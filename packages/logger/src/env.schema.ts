import { z } from 'zod';

import { LOG_LEVELS, type LogLevel } from './logger.js';

const isLogLevel = (val: string): val is LogLevel => LOG_LEVELS.some((level) => level === val);

// Define environment schema
export const loggerEnvSchema = z.object({
  LOGGER_COLOR: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isLogLevel, { message: 'Invalid log level' })
    .default('info'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1, { message: 'Invalid service name' }).default('retryline'),
  LOGGER_SINK: z.enum(['console', 'pino', 'none']).default('pino'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

// Infer TypeScript type from schema
export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables. Throws a ZodError listing every invalid variable.
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
