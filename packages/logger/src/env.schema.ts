import { z } from 'zod';

import { LOG_LEVELS, type LogLevel } from './logger.js';

export const loggerEnvSchema = z.object({
  TXLEDGER_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => LOG_LEVELS.some((level) => level === val), {
      message: 'Invalid log level',
    })
    .default('warn'),
  TXLEDGER_LOG_COLOR: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('production'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}
