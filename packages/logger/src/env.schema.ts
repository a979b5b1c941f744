import { z } from 'zod';

import { LOG_LEVELS } from './logger.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true' || val === '1');

/**
 * LOGGER_* variables, read after `.env` is loaded. `--verbose` overrides the level.
 */
export const loggerEnvSchema = z.object({
  LOGGER_FILE_LOG_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_PATH: z.string().trim().min(1, { message: 'Invalid file log path' }).default('logs/soundness.log'),
  LOGGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;
