import { z } from 'zod';
import { createLogger } from './logger.js';

const logger = createLogger('config');

const ConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(3000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  xss: z.object({
    // Comma separated list; blank entries are dropped
    skipFields: z
      .string()
      .default('password')
      .transform((raw) => raw.split(',').map((field) => field.trim()).filter(Boolean)),
    maxMultipartParts: z.coerce.number().int().positive().default(100),
    filterResponses: z
      .enum(['true', 'false'])
      .default('true')
      .transform((raw) => raw === 'true'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

export function loadConfig(): Config {
  if (config) {
    return config;
  }

  try {
    const rawConfig = {
      port: process.env.PORT,
      logLevel: process.env.LOG_LEVEL,
      xss: {
        skipFields: process.env.XSS_SKIP_FIELDS,
        maxMultipartParts: process.env.XSS_MAX_MULTIPART_PARTS,
        filterResponses: process.env.XSS_FILTER_RESPONSES,
      },
    };

    config = ConfigSchema.parse(rawConfig);

    logger.info({ config }, 'Configuration loaded');
    return config;
  } catch (error) {
    logger.error({ error }, 'Failed to load configuration');
    throw new Error(`Configuration validation failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

export function getConfig(): Config {
  if (!config) {
    return loadConfig();
  }
  return config;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment.
 */
export function resetConfig(): void {
  config = null;
}
