import { z } from 'zod';

import { Logger } from './utils/logger.js';

/**
 * ServiceConfig schema. Everything the relay needs at runtime is read from the
 * environment once and validated here.
 *
 * - server: listen address and the public base URL used for push callbacks
 * - remote: where remote agents live and how to reach them
 * - session: idle expiry of session-held task records
 * - logging: level, format and request logging toggle
 */
export const ServiceConfigSchema = z.object({
  server: z.object({
    port: z.number().int().nonnegative().default(3000),
    host: z.string().default('0.0.0.0'),
    // When unset the callback base URL is derived from each create request
    publicUrl: z.string().url().optional(),
  }),

  remote: z.object({
    endpoint: z.string().url(),
    apiVersion: z.string().min(1).optional(),
    authToken: z.string().min(1).optional(),
  }),

  session: z.object({
    idleTimeoutMinutes: z.number().positive().default(20),
  }),

  logging: z.object({
    enabled: z.boolean().default(true),
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    structured: z.boolean().default(false),
  }),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  return value.toLowerCase() === 'true';
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Builds and validates the service config from environment variables.
 * Throws `Invalid configuration` after logging every schema issue.
 */
export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const rawConfig = {
    server: {
      port: parseNumber(env['PORT']),
      host: emptyToUndefined(env['HOST']),
      publicUrl: emptyToUndefined(env['PUBLIC_URL']),
    },
    remote: {
      endpoint: emptyToUndefined(env['ENDPOINT']),
      apiVersion: emptyToUndefined(env['API_VERSION']),
      authToken: emptyToUndefined(env['REMOTE_AUTH_TOKEN']),
    },
    session: {
      idleTimeoutMinutes: parseNumber(env['SESSION_IDLE_TIMEOUT_MINUTES']),
    },
    logging: {
      enabled: parseBoolean(env['LOG_ENABLED']),
      level: emptyToUndefined(env['LOG_LEVEL'])?.toLowerCase(),
      structured: parseBoolean(env['LOG_STRUCTURED']),
    },
  };

  const result = ServiceConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const logger = Logger.getInstance('Config');
    logger.error('Configuration validation failed');
    for (const issue of result.error.issues) {
      logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new Error('Invalid configuration');
  }
  return result.data;
}

class ConfigManager {
  private static instance: ConfigManager | undefined;
  private _config: ServiceConfig | undefined;

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public get(): ServiceConfig {
    if (!this._config) {
      this._config = loadServiceConfig();
    }
    return this._config;
  }
}

/**
 * Lazily loaded so that importing the module (e.g. for the type) never
 * requires a complete environment.
 */
export const getServiceConfig = (): ServiceConfig => ConfigManager.getInstance().get();
