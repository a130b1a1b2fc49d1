import path from 'path';
import { z } from 'zod';

export interface AppConfig {
  env: { nodeEnv: string; isDevelopment: boolean; isTest: boolean; isProduction: boolean };
  port: number;
  host: string;
  logLevel: string;
  storage: { root: string };
  reactRoles: {
    bindingsFile: string;
    maxProcessedPerSecond: number;
    maxForbiddenAttempts: number;
  };
  discord: { botToken?: string };
  admin: { token?: string };
}

const NonNegativeInt = z.coerce.number().int().min(0);
const NonNegativeNumber = z.coerce.number().finite().min(0);

// Mutable singleton: populated by initConfig() before the engine and routes start
export let config: AppConfig;

export function initConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  const storageRoot = env.STORAGE_ROOT || './data';

  config = {
    env: {
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isTest: nodeEnv === 'test',
      isProduction: nodeEnv === 'production',
    },
    port: parseNumber('PORT', env.PORT, 3000, NonNegativeInt),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    storage: { root: storageRoot },
    reactRoles: {
      bindingsFile: env.REACT_ROLES_FILE || path.join(storageRoot, 'react_roles', 'config.json'),
      maxProcessedPerSecond: parseNumber('REACT_ROLES_MAX_PER_SECOND', env.REACT_ROLES_MAX_PER_SECOND, 5, NonNegativeNumber),
      maxForbiddenAttempts: parseNumber('REACT_ROLES_MAX_FORBIDDEN_ATTEMPTS', env.REACT_ROLES_MAX_FORBIDDEN_ATTEMPTS, 3, NonNegativeInt),
    },
    discord: { botToken: env.DISCORD_BOT_TOKEN || undefined },
    admin: { token: env.ADMIN_TOKEN || undefined },
  };
  return config;
}

function parseNumber(name: string, raw: string | undefined, fallback: number, schema: z.ZodNumber): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const kind = schema.isInt ? 'integer' : 'number';
    throw new Error(`${name} must be a non-negative ${kind}, got "${raw}"`);
  }
  return parsed.data;
}
