import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { parseEntity } from './validation.js';
import type { Config } from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const configPath = join(__dirname, '../..', 'config', 'default.json');

/** Largest delay setTimeout accepts; longer delays fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const TimeoutSchema = z.number().int().positive().max(MAX_TIMEOUT_MS);

const ConfigSchema = z.object({
  n8n: z.object({
    baseUrl: z.string().url(),
    apiKey: z.string().min(1).optional(),
    timeout: TimeoutSchema,
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']),
  }),
});

let config: Config | null = null;

function readDefaults(): unknown {
  try {
    return JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to load config from ${configPath}: ${error}`, {
      cause: error,
    });
  }
}

/**
 * Legacy deployments point N8N_API_URL at the versioned API root
 */
function baseUrlFromEnv(env: NodeJS.ProcessEnv): string | undefined {
  if (env.N8N_BASE_URL) return env.N8N_BASE_URL;
  if (env.N8N_API_URL) return env.N8N_API_URL.replace(/\/api\/v1\/?$/, '');
  return undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const defaults = parseEntity(ConfigSchema, readDefaults(), 'config');

  // Apply environment variable overrides
  const merged = {
    n8n: {
      ...defaults.n8n,
      baseUrl: baseUrlFromEnv(env) ?? defaults.n8n.baseUrl,
      apiKey: env.N8N_API_KEY || defaults.n8n.apiKey,
      timeout: env.N8N_TIMEOUT_MS
        ? Number(env.N8N_TIMEOUT_MS)
        : defaults.n8n.timeout,
    },
    logging: {
      level: env.LOG_LEVEL ?? defaults.logging.level,
    },
  };

  return parseEntity(ConfigSchema, merged, 'config');
}

export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
