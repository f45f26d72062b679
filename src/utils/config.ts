/**
 * Configuration loading and validation for sitewatch
 *
 * Reads config.yaml (path from --config, SITEWATCH_CONFIG_PATH, or the CWD),
 * substitutes ${VAR} references from the environment and validates the
 * result. Any problem is reported as a single ConfigError listing every issue.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors';
import { MAX_SUBSCRIBER_CAP } from '../subscribers/store';
import type { Config } from '../types';
import { createLogger } from './logger';

const logger = createLogger('config');

dotenvConfig();

const REQUIRED_KEYS = [
  'bot_token',
  'admin_id',
  'database_path',
  'url_check_delay',
  'urls_to_check',
] as const;

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveConfigPath(customPath?: string, env = process.env): string {
  if (customPath?.trim()) return resolveUserPath(customPath);
  const override = env.SITEWATCH_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return resolve('config.yaml');
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
      return env[varName] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((value) => substituteEnvVars(value, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

// =============================================================================
// SCHEMA
// =============================================================================

// YAML is parsed with intAsBigInt so that snowflake ids keep every digit.
const integer = z
  .union([z.number(), z.bigint(), z.string().regex(/^\d+$/, 'must be an integer')])
  .transform((value) => Number(value))
  .pipe(z.number().int('must be an integer'));

const snowflake = z
  .union([z.string(), z.bigint(), z.number().int()])
  .transform((value) => String(value).trim())
  .pipe(z.string().regex(/^\d+$/, 'must be a numeric Discord id'));

const nonEmpty = z.string().trim().min(1, 'must not be empty');

const urlList = z
  .array(z.string().trim().url('must be a valid URL'), {
    invalid_type_error: 'must be a non-empty list',
  })
  .min(1, 'must be a non-empty list')
  .transform((urls) => [...new Set(urls)]);

const configSchema = z.object({
  bot_token: nonEmpty,
  admin_id: snowflake,
  application_id: z.preprocess((value) => (value === '' ? undefined : value), snowflake.optional()),
  database_path: nonEmpty,
  url_check_delay: integer.pipe(z.number().positive('must be greater than 0')),
  urls_to_check: urlList,
  probe_timeout: integer.pipe(z.number().positive('must be greater than 0')).default(10),
  probe_method: z.enum(['HEAD', 'GET']).default('HEAD'),
  notify_on: z.enum(['every-check', 'transition']).default('every-check'),
  dispatch_mode: z.enum(['inline', 'batched']).default('inline'),
  delivery_concurrency: integer.pipe(z.number().min(1).max(50)).default(1),
  max_subscribers: integer.pipe(z.number().min(1).max(MAX_SUBSCRIBER_CAP)).default(MAX_SUBSCRIBER_CAP),
});

type RawConfig = z.infer<typeof configSchema>;

function formatIssues(error: z.ZodError, skipKeys: Set<string>): string[] {
  return error.issues
    .filter((issue) => !skipKeys.has(String(issue.path[0])))
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function toConfig(raw: RawConfig): Config {
  return {
    botToken: raw.bot_token,
    adminId: raw.admin_id,
    applicationId: raw.application_id,
    databasePath: resolveUserPath(raw.database_path),
    urlCheckDelay: raw.url_check_delay,
    urlsToCheck: raw.urls_to_check,
    probe: {
      timeout: raw.probe_timeout,
      method: raw.probe_method,
    },
    notifyOn: raw.notify_on,
    dispatchMode: raw.dispatch_mode,
    deliveryConcurrency: raw.delivery_concurrency,
    maxSubscribers: raw.max_subscribers,
  };
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Validate an already-parsed config document.
 */
export function parseConfig(document: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  if (!document || typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError('Config must be a YAML mapping', ['root: expected a mapping of keys']);
  }

  const substituted = substituteEnvVars(document, env);
  const values = new Map<string, unknown>(
    substituted && typeof substituted === 'object' ? Object.entries(substituted) : [],
  );
  const missing = REQUIRED_KEYS.filter((key) => values.get(key) === undefined || values.get(key) === null);
  const issues = missing.map((key) => `missing required configuration parameter: ${key}`);

  const result = configSchema.safeParse(substituted);
  if (!result.success) {
    issues.push(...formatIssues(result.error, new Set<string>(missing)));
  }
  if (issues.length > 0 || !result.success) {
    throw new ConfigError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, issues);
  }
  return toConfig(result.data);
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const configPath = resolveConfigPath(customPath, env);

  if (!existsSync(configPath)) {
    throw new ConfigError(
      `The config file is missing: ${configPath}. Copy config.example.yaml and fill it in.`,
      [`file not found: ${configPath}`],
    );
  }

  let document: unknown;
  try {
    document = YAML.parse(readFileSync(configPath, 'utf-8'), { intAsBigInt: true });
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorMessage(err)}`, [errorMessage(err)], {
      cause: err,
    });
  }

  const config = parseConfig(document, env);
  logger.debug({ configPath, urls: config.urlsToCheck.length }, 'Config loaded');
  return config;
}
