import { existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';
import { Value } from '@sinclair/typebox/value';
import { ConfigSchema, type Config } from './config.js';
import type { ApiKeys, SearchClientSettings } from './types.js';
import { logger } from './logger.js';

type Env = Readonly<Record<string, string | undefined>>;

// Config key -> environment variable
const ENV_VARIABLES: Record<keyof Config, string> = {
  endpoint: 'BING_SEARCH_ENDPOINT',
  requestDelay: 'DEFAULT_REQUEST_DELAY',
  maxRetries: 'MAX_RETRY_ATTEMPTS',
  maxImagesPerSearch: 'MAX_IMAGES_PER_SEARCH',
  defaultMinWidth: 'DEFAULT_IMAGE_MIN_WIDTH',
  defaultMinHeight: 'DEFAULT_IMAGE_MIN_HEIGHT',
};

/**
 * Load variables from a .env file into process.env, if the file exists.
 * Variables already set in the environment are not overridden.
 */
export function loadEnvFile(path: string = '.env'): boolean {
  const envPath = resolve(path);
  if (!existsSync(envPath)) {
    logger.warn(`No .env file found at ${envPath}, using default environment`);
    return false;
  }

  logger.info(`Loading environment from ${envPath}`);
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw result.error;
  }
  return true;
}

/**
 * Load configuration from environment variables.
 * Strings are converted to the schema's types; missing or invalid values fall back to defaults.
 */
export function loadConfig(env: Env = process.env): Config {
  const raw: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const converted = Value.Convert(ConfigSchema, raw);
  if (!Value.Check(ConfigSchema, Value.Default(ConfigSchema, Value.Clone(converted)))) {
    logger.warn('Some configuration values are invalid and were replaced with defaults');
  }

  return Value.Cast(ConfigSchema, converted);
}

/**
 * Load API keys from environment variables
 */
export function loadApiKeys(env: Env = process.env): ApiKeys {
  return {
    bingSearchApiKey: env.BING_SEARCH_API_KEY || undefined,
  };
}

/**
 * Check that the configuration can build a client.
 * Returns the list of problems (empty when valid).
 */
export function validateConfig(config: Config, apiKeys: ApiKeys): string[] {
  const problems: string[] = [];

  if (!apiKeys.bingSearchApiKey) {
    problems.push('BING_SEARCH_API_KEY is not set in environment or .env file');
  }
  if (!config.endpoint) {
    problems.push('BING_SEARCH_ENDPOINT is not set in environment or .env file');
  }

  for (const problem of problems) {
    logger.error(problem);
  }
  return problems;
}

export function createClientSettings(config: Config, apiKeys: ApiKeys): SearchClientSettings {
  return {
    apiKey: apiKeys.bingSearchApiKey,
    endpoint: config.endpoint,
    requestDelay: config.requestDelay,
    maxRetries: config.maxRetries,
  };
}
