import * as dotenv from 'dotenv';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from './core/errors.js';
import { DEFAULT_SETTINGS } from './core/entities/Settings.js';
import { THINK_MODES, ThinkModeName } from './core/templates/ThinkModes.js';
import { TemplateFactory } from './core/templates/TemplateFactory.js';
import type { ThinkModePolicy } from './core/templates/types.js';
import { DEFAULT_COMPLETIONS_URL } from './infrastructure/http/wire.js';
import { DEFAULT_TIMEOUT_MS } from './infrastructure/http/CompletionsApiClient.js';
import { DEFAULT_RETRY_CONFIG } from './utils/retry.js';
import { createLogger, setLogLevel } from './utils/logger.js';

export const API_KEY_ENV = 'NAI_API_KEY';
export const TOKEN_FILE_NAME = '.naitoken';

const logger = createLogger('config');

export type ThinkModeSetting = ThinkModeName | 'auto';

export interface Config {
  apiKey?: string;
  endpoint: string;
  model: string;
  maxTokens: number;
  temperature: number;
  thinking: boolean;
  thinkMode: ThinkModeSetting;
  retry: {
    maxAttempts: number;
    delayMs: number;
  };
  timeoutMs: number;
  debug: boolean;
}

// Zod validation schema
const ConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  endpoint: z.string().url('Invalid completions endpoint URL'),
  model: z.string().min(1, 'Model must not be empty'),
  maxTokens: z.number().int().min(1),
  temperature: z.number().min(0).max(2),
  thinking: z.boolean(),
  thinkMode: z.enum(['auto', 'glm46', 'glm47', 'none']),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    delayMs: z.number().int().min(0).max(60000),
  }),
  timeoutMs: z.number().int().min(0),
  debug: z.boolean(),
});

export interface ApiKeySources {
  /** Highest priority, e.g. a value passed by the caller */
  explicit?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  cwd?: string;
}

/**
 * Find the API token
 * Priority: explicit value > NAI_API_KEY > ~/.naitoken > ./.naitoken
 */
export function resolveApiKey(sources: ApiKeySources = {}): string | undefined {
  const explicit = sources.explicit?.trim();
  if (explicit) return explicit;

  const fromEnv = (sources.env ?? process.env)[API_KEY_ENV]?.trim();
  if (fromEnv) return fromEnv;

  const candidates = [
    path.join(sources.homeDir ?? os.homedir(), TOKEN_FILE_NAME),
    path.join(sources.cwd ?? process.cwd(), TOKEN_FILE_NAME),
  ];

  for (const file of candidates) {
    const token = readTokenFile(file);
    if (token) return token;
  }

  return undefined;
}

function readTokenFile(file: string): string | undefined {
  if (!fs.existsSync(file)) return undefined;

  try {
    return fs.readFileSync(file, 'utf8').trim() || undefined;
  } catch (error) {
    logger.warn('Token file not readable', { file, error: describeError(error) });
    return undefined;
  }
}

export interface LoadConfigOptions extends ApiKeySources {
  /** Load .env from the working directory first. Default: true */
  loadDotenv?: boolean;
}

/**
 * Build configuration from the environment.
 * Side effects: reads .env into process.env, probes token files, and
 * raises the log level when DEBUG=true.
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  if (options.loadDotenv ?? true) {
    dotenv.config();
  }

  const env = options.env ?? process.env;

  const getString = (envKey: string, defaultValue: string): string => env[envKey] || defaultValue;

  const getBoolean = (envKey: string, defaultValue: boolean): boolean => {
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (envKey: string, defaultValue: number): number => {
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    apiKey: resolveApiKey({ ...options, env }),
    endpoint: getString('COMPLETIONS_ENDPOINT', DEFAULT_COMPLETIONS_URL),
    model: getString('COMPLETIONS_MODEL', DEFAULT_SETTINGS.model),
    maxTokens: getNumber('COMPLETIONS_MAX_TOKENS', DEFAULT_SETTINGS.maxTokens),
    temperature: getNumber('COMPLETIONS_TEMPERATURE', DEFAULT_SETTINGS.temperature),
    thinking: getBoolean('COMPLETIONS_THINKING', DEFAULT_SETTINGS.thinking),
    thinkMode: getString('COMPLETIONS_THINK_MODE', 'auto'),
    retry: {
      maxAttempts: getNumber('RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_CONFIG.maxAttempts),
      delayMs: getNumber('RETRY_DELAY_MS', DEFAULT_RETRY_CONFIG.initialDelayMs),
    },
    timeoutMs: getNumber('COMPLETIONS_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    debug: getBoolean('DEBUG', false),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`
    );
    logger.error('Configuration validation failed', { problems });
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const config = result.data;
  if (config.debug) {
    setLogLevel('debug');
  }

  logger.debug('Configuration loaded', {
    endpoint: config.endpoint,
    model: config.model,
    thinkMode: config.thinkMode,
    hasApiKey: config.apiKey !== undefined,
  });

  return config;
}

/**
 * Turn the configured think-mode name into a policy; 'auto' follows the model
 */
export function thinkModeFor(config: Pick<Config, 'thinkMode' | 'model'>): ThinkModePolicy {
  return config.thinkMode === 'auto'
    ? TemplateFactory.detectThinkMode(config.model)
    : THINK_MODES[config.thinkMode];
}
