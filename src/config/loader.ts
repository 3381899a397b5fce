/**
 * Newsdesk — Configuration Loader
 *
 * Reads config.json, validates it against AppConfigSchema (which also
 * fills in defaults) and applies environment overrides.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { resolve } from 'path';
import type { ZodError } from 'zod';
import { AppConfigSchema, type AppConfig } from '../types';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { parseLogLevel } from '../lib/logger';

export const DEFAULT_CONFIG_PATH = 'config/config.json';

/**
 * CLI flag first, then NEWSDESK_CONFIG, then the default path.
 */
export function resolveConfigPath(
  cliPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return resolve(cliPath ?? env.NEWSDESK_CONFIG ?? DEFAULT_CONFIG_PATH);
}

function formatZodError(error: ZodError): { message: string; configKey?: string } {
  const issue = error.issues[0];
  if (!issue) return { message: 'Invalid configuration' };

  const configKey = issue.path
    .map((segment, idx) => (typeof segment === 'number' ? `[${segment}]` : idx === 0 ? segment : `.${segment}`))
    .join('');

  return {
    message: configKey ? `${configKey}: ${issue.message}` : issue.message,
    configKey: configKey || undefined,
  };
}

/**
 * Validate an already-parsed object. Throws ConfigurationError.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);

  if (!result.success) {
    const { message, configKey } = formatZodError(result.error);
    throw new ConfigurationError(`Invalid configuration: ${message}`, configKey);
  }

  return result.data;
}

/**
 * LOG_LEVEL wins over logging.level from the file.
 */
export function applyEnvironment(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (!env.LOG_LEVEL) return config;

  return {
    ...config,
    logging: { ...config.logging, level: parseLogLevel(env.LOG_LEVEL, config.logging.level) },
  };
}

/**
 * Load, validate and default a configuration file.
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  if (!statSync(configPath).isFile()) {
    throw new ConfigurationError(`Configuration path is not a file: ${configPath}`);
  }

  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Configuration file not readable: ${errorMessage(error)}`);
  }

  if (!text.trim()) {
    throw new ConfigurationError(`Configuration file is empty: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration is not valid JSON: ${errorMessage(error)}`);
  }

  return applyEnvironment(parseConfig(raw), env);
}
