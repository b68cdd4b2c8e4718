/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema,
 * and returns a fully typed Config object or throws a ConfigError.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

/** Put `CHATWIRE_TOKEN` in place of the file's token, when set. */
function applyEnvironment(parsed: unknown, env: NodeJS.ProcessEnv): unknown {
  const token = env['CHATWIRE_TOKEN'];
  if (!token || typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return parsed;
  }
  return { ...parsed, token };
}

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @param env - Environment consulted for `CHATWIRE_TOKEN`
 * @returns A fully validated Config object
 * @throws ConfigError if the file cannot be read or validation fails
 */
export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Config {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const result = ConfigSchema.safeParse(applyEnvironment(parsed, env));

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  logger.info(
    {
      configPath: path,
      intents: result.data.gateway.intents,
      shardCount: result.data.gateway.shardCount ?? 'discovered',
    },
    'Config loaded successfully',
  );

  return result.data;
}

/**
 * Resolve the config file path.
 *
 * Priority:
 * 1. --config CLI argument
 * 2. CHATWIRE_CONFIG environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(cliPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (cliPath) {
    return cliPath;
  }

  const envPath = env['CHATWIRE_CONFIG'];
  if (envPath) {
    return envPath;
  }

  return DEFAULT_CONFIG_PATH;
}
