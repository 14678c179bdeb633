/**
 * Configuration Store
 *
 * Manages the persistent YAML configuration.
 * Config file: $XDG_CONFIG_HOME/scribe/config.yml (~/.config/scribe/config.yml)
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigSchema, defaultConfig, type ScribeConfig } from './schema.js';
import { ConfigError } from '../commit/errors.js';
import type { Env } from '../llm/types.js';

/**
 * Get config file path
 *
 * `SCRIBE_CONFIG` overrides the location.
 */
export function getConfigPath(env: Env = process.env): string {
  if (env['SCRIBE_CONFIG']) {
    return env['SCRIBE_CONFIG'];
  }
  const base = env['XDG_CONFIG_HOME'] || join(homedir(), '.config');
  return join(base, 'scribe', 'config.yml');
}

/**
 * Parse and validate YAML configuration text
 *
 * @throws {ConfigError} If the YAML is malformed or a value is invalid
 */
export function parseConfig(text: string, source = 'config'): ScribeConfig {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Load configuration from file
 *
 * A missing file is created with the defaults.
 *
 * @throws {ConfigError} If the file can't be read or is invalid
 */
export function loadConfig(configPath: string = getConfigPath()): ScribeConfig {
  if (!existsSync(configPath)) {
    const config = defaultConfig();
    saveConfig(config, configPath);
    return config;
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read config file at ${configPath}`, { cause: error });
  }
  return parseConfig(content, `config file at ${configPath}`);
}

/**
 * Save configuration to file
 */
export function saveConfig(config: ScribeConfig, configPath: string = getConfigPath()): void {
  const dir = dirname(configPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(configPath, stringifyConfig(config), 'utf-8');
}

/**
 * Render configuration as YAML
 */
export function stringifyConfig(config: ScribeConfig): string {
  return stringifyYaml(config);
}

/**
 * Read a value by dotted key (e.g. `commit.maxLength`)
 */
export function getConfigValue(config: ScribeConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(current) || !(part in current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Return a copy of the configuration with one value replaced
 *
 * The string value is converted to the type of the current value: booleans,
 * numbers, and comma separated lists for arrays.
 *
 * @throws {ConfigError} If the key is unknown or the result is invalid
 */
export function setConfigValue(config: ScribeConfig, key: string, value: string): ScribeConfig {
  const parts = key.split('.');
  const last = parts.pop();
  const copy: unknown = structuredClone(config);

  let target: unknown = copy;
  for (const part of parts) {
    target = isRecord(target) ? target[part] : undefined;
  }
  if (!last || !isRecord(target) || !(last in target)) {
    throw new ConfigError(`Unknown config key "${key}"`);
  }

  target[last] = parseLiteral(value, target[last]);

  const result = ConfigSchema.safeParse(copy);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${key}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function parseLiteral(value: string, current: unknown): unknown {
  if (Array.isArray(current)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
  }
  if (typeof current === 'boolean') {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  }
  if (typeof current === 'number') {
    const n = Number(value);
    return value.trim() !== '' && !Number.isNaN(n) ? n : value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
