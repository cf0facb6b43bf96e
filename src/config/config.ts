/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { configSchema, type GclConfig } from './types.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

const CONFIG_DIR = '.gcl';
const CONFIG_FILE = 'config.json';
const DB_FILE = 'graph.db';

/**
 * Resolve the .gcl directory path from a given working directory.
 */
export function resolveGclDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

/**
 * Resolve the config.json path.
 */
export function resolveConfigPath(cwd: string): string {
  return path.join(resolveGclDir(cwd), CONFIG_FILE);
}

/**
 * Resolve the database path.
 */
export function resolveDbPath(cwd: string): string {
  return path.join(resolveGclDir(cwd), DB_FILE);
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk. Missing keys take their defaults.
 */
export function loadConfig(cwd: string): GclConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }

  return parseConfig(raw, configPath);
}

/**
 * Validate a raw config object, filling defaults.
 */
export function parseConfig(raw: unknown, source = 'config'): GclConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`, result.error);
  }
  return result.data;
}

export function saveConfig(cwd: string, config: GclConfig): void {
  const gclDir = resolveGclDir(cwd);
  if (!fs.existsSync(gclDir)) {
    fs.mkdirSync(gclDir, { recursive: true });
  }
  fs.writeFileSync(resolveConfigPath(cwd), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
