/**
 * Configuration management for the menu-search MCP server
 * Loads settings from environment variables with sensible defaults
 */

import * as fs from 'fs';
import * as path from 'path';

export interface Config {
  rootDir: string;
  /** LRU bound for each matcher cache; 0 means unbounded */
  maxCacheEntries: number;
  debug: boolean;
  /** Default result limit for rank_matches and search_items */
  resultLimit: number;
}

export const DEFAULT_MAX_CACHE_ENTRIES = 10000;
export const DEFAULT_RESULT_LIMIT = 20;

/**
 * Load a .env file into the environment without overriding existing values
 */
export function loadEnvFile(rootDir: string, env: NodeJS.ProcessEnv = process.env): void {
  const envPath = path.join(rootDir, '.env');

  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, 'utf-8');
    const lines = envContent.split('\n');

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;

      const [key, ...valueParts] = trimmed.split('=');
      const value = valueParts.join('=').trim();

      if (key && env[key.trim()] === undefined) {
        env[key.trim()] = value;
      }
    }
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rootDir = env.MENU_SEARCH_ROOT || process.cwd();

  // Load .env file first
  loadEnvFile(rootDir, env);

  const debugFlag = (env.MENU_SEARCH_DEBUG || '').trim().toLowerCase();

  return {
    rootDir,
    maxCacheEntries: parseInt(env.MENU_SEARCH_MAX_CACHE_ENTRIES || String(DEFAULT_MAX_CACHE_ENTRIES), 10),
    debug: debugFlag === 'true' || debugFlag === '1',
    resultLimit: parseInt(env.MENU_SEARCH_RESULT_LIMIT || String(DEFAULT_RESULT_LIMIT), 10),
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.rootDir) {
    errors.push('MENU_SEARCH_ROOT is required');
  }

  if (!Number.isInteger(config.maxCacheEntries) || config.maxCacheEntries < 0) {
    errors.push('MENU_SEARCH_MAX_CACHE_ENTRIES must be a non-negative integer (0 = unbounded)');
  }

  if (!Number.isInteger(config.resultLimit) || config.resultLimit < 1) {
    errors.push('MENU_SEARCH_RESULT_LIMIT must be at least 1');
  }

  return errors;
}

/**
 * Replace the settings validateConfig rejects with their defaults
 */
export function withConfigDefaults(config: Config): Config {
  return {
    rootDir: config.rootDir || process.cwd(),
    maxCacheEntries:
      Number.isInteger(config.maxCacheEntries) && config.maxCacheEntries >= 0
        ? config.maxCacheEntries
        : DEFAULT_MAX_CACHE_ENTRIES,
    debug: config.debug,
    resultLimit:
      Number.isInteger(config.resultLimit) && config.resultLimit >= 1
        ? config.resultLimit
        : DEFAULT_RESULT_LIMIT,
  };
}
