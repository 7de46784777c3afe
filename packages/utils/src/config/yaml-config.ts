/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from config.yaml with fallback to environment variables only
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';

/**
 * Raw, unvalidated contents of config.yaml
 */
export type YamlConfig = Record<string, unknown>;

let cachedConfig: YamlConfig | null = null;

/**
 * Load configuration from config.yaml
 *
 * Path resolution: explicit argument > CHARTLANE_CONFIG > ./config.yaml.
 * A missing file yields an empty object; an unparseable one is a ConfigurationError.
 */
export function loadConfigFromYaml(configPath?: string): YamlConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const resolvedPath = configPath || process.env.CHARTLANE_CONFIG || join(process.cwd(), 'config.yaml');

  if (!existsSync(resolvedPath)) {
    logger.debug('config.yaml not found, using environment variables only', { path: resolvedPath });
    cachedConfig = {};
    return cachedConfig;
  }

  let parsed: unknown;
  try {
    parsed = load(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError('Failed to parse config.yaml', 'CHARTLANE_CONFIG', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  if (parsed === undefined || parsed === null) {
    cachedConfig = {};
  } else if (typeof parsed === 'object' && !Array.isArray(parsed)) {
    cachedConfig = { ...parsed };
  } else {
    throw new ConfigurationError('config.yaml must contain a mapping at the top level', 'CHARTLANE_CONFIG', {
      path: resolvedPath,
    });
  }

  logger.info('Loaded configuration from config.yaml', { path: resolvedPath });
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearYamlConfigCache(): void {
  cachedConfig = null;
}
