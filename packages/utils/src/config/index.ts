/**
 * Configuration loading
 *
 * Merges defaults, config.yaml and environment variables into one validated
 * configuration object. Priority: environment > config.yaml > defaults.
 */

import { join } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml, clearYamlConfigCache } from './yaml-config.js';

export { loadConfigFromYaml, clearYamlConfigCache } from './yaml-config.js';

export const RegistryConfigSchema = z.object({
  /** Directory of the file-backed key-value store holding integrity records */
  dir: z.string().min(1),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  initialDelayMs: z.number().int().min(0),
});

export const DiagnosticsConfigSchema = z.object({
  /** Populate LoadError.technicalDetail */
  verbose: z.boolean(),
});

export const ChartlaneConfigSchema = z.object({
  registry: RegistryConfigSchema,
  retry: RetryConfigSchema,
  diagnostics: DiagnosticsConfigSchema,
});

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type DiagnosticsConfig = z.infer<typeof DiagnosticsConfigSchema>;
export type ChartlaneConfig = z.infer<typeof ChartlaneConfigSchema>;

const PartialConfigSchema = z
  .object({
    registry: RegistryConfigSchema.partial().optional(),
    retry: RetryConfigSchema.partial().optional(),
    diagnostics: DiagnosticsConfigSchema.partial().optional(),
  })
  .passthrough();

export function getDefaultConfig(): ChartlaneConfig {
  return {
    registry: { dir: join(process.cwd(), 'data', 'integrity') },
    retry: { maxRetries: 4, initialDelayMs: 100 },
    diagnostics: { verbose: false },
  };
}

function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (['1', 'true', 'yes', 'on'].includes(value.toLowerCase())) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(value.toLowerCase())) {
    return false;
  }
  throw new ConfigurationError(`${name} must be a boolean`, name, { value });
}

function parseIntegerEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer`, name, { value });
  }
  return parsed;
}

let cachedConfig: ChartlaneConfig | null = null;

/**
 * Load the pipeline configuration
 */
export function loadConfig(configPath?: string): ChartlaneConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const yamlResult = PartialConfigSchema.safeParse(loadConfigFromYaml(configPath));
  if (!yamlResult.success) {
    throw new ConfigurationError('Invalid config.yaml', 'CHARTLANE_CONFIG', {
      issues: yamlResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  const fromYaml = yamlResult.data;
  const defaults = getDefaultConfig();

  const {
    CHARTLANE_REGISTRY_DIR,
    CHARTLANE_VERBOSE,
    CHARTLANE_MAX_RETRIES,
    CHARTLANE_INITIAL_DELAY_MS,
  } = process.env;

  const merged = {
    registry: {
      dir: CHARTLANE_REGISTRY_DIR || fromYaml.registry?.dir || defaults.registry.dir,
    },
    retry: {
      maxRetries:
        parseIntegerEnv('CHARTLANE_MAX_RETRIES', CHARTLANE_MAX_RETRIES) ??
        fromYaml.retry?.maxRetries ??
        defaults.retry.maxRetries,
      initialDelayMs:
        parseIntegerEnv('CHARTLANE_INITIAL_DELAY_MS', CHARTLANE_INITIAL_DELAY_MS) ??
        fromYaml.retry?.initialDelayMs ??
        defaults.retry.initialDelayMs,
    },
    diagnostics: {
      verbose:
        parseBooleanEnv('CHARTLANE_VERBOSE', CHARTLANE_VERBOSE) ??
        fromYaml.diagnostics?.verbose ??
        defaults.diagnostics.verbose,
    },
  };

  const result = ChartlaneConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', undefined, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  clearYamlConfigCache();
}
