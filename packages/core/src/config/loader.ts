/**
 * Loading of `.tangle.yml` and merging with command-line overrides.
 *
 * Precedence: defaults < config file < flags.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import { configSchema, defaultConfig, toTangleConfig } from './schema.js';
import type { TangleConfig, Thresholds } from './schema.js';

export const CONFIG_FILENAME = '.tangle.yml';

/**
 * Resolve the config file path: an explicit `--config` path, or
 * `.tangle.yml` in the analysis root.
 */
export function resolveConfigPath(rootDir: string, explicitPath?: string): string {
  return explicitPath ? path.resolve(rootDir, explicitPath) : path.join(rootDir, CONFIG_FILENAME);
}

function readConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }

  try {
    return parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }
}

/**
 * Load and validate the configuration.
 * Returns defaults when no config file exists and none was asked for.
 *
 * @throws ConfigError when an explicit config file is missing, the YAML is
 *   malformed, or a value fails validation
 */
export function loadConfig(rootDir: string, explicitPath?: string): TangleConfig {
  const configPath = resolveConfigPath(rootDir, explicitPath);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
    }
    return defaultConfig();
  }

  const parsed = readConfigFile(configPath);
  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${configPath}:\n${issues}`, { path: configPath });
  }

  return toTangleConfig(result.data);
}

const THRESHOLD_KEYS: ReadonlyArray<keyof Thresholds> = [
  'cyclomaticLimit',
  'cognitiveLimit',
  'nestingLimit',
  'lineLimit',
];

const FLAG_NAMES: Record<keyof Thresholds, string> = {
  cyclomaticLimit: '--cyclomatic-limit',
  cognitiveLimit: '--cognitive-limit',
  nestingLimit: '--nesting-limit',
  lineLimit: '--line-limit',
};

/**
 * Apply command-line threshold overrides on top of the loaded configuration.
 *
 * @throws ConfigError if an override is not a positive integer
 */
export function applyThresholdOverrides(
  config: TangleConfig,
  overrides: Partial<Thresholds>
): TangleConfig {
  const thresholds: Thresholds = { ...config.thresholds };

  for (const key of THRESHOLD_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`${FLAG_NAMES[key]} must be a positive integer, got ${value}`, {
        option: FLAG_NAMES[key],
        value,
      });
    }
    thresholds[key] = value;
  }

  return { ...config, thresholds };
}
