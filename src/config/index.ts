import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { errorMessage } from '../core/errors';
import { isObject } from '../core/json';
import { isLogLevel, Logger, defaultLogger } from '../core/logger';
import { MetaConfig } from '../types';

/**
 * Default configuration
 */
const DEFAULT_CONFIG: MetaConfig = {
  defaultFile: 'META.json',
  logLevel: 'warn',
  sha1Policy: 'warn',
  server: {
    port: 3000,
  },
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.pgxn-meta/config.yml',
  '.pgxn-meta/config.yaml',
  'pgxn-meta.yml',
  'pgxn-meta.yaml',
];

/**
 * Load configuration from file or use defaults
 */
export function loadConfig(basePath?: string, logger: Logger = defaultLogger): MetaConfig {
  const root = basePath || process.cwd();
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(root, p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: unknown = yaml.parse(content);
        return mergeConfig(DEFAULT_CONFIG, parsed, path.dirname(configPath));
      } catch (error) {
        const reason = errorMessage(error);
        logger.warn(`Warning: Failed to parse config at ${configPath}: ${reason}`);
      }
    }
  }

  return getDefaultConfig();
}

/**
 * Merge a parsed YAML document over the defaults. Keys of the wrong type
 * keep their default value.
 */
function mergeConfig(defaults: MetaConfig, override: unknown, configDir: string): MetaConfig {
  const merged = getDefaultConfig();
  if (!isObject(override)) {
    return merged;
  }

  if (typeof override.schemaDir === 'string') {
    // Relative schema directories are relative to the config file
    merged.schemaDir = path.resolve(configDir, override.schemaDir);
  }
  if (typeof override.defaultFile === 'string') {
    merged.defaultFile = override.defaultFile;
  }
  if (isLogLevel(override.logLevel)) {
    merged.logLevel = override.logLevel;
  }
  if (override.sha1Policy === 'accept' || override.sha1Policy === 'warn') {
    merged.sha1Policy = override.sha1Policy;
  }
  if (isObject(override.server) && typeof override.server.port === 'number') {
    merged.server = { port: override.server.port };
  } else {
    merged.server = { ...defaults.server };
  }

  return merged;
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): MetaConfig {
  return {
    ...DEFAULT_CONFIG,
    server: { ...DEFAULT_CONFIG.server },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: MetaConfig): string[] {
  const errors: string[] = [];

  if (!config.defaultFile) {
    errors.push('defaultFile must not be empty.');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`Invalid log level: ${String(config.logLevel)}.`);
  }

  if (
    !Number.isInteger(config.server.port) ||
    config.server.port < 0 ||
    config.server.port > 65535
  ) {
    errors.push(`Invalid server port: ${config.server.port}. Must be between 0 and 65535.`);
  }

  if (config.schemaDir !== undefined && !fs.existsSync(config.schemaDir)) {
    errors.push(`Schema directory ${config.schemaDir} does not exist.`);
  }

  return errors;
}
