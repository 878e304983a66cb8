import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { ContentGateConfig, ErrorPolicy } from '../types';
import { defaultLogger, Logger } from '../core/logger';

/**
 * Default configuration for content-gate
 */
const DEFAULT_CONFIG: ContentGateConfig = {
  contentDir: 'content',
  extensions: ['.md'],
  onError: ErrorPolicy.Skip,
  includeDrafts: false,
  buildFuture: true,
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = [
  '.content-gate/config.yml',
  '.content-gate/config.yaml',
  'content-gate.yml',
  'content-gate.yaml',
];

/**
 * Load configuration from file or use defaults
 */
export function loadConfig(basePath?: string, logger: Logger = defaultLogger): ContentGateConfig {
  const searchPaths = CONFIG_PATHS.map((p) => path.resolve(basePath || process.cwd(), p));

  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: Partial<ContentGateConfig> | null = yaml.parse(content);
        return mergeConfig(DEFAULT_CONFIG, parsed ?? {});
      } catch (error) {
        logger.warn(`Warning: Failed to parse config at ${configPath}: ${error}`);
      }
    }
  }

  return getDefaultConfig();
}

/**
 * Merge configuration with defaults; keys present in the file win
 */
function mergeConfig(
  defaults: ContentGateConfig,
  override: Partial<ContentGateConfig>
): ContentGateConfig {
  return {
    contentDir: override.contentDir ?? defaults.contentDir,
    // Replace the extension list completely if provided
    extensions: override.extensions ?? [...defaults.extensions],
    onError: override.onError ?? defaults.onError,
    includeDrafts: override.includeDrafts ?? defaults.includeDrafts,
    buildFuture: override.buildFuture ?? defaults.buildFuture,
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): ContentGateConfig {
  return {
    ...DEFAULT_CONFIG,
    extensions: [...DEFAULT_CONFIG.extensions],
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ContentGateConfig): string[] {
  const errors: string[] = [];
  const policies: string[] = Object.values(ErrorPolicy);

  if (typeof config.contentDir !== 'string' || config.contentDir.trim() === '') {
    errors.push('contentDir must be a non-empty path.');
  }

  if (
    !Array.isArray(config.extensions) ||
    config.extensions.length === 0 ||
    !config.extensions.every((ext) => typeof ext === 'string' && ext.startsWith('.'))
  ) {
    errors.push('extensions must be a non-empty list of extensions starting with ".".');
  }

  if (!policies.includes(config.onError)) {
    errors.push(`Invalid onError policy: ${config.onError}. Must be one of ${policies.join(', ')}.`);
  }

  if (typeof config.includeDrafts !== 'boolean') {
    errors.push('includeDrafts must be true or false.');
  }

  if (typeof config.buildFuture !== 'boolean') {
    errors.push('buildFuture must be true or false.');
  }

  return errors;
}
