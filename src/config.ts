/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { DEFAULT_ACCESS, isValidAccess } from './access-byte.js';
import { AppError, LogLevel, isLogLevel, logger } from './logger.js';
import { MetadataBackend } from './types.js';

export interface MetadataConfig {
  backend: MetadataBackend;
  defaultAccess: string;
}

export interface TextConfig {
  lossy: boolean;
}

export interface ToolsConfig {
  cadius: string;
  runner: string;
  extractCommand?: string;
}

export interface VolumeConfig {
  name: string;
}

export interface AppConfig {
  metadata: MetadataConfig;
  text: TextConfig;
  tools: ToolsConfig;
  volume: VolumeConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_PATH = './prodos-tools.yaml';

export const DEFAULT_CONFIG: AppConfig = {
  metadata: {
    backend: 'xattr',
    defaultAccess: DEFAULT_ACCESS
  },
  text: {
    lossy: false
  },
  tools: {
    cadius: 'cadius',
    runner: 'build/prodos8emu_run'
  },
  volume: {
    name: 'EDASM'
  },
  logLevel: 'info'
};

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/**
 * Overlay recognised keys from an untrusted document onto `base`.
 * Keys of the wrong type keep the base value.
 */
function mergeConfig(base: AppConfig, raw: unknown): AppConfig {
  if (!isRecord(raw)) return cloneConfig(base);

  const metadata = section(raw, 'metadata');
  const text = section(raw, 'text');
  const tools = section(raw, 'tools');
  const volume = section(raw, 'volume');

  const backend = metadata.backend === 'xattr' || metadata.backend === 'sidecar'
    ? metadata.backend
    : base.metadata.backend;
  const extractCommand = typeof tools.extractCommand === 'string'
    ? tools.extractCommand
    : base.tools.extractCommand;

  return {
    metadata: {
      backend,
      defaultAccess: stringOr(metadata.defaultAccess, base.metadata.defaultAccess)
    },
    text: {
      lossy: typeof text.lossy === 'boolean' ? text.lossy : base.text.lossy
    },
    tools: {
      cadius: stringOr(tools.cadius, base.tools.cadius),
      runner: stringOr(tools.runner, base.tools.runner),
      ...(extractCommand !== undefined ? { extractCommand } : {})
    },
    volume: {
      name: stringOr(volume.name, base.volume.name)
    },
    logLevel: isLogLevel(raw.logLevel) ? raw.logLevel : base.logLevel
  };
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = process.env.PRODOS_TOOLS_CONFIG || DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(`Loaded configuration from ${this.configPath}`, undefined, 'ConfigManager');

      return mergeConfig(DEFAULT_CONFIG, parsed);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!isValidAccess(this.config.metadata.defaultAccess)) {
      errors.push(`Invalid metadata.defaultAccess: ${this.config.metadata.defaultAccess}`);
    }

    const volumeName = this.config.volume.name;
    if (!volumeName.trim() || volumeName.includes('/')) {
      errors.push('volume.name must be a non-empty name without path separators');
    }

    if (!this.config.tools.cadius.trim()) {
      errors.push('tools.cadius must not be empty');
    }

    if (!this.config.tools.runner.trim()) {
      errors.push('tools.runner must not be empty');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * The configured `logLevel` applies unless `LOG_LEVEL` names one
 */
export function applyConfiguredLogLevel(manager: ConfigManager, env: NodeJS.ProcessEnv = process.env): void {
  if (isLogLevel(env.LOG_LEVEL)) return;
  logger.setMinLevel(manager.getAll().logLevel);
}

/**
 * Get or create global config instance
 */
export function getConfig(path?: string): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager(path);
    applyConfiguredLogLevel(globalConfig);
  }
  return globalConfig;
}

/**
 * Validated settings for a CLI run
 */
export function loadSettings(manager: ConfigManager = getConfig()): AppConfig {
  const { valid, errors } = manager.validate();
  if (!valid) {
    throw new AppError(
      `Invalid configuration in ${manager.getPath()}:\n  - ${errors.join('\n  - ')}`,
      'INVALID_CONFIG',
      1,
      { errors }
    );
  }
  return manager.getAll();
}

/**
 * `PRODOS_METADATA_BACKEND` wins over the configured backend
 */
export function getMetadataBackend(): MetadataBackend {
  const fromEnv = process.env.PRODOS_METADATA_BACKEND?.trim();
  if (fromEnv === 'xattr' || fromEnv === 'sidecar') {
    return fromEnv;
  }
  return getConfig().getAll().metadata.backend;
}
