import { join } from 'path';
import { QuiverConfig, QuiverDirectories } from '../types/index.js';
import { readJsonOrJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_LOCK_TIMEOUT_MS, ENV_VARS } from '../constants/index.js';
import { getQuiverDirectories } from './directory.js';

/**
 * Configuration management for the Quiver installer
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];
const DEFAULT_CONFIG_FILE = 'config.jsonc';

const DEFAULT_CONFIG: QuiverConfig = {
  recipeDirs: [],
  autoInstallEvalDeps: false,
  lockTimeoutMs: DEFAULT_LOCK_TIMEOUT_MS
};

class ConfigManager {
  private config: QuiverConfig | null = null;
  private configPath: string | null = null;
  private quiverDirs: QuiverDirectories;

  constructor(dirs: QuiverDirectories = getQuiverDirectories()) {
    this.quiverDirs = dirs;
  }

  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.quiverDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, falling back to defaults when none exists.
   * Unlike `save`, loading never writes to disk.
   */
  async load(): Promise<QuiverConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = withEnvOverrides({ ...DEFAULT_CONFIG });
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration from ${configPath}`, { configPath, error });
    }

    this.configPath = configPath;
    this.config = withEnvOverrides({ ...DEFAULT_CONFIG, ...parseConfig(raw, configPath) });
    return this.config;
  }

  /**
   * Save current configuration to file
   */
  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = this.configPath ?? join(this.quiverDirs.config, DEFAULT_CONFIG_FILE);
    try {
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsoncFile(configPath, this.config);
      this.configPath = configPath;
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration to ${configPath}`, { configPath, error });
    }
  }

  async get<K extends keyof QuiverConfig>(key: K): Promise<QuiverConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  getDirectories(): QuiverDirectories {
    return this.quiverDirs;
  }
}

/**
 * Validate the user's config document field by field. Unknown keys are
 * ignored with a debug log so older binaries can read newer files.
 */
export function parseConfig(raw: unknown, source: string): Partial<QuiverConfig> {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Invalid configuration structure in ${source}: expected an object`);
  }

  const result: Partial<QuiverConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'recipeDirs':
        if (!Array.isArray(value) || !value.every((dir): dir is string => typeof dir === 'string')) {
          throw new ConfigError(`Invalid 'recipeDirs' in ${source}: expected an array of strings`);
        }
        result.recipeDirs = value;
        break;
      case 'autoInstallEvalDeps':
        if (typeof value !== 'boolean') {
          throw new ConfigError(`Invalid 'autoInstallEvalDeps' in ${source}: expected a boolean`);
        }
        result.autoInstallEvalDeps = value;
        break;
      case 'lockTimeoutMs':
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
          throw new ConfigError(`Invalid 'lockTimeoutMs' in ${source}: expected a non-negative number`);
        }
        result.lockTimeoutMs = value;
        break;
      case 'githubToken':
        if (typeof value !== 'string') {
          throw new ConfigError(`Invalid 'githubToken' in ${source}: expected a string`);
        }
        result.githubToken = value;
        break;
      default:
        logger.debug(`Ignoring unknown config key '${key}' in ${source}`);
    }
  }
  return result;
}

function withEnvOverrides(config: QuiverConfig): QuiverConfig {
  const token = process.env[ENV_VARS.GITHUB_TOKEN];
  if (!config.githubToken && token) {
    return { ...config, githubToken: token };
  }
  return config;
}

export { ConfigManager, DEFAULT_CONFIG };
