import path from 'path';
import { DebugLimits, DownloaderConfig } from '../types';
import { DefaultConfig, defaultConfig, ENV_KEYS } from './default';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';
import { ConfigError } from '../errors';

type FileConfig = Partial<Omit<DefaultConfig, 'debugLimits'>> & {
  debugLimits?: Partial<DebugLimits>;
};

export interface ConfigOverrides {
  debug?: boolean;
}

export class ConfigManager {
  private config: DownloaderConfig | null = null;
  private configPath: string;

  constructor(
    configPath?: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
  }

  static isTruthy(value: string | undefined): boolean {
    return ['true', '1', 'yes'].includes((value ?? '').trim().toLowerCase());
  }

  /**
   * Builds the run configuration from defaults, an optional config.json and the environment.
   * Throws ConfigError when the API key is missing or a value is out of range.
   */
  async loadConfig(overrides: ConfigOverrides = {}): Promise<DownloaderConfig> {
    const apiKey = this.env[ENV_KEYS.API_KEY]?.trim();
    if (!apiKey) {
      throw new ConfigError(
        `${ENV_KEYS.API_KEY} environment variable not set. ` +
          `Create a token under Applications in your Zenodo account and export it as ${ENV_KEYS.API_KEY}.`
      );
    }

    const fileConfig = await FileUtils.readJSON<FileConfig>(this.configPath);
    if (fileConfig) {
      logger.info(`Loaded configuration from ${this.configPath}`);
    } else {
      logger.debug('No configuration file found, using default config');
    }

    const merged = this.mergeConfigs(defaultConfig, fileConfig ?? {});
    const config: DownloaderConfig = {
      ...merged,
      apiKey,
      debug: overrides.debug || ConfigManager.isTruthy(this.env[ENV_KEYS.DEBUG]) || merged.debug,
    };

    const { valid, errors } = this.validateConfig(config);
    if (!valid) {
      throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`);
    }

    this.config = config;
    return config;
  }

  getConfig(): DownloaderConfig {
    if (!this.config) {
      throw new ConfigError('Configuration has not been loaded');
    }
    return this.config;
  }

  validateConfig(config: DownloaderConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (typeof config.baseUrl !== 'string' || !/^https?:\/\//.test(config.baseUrl)) {
      errors.push('baseUrl must be an http(s) URL');
    }
    if (typeof config.communityId !== 'string' || config.communityId.trim() === '') {
      errors.push('communityId is required');
    }
    if (typeof config.outputDir !== 'string' || config.outputDir.trim() === '') {
      errors.push('outputDir is required');
    }
    if (typeof config.metadataFile !== 'string' || config.metadataFile.trim() === '') {
      errors.push('metadataFile is required');
    }
    if (!Number.isInteger(config.pageSize) || config.pageSize < 1) {
      errors.push('pageSize must be a positive integer');
    }
    if (typeof config.pageDelay !== 'number' || config.pageDelay < 0) {
      errors.push('pageDelay must be zero or more milliseconds');
    }
    if (typeof config.downloadTimeout !== 'number' || config.downloadTimeout < 1000) {
      errors.push('downloadTimeout must be at least 1000ms');
    }
    if (typeof config.verifyChecksums !== 'boolean') {
      errors.push('verifyChecksums must be true or false');
    }
    if (typeof config.debug !== 'boolean') {
      errors.push('debug must be true or false');
    }
    if (!Number.isInteger(config.debugLimits.maxRecords) || config.debugLimits.maxRecords < 1) {
      errors.push('debugLimits.maxRecords must be a positive integer');
    }
    if (
      !Number.isInteger(config.debugLimits.maxFilesPerRecord) ||
      config.debugLimits.maxFilesPerRecord < 1
    ) {
      errors.push('debugLimits.maxFilesPerRecord must be a positive integer');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  private mergeConfigs(base: DefaultConfig, updates: FileConfig): DefaultConfig {
    return {
      ...base,
      ...updates,
      debugLimits: { ...base.debugLimits, ...updates.debugLimits },
    };
  }
}
