import { cosmiconfigSync } from 'cosmiconfig';
import type { CosmiconfigResult } from 'cosmiconfig';
import * as path from 'path';
import type { ParamguardConfig, UserConfig } from '../types/required-params';
import { DEFAULT_DETECTOR_CONFIG } from '../analyzers/required-param-detector';
import { ConfigLoadError, ErrorCode } from '../utils/error-handler';

export const CONFIG_MODULE_NAME = 'paramguard';

function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

function stringsOf(values: unknown[]): string[] {
  return values.filter((value): value is string => typeof value === 'string' && value.length > 0);
}

export class ConfigManager {
  private config: ParamguardConfig | undefined;
  private configPath: string | null = null;
  private explorer = cosmiconfigSync(CONFIG_MODULE_NAME, {
    searchStrategy: 'project',
    searchPlaces: [
      '.paramguardrc',
      '.paramguardrc.json',
      '.paramguardrc.yaml',
      '.paramguardrc.yml',
      'paramguard.config.js',
      'package.json'
    ]
  });

  /**
   * Load config from an explicit file, or search upwards from `searchFrom`
   */
  load(options: { configPath?: string; searchFrom?: string; noConfig?: boolean } = {}): ParamguardConfig {
    if (this.config) {
      return this.config;
    }

    if (options.noConfig) {
      this.config = this.getDefaults();
      this.configPath = null;
      return this.config;
    }

    const result = options.configPath
      ? this.loadFile(options.configPath)
      : this.search(options.searchFrom);

    if (result && !result.isEmpty) {
      this.config = this.validateAndMergeConfig(result.config, result.filepath);
      this.configPath = result.filepath;
    } else {
      this.config = this.getDefaults();
      this.configPath = result?.filepath ?? null;
    }

    return this.config;
  }

  getDefaults(): ParamguardConfig {
    return {
      ...DEFAULT_DETECTOR_CONFIG,
      include: [...DEFAULT_DETECTOR_CONFIG.include],
      exclude: [...DEFAULT_DETECTOR_CONFIG.exclude],
      assertionFunctions: [...DEFAULT_DETECTOR_CONFIG.assertionFunctions]
    };
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  private loadFile(configPath: string): CosmiconfigResult {
    try {
      return this.explorer.load(path.resolve(configPath));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const missing = 'code' in cause && cause.code === 'ENOENT';
      throw new ConfigLoadError(
        missing ? `Config file not found: ${configPath}` : `Failed to load config: ${cause.message}`,
        missing ? ErrorCode.CONFIG_NOT_FOUND : ErrorCode.INVALID_CONFIG,
        configPath,
        cause
      );
    }
  }

  private search(searchFrom?: string): CosmiconfigResult {
    try {
      return this.explorer.search(searchFrom);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConfigLoadError(`Failed to load config: ${cause.message}`, ErrorCode.INVALID_CONFIG, undefined, cause);
    }
  }

  validateAndMergeConfig(userConfig: unknown, filepath?: string): ParamguardConfig {
    if (!userConfig || typeof userConfig !== 'object' || Array.isArray(userConfig)) {
      throw new ConfigLoadError('Config must be an object', ErrorCode.INVALID_CONFIG, filepath);
    }

    const config = this.getDefaults();
    const user: UserConfig = userConfig;

    if (isList(user.include)) {
      config.include = stringsOf(user.include);
    }

    if (isList(user.exclude)) {
      config.exclude = stringsOf(user.exclude);
    }

    if (typeof user.tsconfigPath === 'string') {
      config.tsconfigPath = filepath
        ? path.resolve(path.dirname(filepath), user.tsconfigPath)
        : user.tsconfigPath;
    }

    if (isList(user.assertionFunctions)) {
      const names = stringsOf(user.assertionFunctions);
      // an empty list would silently disable the rule
      if (names.length > 0) {
        config.assertionFunctions = names;
      }
    }

    return config;
  }
}
