// Converter settings: defaults, environment overrides and the persisted settings file

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigValidationResult, LogLevel, TargetFormat, TiffCompression } from '../types';
import { DEFAULT_CONVERTER_CONFIG, QUALITY_RANGE, SETTINGS_FILE_NAME, TIFF_COMPRESSIONS } from './constants';
import { normalizeFormat } from './format-validator';
import { isLogLevel, parseLogLevel } from './logger';

export interface ConverterConfig {
  outputDirectory: string;
  outputFormat: TargetFormat;
  lastInputDirectory: string;
  quality: number;
  tiffCompression: TiffCompression;
  recursive: boolean;
  logLevel: LogLevel;
}

export type ConfigKey = keyof ConverterConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = Object.freeze([
  'outputDirectory',
  'outputFormat',
  'lastInputDirectory',
  'quality',
  'tiffCompression',
  'recursive',
  'logLevel',
]);

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

function isTiffCompression(value: string): value is TiffCompression {
  return TIFF_COMPRESSIONS.some((compression) => compression === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Default location of the settings file: $IMGCONV_CONFIG_DIR or ~/.imgconv
 */
export function getDefaultSettingsPath(): string {
  const directory = process.env.IMGCONV_CONFIG_DIR || path.join(os.homedir(), '.imgconv');
  return path.join(directory, SETTINGS_FILE_NAME);
}

export class ConverterConfigManager {
  private readonly settingsPath: string;
  private config: ConverterConfig;

  constructor(settingsPath: string = getDefaultSettingsPath()) {
    this.settingsPath = settingsPath;
    this.config = ConverterConfigManager.createDefault();
  }

  /**
   * Create a default converter configuration
   */
  static createDefault(): ConverterConfig {
    return { ...DEFAULT_CONVERTER_CONFIG };
  }

  /**
   * Create configuration from environment variables
   */
  static createFromEnv(env: NodeJS.ProcessEnv = process.env): ConverterConfig {
    return ConverterConfigManager.applyEnvOverrides(ConverterConfigManager.createDefault(), env);
  }

  /**
   * Environment variables take precedence over stored settings for the current run
   */
  static applyEnvOverrides(config: ConverterConfig, env: NodeJS.ProcessEnv = process.env): ConverterConfig {
    const quality = env.IMGCONV_QUALITY ? parseInt(env.IMGCONV_QUALITY, 10) : NaN;

    return {
      ...config,
      outputDirectory: env.IMGCONV_OUTPUT_DIRECTORY || config.outputDirectory,
      outputFormat: (env.IMGCONV_OUTPUT_FORMAT && normalizeFormat(env.IMGCONV_OUTPUT_FORMAT)) || config.outputFormat,
      quality: Number.isNaN(quality) ? config.quality : quality,
      logLevel: parseLogLevel(env.LOG_LEVEL, config.logLevel),
    };
  }

  /**
   * Merge user configuration with defaults
   */
  static mergeWithDefaults(userConfig: Partial<ConverterConfig>): ConverterConfig {
    return {
      ...ConverterConfigManager.createDefault(),
      ...userConfig,
    };
  }

  static validateConfig(config: ConverterConfig): ConfigValidationResult {
    const errors: string[] = [];

    if (!normalizeFormat(config.outputFormat)) {
      errors.push(`Output format '${config.outputFormat}' is not supported`);
    }

    if (!Number.isInteger(config.quality) || config.quality < QUALITY_RANGE.MIN || config.quality > QUALITY_RANGE.MAX) {
      errors.push(`Quality must be an integer between ${QUALITY_RANGE.MIN} and ${QUALITY_RANGE.MAX}`);
    }

    if (!isTiffCompression(config.tiffCompression)) {
      errors.push(`TIFF compression must be one of: ${TIFF_COMPRESSIONS.join(', ')}`);
    }

    const invalidChars = /[<>"|?*]/;
    if (invalidChars.test(config.outputDirectory) || invalidChars.test(config.lastInputDirectory)) {
      errors.push('Directory settings contain invalid characters');
    }

    return { isValid: errors.length === 0, errors };
  }

  /**
   * Coerce stored values into a usable configuration; anything unusable falls back to its default
   */
  static sanitizeConfig(raw: unknown): ConverterConfig {
    const defaults = ConverterConfigManager.createDefault();
    if (!isRecord(raw)) {
      return defaults;
    }

    const text = (value: unknown, fallback: string): string => (typeof value === 'string' ? value : fallback);
    const quality = typeof raw.quality === 'number' ? Math.round(raw.quality) : defaults.quality;
    const compression = text(raw.tiffCompression, defaults.tiffCompression);

    return {
      outputDirectory: text(raw.outputDirectory, defaults.outputDirectory),
      outputFormat: normalizeFormat(text(raw.outputFormat, '')) ?? defaults.outputFormat,
      lastInputDirectory: text(raw.lastInputDirectory, defaults.lastInputDirectory),
      quality: Math.max(QUALITY_RANGE.MIN, Math.min(QUALITY_RANGE.MAX, quality)),
      tiffCompression: isTiffCompression(compression) ? compression : defaults.tiffCompression,
      recursive: typeof raw.recursive === 'boolean' ? raw.recursive : defaults.recursive,
      logLevel: parseLogLevel(text(raw.logLevel, ''), defaults.logLevel),
    };
  }

  /**
   * Get configuration summary for display
   */
  static getConfigSummary(config: ConverterConfig): Record<string, string | number | boolean> {
    return {
      'Output Directory': config.outputDirectory || 'Not set',
      'Output Format': config.outputFormat,
      'Last Input Directory': config.lastInputDirectory || 'Not set',
      'Quality': config.quality,
      'TIFF Compression': config.tiffCompression,
      'Scan Folders Recursively': config.recursive,
      'Log Level': config.logLevel,
    };
  }

  getSettingsPath(): string {
    return this.settingsPath;
  }

  get(): ConverterConfig {
    return { ...this.config };
  }

  /**
   * Load the settings file. A missing file yields defaults; an unreadable one is reported.
   */
  async load(): Promise<ConverterConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.settingsPath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.config = ConverterConfigManager.createDefault();
        return this.get();
      }
      throw error;
    }

    try {
      this.config = ConverterConfigManager.sanitizeConfig(JSON.parse(content));
    } catch (error) {
      throw new Error(
        `Invalid settings file ${this.settingsPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
    return this.get();
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.settingsPath), { recursive: true });
    await fs.writeFile(this.settingsPath, JSON.stringify(this.config, null, 2) + '\n', 'utf8');
  }

  async update(changes: Partial<ConverterConfig>): Promise<ConverterConfig> {
    const next = { ...this.config, ...changes };
    const validation = ConverterConfigManager.validateConfig(next);
    if (!validation.isValid) {
      throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
    }

    this.config = next;
    await this.save();
    return this.get();
  }

  /**
   * Set a single key from its textual form, as typed on the command line
   */
  async setFromString(key: string, value: string): Promise<ConverterConfig> {
    if (!isConfigKey(key)) {
      throw new Error(`Unknown setting '${key}'. Known settings: ${CONFIG_KEYS.join(', ')}`);
    }

    switch (key) {
      case 'quality':
        return this.update({ quality: Number(value) });
      case 'recursive':
        if (value !== 'true' && value !== 'false') {
          throw new Error(`Setting 'recursive' must be true or false`);
        }
        return this.update({ recursive: value === 'true' });
      case 'outputFormat': {
        const format = normalizeFormat(value);
        if (!format) {
          throw new Error(`Output format '${value}' is not supported`);
        }
        return this.update({ outputFormat: format });
      }
      case 'tiffCompression':
        if (!isTiffCompression(value)) {
          throw new Error(`TIFF compression must be one of: ${TIFF_COMPRESSIONS.join(', ')}`);
        }
        return this.update({ tiffCompression: value });
      case 'logLevel': {
        const level = value.trim().toUpperCase();
        if (!isLogLevel(level)) {
          throw new Error(`Log level must be one of: ERROR, WARN, INFO, DEBUG`);
        }
        return this.update({ logLevel: level });
      }
      case 'outputDirectory':
        return this.update({ outputDirectory: path.resolve(value) });
      case 'lastInputDirectory':
        return this.update({ lastInputDirectory: path.resolve(value) });
    }
  }

  async reset(): Promise<ConverterConfig> {
    this.config = ConverterConfigManager.createDefault();
    await this.save();
    return this.get();
  }
}
