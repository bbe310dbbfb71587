import * as path from 'path';
import { ConversionRequest } from '../../types';
import { ConverterConfig } from '../../core/config-manager';
import { ValidationError } from '../../core/errors';
import { DirectoryManager } from '../local/directory-manager';
import { RequestSource } from './interfaces';
import { EncodeOverrides, buildEncodeOptions, expandSourcePaths } from './request-builder';

export interface CliRequestOptions extends EncodeOverrides {
  paths: string[];
  format?: string;
  output?: string;
  recursive?: boolean;
}

/**
 * Builds a request from command-line arguments; missing format and destination
 * fall back to the last used values in the configuration
 */
export class CliRequestSource implements RequestSource {
  private readonly options: CliRequestOptions;
  private readonly config: ConverterConfig;
  private readonly directoryManager: DirectoryManager;

  constructor(options: CliRequestOptions, config: ConverterConfig, directoryManager: DirectoryManager) {
    this.options = options;
    this.config = config;
    this.directoryManager = directoryManager;
  }

  describe(): string {
    return `command line (${this.options.paths.length} path argument(s))`;
  }

  async createRequest(): Promise<ConversionRequest> {
    const targetFormat = this.options.format ?? this.config.outputFormat;
    const destination = this.options.output ?? this.config.outputDirectory;

    if (!destination) {
      throw new ValidationError('No destination directory given. Use --output <dir> or set outputDirectory.');
    }

    const sourcePaths = await expandSourcePaths(
      this.options.paths,
      this.directoryManager,
      this.options.recursive ?? this.config.recursive
    );

    return {
      sourcePaths,
      targetFormat,
      destinationDirectory: path.resolve(destination),
      encodeOptions: buildEncodeOptions(targetFormat, this.config, {
        quality: this.options.quality,
        lossless: this.options.lossless,
        compression: this.options.compression,
      }),
    };
  }
}
