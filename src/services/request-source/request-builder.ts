// Shared steps for turning user input into a ConversionRequest

import * as fs from 'fs/promises';
import * as path from 'path';
import { EncodeOptions, TiffCompression } from '../../types';
import { ConverterConfig } from '../../core/config-manager';
import { LOSSY_FORMATS, SOURCE_EXTENSIONS } from '../../core/constants';
import { normalizeFormat } from '../../core/format-validator';
import { DirectoryManager } from '../local/directory-manager';

export interface EncodeOverrides {
  quality?: number;
  lossless?: boolean;
  compression?: TiffCompression;
}

/**
 * Replace directory arguments with the image files inside them. Other paths are
 * kept as given, including missing ones, so they show up in the report.
 */
export async function expandSourcePaths(
  inputs: string[],
  directoryManager: DirectoryManager,
  recursive: boolean
): Promise<string[]> {
  const expanded: string[] = [];

  for (const input of inputs) {
    const resolved = path.resolve(input);
    const stats = await fs.stat(resolved).catch(() => undefined);

    if (stats?.isDirectory()) {
      const files = await directoryManager.scanDirectory(resolved, {
        recursive,
        extensions: SOURCE_EXTENSIONS,
      });
      expanded.push(...files);
    } else {
      expanded.push(resolved);
    }
  }

  return expanded;
}

/**
 * Encode options for a request: explicit overrides win, then configured defaults
 * for the formats they apply to
 */
export function buildEncodeOptions(
  targetFormat: string,
  config: ConverterConfig,
  overrides: EncodeOverrides = {}
): EncodeOptions {
  const format = normalizeFormat(targetFormat);
  const options: EncodeOptions = {};

  const quality = overrides.quality ?? (format && LOSSY_FORMATS.includes(format) ? config.quality : undefined);
  if (quality !== undefined) {
    options.quality = quality;
  }

  const compression = overrides.compression ?? (format === 'tiff' ? config.tiffCompression : undefined);
  if (compression !== undefined) {
    options.compression = compression;
  }

  if (overrides.lossless !== undefined) {
    options.lossless = overrides.lossless;
  }

  return options;
}

/**
 * Directory the first source lives in, remembered as the next starting point
 */
export function inputDirectoryOf(sourcePaths: string[]): string | undefined {
  return sourcePaths.length > 0 ? path.dirname(sourcePaths[0]) : undefined;
}
