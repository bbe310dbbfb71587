// Core constants and configuration defaults

import { LogLevel, TargetFormat, TiffCompression } from '../types';

export const SUPPORTED_TARGET_FORMATS = Object.freeze([
  'png',
  'jpeg',
  'tiff',
  'webp',
  'avif',
  'gif',
] as const satisfies readonly TargetFormat[]);

export const FORMAT_EXTENSIONS: Readonly<Record<TargetFormat, string>> = Object.freeze({
  png: '.png',
  jpeg: '.jpg',
  tiff: '.tif',
  webp: '.webp',
  avif: '.avif',
  gif: '.gif',
});

export const FORMAT_ALIASES: Readonly<Record<string, TargetFormat>> = Object.freeze({
  jpg: 'jpeg',
  tif: 'tiff',
});

// Formats where a quality setting changes the output
export const LOSSY_FORMATS: readonly TargetFormat[] = Object.freeze(['jpeg', 'webp', 'avif', 'tiff']);

export const TIFF_COMPRESSIONS = Object.freeze([
  'none',
  'lzw',
  'deflate',
  'jpeg',
] as const satisfies readonly TiffCompression[]);

// Extensions picked up when a directory is given as input
export const SOURCE_EXTENSIONS = Object.freeze([
  '.png',
  '.jpg',
  '.jpeg',
  '.jpe',
  '.tif',
  '.tiff',
  '.webp',
  '.avif',
  '.gif',
  '.bmp',
  '.svg',
]);

export const OUTCOME_REASONS = {
  SOURCE_NOT_FOUND: 'source not found',
  SOURCE_UNREADABLE: 'source unreadable',
} as const;

export const QUALITY_RANGE = { MIN: 1, MAX: 100 } as const;

export const DEFAULT_CONVERTER_CONFIG: Readonly<{
  outputDirectory: string;
  outputFormat: TargetFormat;
  lastInputDirectory: string;
  quality: number;
  tiffCompression: TiffCompression;
  recursive: boolean;
  logLevel: LogLevel;
}> = Object.freeze({
  outputDirectory: '',
  outputFormat: 'png',
  lastInputDirectory: '',
  quality: 90,
  tiffCompression: 'lzw',
  recursive: false,
  logLevel: 'WARN',
});

export const SETTINGS_FILE_NAME = 'settings.json';

export const LOG_LEVELS = {
  ERROR: 'ERROR',
  WARN: 'WARN',
  INFO: 'INFO',
  DEBUG: 'DEBUG',
} as const;
