/**
 * Target format normalization and validation against codec capabilities
 */

import { EncodeOptions, TargetFormat } from '../types';
import { ImageCodec } from '../services/codec/interfaces';
import {
  FORMAT_ALIASES,
  FORMAT_EXTENSIONS,
  LOSSY_FORMATS,
  QUALITY_RANGE,
  SUPPORTED_TARGET_FORMATS,
  TIFF_COMPRESSIONS,
} from './constants';

export interface FormatCapability {
  format: TargetFormat;
  extension: string;
  available: boolean;
  lossy: boolean;
}

export interface FormatValidationResult {
  valid: boolean;
  format?: TargetFormat;
  errors: string[];
  warnings: string[];
}

export function isTargetFormat(value: string): value is TargetFormat {
  return SUPPORTED_TARGET_FORMATS.some((format) => format === value);
}

/**
 * Resolve a user-supplied identifier (`JPG`, `tif`, `png`) to a target format
 */
export function normalizeFormat(value: string): TargetFormat | undefined {
  const key = value.trim().toLowerCase().replace(/^\./, '');
  if (isTargetFormat(key)) {
    return key;
  }
  return FORMAT_ALIASES[key];
}

export class FormatValidator {
  private readonly codec: ImageCodec;

  constructor(codec: ImageCodec) {
    this.codec = codec;
  }

  getFormatCapabilities(): FormatCapability[] {
    const available = new Set(this.codec.getSupportedFormats());

    return SUPPORTED_TARGET_FORMATS.map((format) => ({
      format,
      extension: FORMAT_EXTENSIONS[format],
      available: available.has(format),
      lossy: LOSSY_FORMATS.includes(format),
    }));
  }

  /**
   * Validate a target format identifier and the encode options that go with it
   */
  validate(targetFormat: string, options: EncodeOptions = {}): FormatValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const format = normalizeFormat(targetFormat);

    if (!format) {
      errors.push(
        `Unsupported target format: '${targetFormat}'. ` +
        `Supported formats: ${SUPPORTED_TARGET_FORMATS.join(', ')}`
      );
      return { valid: false, errors, warnings };
    }

    if (!this.codec.getSupportedFormats().includes(format)) {
      errors.push(`Target format '${format}' cannot be written by the ${this.codec.getName()} codec`);
    }

    if (options.quality !== undefined) {
      if (!Number.isInteger(options.quality) || options.quality < QUALITY_RANGE.MIN || options.quality > QUALITY_RANGE.MAX) {
        errors.push(`Quality must be an integer between ${QUALITY_RANGE.MIN} and ${QUALITY_RANGE.MAX}`);
      } else if (!LOSSY_FORMATS.includes(format)) {
        warnings.push(`Quality has no effect on ${format} output`);
      }
    }

    if (options.compression !== undefined) {
      if (!TIFF_COMPRESSIONS.includes(options.compression)) {
        errors.push(`Compression must be one of: ${TIFF_COMPRESSIONS.join(', ')}`);
      } else if (format !== 'tiff') {
        warnings.push(`Compression only applies to tiff output`);
      }
    }

    if (options.lossless && format !== 'webp' && format !== 'avif') {
      warnings.push(`Lossless mode only applies to webp and avif output`);
    }

    return { valid: errors.length === 0, format, errors, warnings };
  }
}
