// Core interfaces and types for the image converter

export type TargetFormat = 'png' | 'jpeg' | 'tiff' | 'webp' | 'avif' | 'gif';

export type TiffCompression = 'none' | 'lzw' | 'deflate' | 'jpeg';

export interface EncodeOptions {
  quality?: number;
  lossless?: boolean;
  compression?: TiffCompression;
}

export interface ConversionRequest {
  sourcePaths: string[];
  targetFormat: string;
  destinationDirectory: string;
  encodeOptions?: EncodeOptions;
}

export type FailureCategory =
  | 'source_unavailable'
  | 'unsupported_format'
  | 'corrupt_input'
  | 'file_system'
  | 'unknown';

export type OutcomeStatus = { kind: 'success' } | { kind: 'failed'; reason: string };

export interface ConversionOutcome {
  sourcePath: string;
  destinationPath: string;
  status: OutcomeStatus;
  category?: FailureCategory;
  durationMs: number;
}

export interface BatchReport {
  targetFormat: TargetFormat;
  destinationDirectory: string;
  outcomes: readonly ConversionOutcome[];
  total: number;
  succeeded: number;
  failed: number;
  startedAt: Date;
  durationMs: number;
}

export interface ImageInfo {
  path: string;
  format: string;
  width: number;
  height: number;
  channels: number;
  hasAlpha: boolean;
  space?: string;
  sizeBytes: number;
}

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}
