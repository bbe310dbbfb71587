// Error types surfaced by the conversion pipeline

import { OUTCOME_REASONS } from './constants';

/**
 * Raised before any conversion work starts; the whole batch is rejected
 */
export class ValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export type SourceUnavailableReason =
  (typeof OUTCOME_REASONS)[keyof typeof OUTCOME_REASONS];

/**
 * A single source path is missing or cannot be read
 */
export class SourceUnavailableError extends Error {
  readonly sourcePath: string;
  readonly reason: SourceUnavailableReason;

  constructor(sourcePath: string, reason: SourceUnavailableReason) {
    super(reason);
    this.name = 'SourceUnavailableError';
    this.sourcePath = sourcePath;
    this.reason = reason;
  }
}

/**
 * The codec failed for one file; `message` carries the library's reason
 */
export class ConversionFailureError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, reason: string, options?: { cause?: unknown }) {
    super(reason, options);
    this.name = 'ConversionFailureError';
    this.sourcePath = sourcePath;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
