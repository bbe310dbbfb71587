// Error categorization and bookkeeping for conversion batches

import { FailureCategory, Logger } from '../types';
import { SourceUnavailableError, ValidationError } from './errors';

export enum ErrorCategory {
  VALIDATION = 'validation',
  SOURCE_UNAVAILABLE = 'source_unavailable',
  UNSUPPORTED_FORMAT = 'unsupported_format',
  CORRUPT_INPUT = 'corrupt_input',
  FILE_SYSTEM = 'file_system',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

// Codec failures are deterministic, so nothing is ever retried
export enum RecoveryStrategy {
  SKIP = 'skip',
  ABORT = 'abort',
}

export interface ErrorContext {
  operation: string;
  sourcePath?: string;
  destinationPath?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface CategorizedError {
  originalError: Error;
  category: ErrorCategory;
  severity: ErrorSeverity;
  recoveryStrategy: RecoveryStrategy;
  context: ErrorContext;
  message: string;
  userMessage: string;
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
  skippedErrors: number;
  abortedOperations: number;
}

const FILE_SYSTEM_CODES = ['ENOENT', 'EACCES', 'EPERM', 'ENOSPC', 'EROFS', 'EISDIR', 'EMFILE', 'EEXIST'];

function createCategoryCounters(): Record<ErrorCategory, number> {
  return {
    [ErrorCategory.VALIDATION]: 0,
    [ErrorCategory.SOURCE_UNAVAILABLE]: 0,
    [ErrorCategory.UNSUPPORTED_FORMAT]: 0,
    [ErrorCategory.CORRUPT_INPUT]: 0,
    [ErrorCategory.FILE_SYSTEM]: 0,
    [ErrorCategory.UNKNOWN]: 0,
  };
}

function createSeverityCounters(): Record<ErrorSeverity, number> {
  return {
    [ErrorSeverity.LOW]: 0,
    [ErrorSeverity.MEDIUM]: 0,
    [ErrorSeverity.HIGH]: 0,
    [ErrorSeverity.CRITICAL]: 0,
  };
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  // Wrapped codec failures keep the file system error as their cause
  return error.cause instanceof Error ? errorCode(error.cause) : undefined;
}

/**
 * Map a handler category onto the category recorded in a conversion outcome
 */
export function toFailureCategory(category: ErrorCategory): FailureCategory {
  switch (category) {
    case ErrorCategory.SOURCE_UNAVAILABLE:
      return 'source_unavailable';
    case ErrorCategory.UNSUPPORTED_FORMAT:
      return 'unsupported_format';
    case ErrorCategory.CORRUPT_INPUT:
      return 'corrupt_input';
    case ErrorCategory.FILE_SYSTEM:
      return 'file_system';
    default:
      return 'unknown';
  }
}

/**
 * Categorizes conversion errors, keeps a bounded history and aggregates statistics
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private readonly statistics: ErrorStatistics;
  private readonly errorHistory: CategorizedError[] = [];
  private readonly maxHistorySize: number;

  constructor(logger: Logger, maxHistorySize = 1000) {
    this.logger = logger;
    this.maxHistorySize = maxHistorySize;
    this.statistics = {
      totalErrors: 0,
      errorsByCategory: createCategoryCounters(),
      errorsBySeverity: createSeverityCounters(),
      skippedErrors: 0,
      abortedOperations: 0,
    };
  }

  /**
   * Categorize, record and log an error
   */
  handleError(error: Error, context: ErrorContext): CategorizedError {
    const categorizedError = this.categorizeError(error, context);

    this.updateStatistics(categorizedError);
    this.addToHistory(categorizedError);
    this.logError(categorizedError);

    return categorizedError;
  }

  getStatistics(): ErrorStatistics {
    return {
      ...this.statistics,
      errorsByCategory: { ...this.statistics.errorsByCategory },
      errorsBySeverity: { ...this.statistics.errorsBySeverity },
    };
  }

  getErrorsByCategory(category: ErrorCategory): CategorizedError[] {
    return this.errorHistory.filter((error) => error.category === category);
  }

  getHistory(): CategorizedError[] {
    return [...this.errorHistory];
  }

  clearHistory(): void {
    this.errorHistory.length = 0;
    this.statistics.totalErrors = 0;
    this.statistics.skippedErrors = 0;
    this.statistics.abortedOperations = 0;
    this.statistics.errorsByCategory = createCategoryCounters();
    this.statistics.errorsBySeverity = createSeverityCounters();
  }

  /**
   * Generate an error report with recommendations
   */
  generateErrorReport(): {
    summary: ErrorStatistics;
    recentErrors: CategorizedError[];
    recommendations: string[];
  } {
    return {
      summary: this.getStatistics(),
      recentErrors: this.errorHistory.slice(-20),
      recommendations: this.generateRecommendations(),
    };
  }

  private categorizeError(error: Error, context: ErrorContext): CategorizedError {
    const errorMessage = error.message.toLowerCase();
    const code = errorCode(error);

    let category = ErrorCategory.UNKNOWN;
    let severity = ErrorSeverity.MEDIUM;
    let recoveryStrategy = RecoveryStrategy.SKIP;

    if (error instanceof ValidationError) {
      category = ErrorCategory.VALIDATION;
      severity = ErrorSeverity.HIGH;
      recoveryStrategy = RecoveryStrategy.ABORT;
    }

    else if (error instanceof SourceUnavailableError) {
      category = ErrorCategory.SOURCE_UNAVAILABLE;
      severity = ErrorSeverity.MEDIUM;
    }

    else if (
      errorMessage.includes('unsupported image format') ||
      errorMessage.includes('unsupported output format') ||
      errorMessage.includes('not a known file format') ||
      errorMessage.includes('unsupported')
    ) {
      category = ErrorCategory.UNSUPPORTED_FORMAT;
      severity = ErrorSeverity.LOW;
    }

    else if (
      errorMessage.includes('corrupt') ||
      errorMessage.includes('premature end') ||
      errorMessage.includes('truncated') ||
      errorMessage.includes('bad seek') ||
      errorMessage.includes('invalid') ||
      errorMessage.includes('read error')
    ) {
      category = ErrorCategory.CORRUPT_INPUT;
      severity = ErrorSeverity.MEDIUM;
    }

    else if (
      (code !== undefined && FILE_SYSTEM_CODES.includes(code)) ||
      errorMessage.includes('no space left') ||
      errorMessage.includes('permission denied') ||
      errorMessage.includes('read-only file system')
    ) {
      category = ErrorCategory.FILE_SYSTEM;
      severity = ErrorSeverity.HIGH;
    }

    return {
      originalError: error,
      category,
      severity,
      recoveryStrategy,
      context,
      message: error.message,
      userMessage: this.generateUserMessage(category, context),
    };
  }

  private updateStatistics(error: CategorizedError): void {
    this.statistics.totalErrors++;
    this.statistics.errorsByCategory[error.category]++;
    this.statistics.errorsBySeverity[error.severity]++;

    if (error.recoveryStrategy === RecoveryStrategy.ABORT) {
      this.statistics.abortedOperations++;
    } else {
      this.statistics.skippedErrors++;
    }
  }

  private addToHistory(error: CategorizedError): void {
    this.errorHistory.push(error);

    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.shift();
    }
  }

  private logError(error: CategorizedError): void {
    const logMessage = `${error.category.toUpperCase()} error in ${error.context.operation}`;
    const logMeta = {
      category: error.category,
      severity: error.severity,
      sourcePath: error.context.sourcePath,
      message: error.message,
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
        this.logger.error(logMessage, logMeta);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(logMessage, logMeta);
        break;
      case ErrorSeverity.LOW:
        this.logger.debug(logMessage, logMeta);
        break;
    }
  }

  private generateUserMessage(category: ErrorCategory, context: ErrorContext): string {
    const file = context.sourcePath ? ` for "${context.sourcePath}"` : '';

    switch (category) {
      case ErrorCategory.VALIDATION:
        return 'The conversion request is invalid. Nothing was converted.';
      case ErrorCategory.SOURCE_UNAVAILABLE:
        return `Source file is missing or unreadable${file}. Skipping this file.`;
      case ErrorCategory.UNSUPPORTED_FORMAT:
        return `The image format is not supported by the codec${file}.`;
      case ErrorCategory.CORRUPT_INPUT:
        return `The image data could not be decoded${file}. The file may be damaged.`;
      case ErrorCategory.FILE_SYSTEM:
        return `File system error${file}. Check disk space and permissions.`;
      default:
        return `Unexpected error during ${context.operation.replace('_', ' ')}${file}.`;
    }
  }

  private generateRecommendations(): string[] {
    const recommendations: string[] = [];
    const stats = this.statistics;

    if (stats.errorsByCategory[ErrorCategory.SOURCE_UNAVAILABLE] > 0) {
      recommendations.push('Check that every source path exists and is readable');
    }

    if (stats.errorsByCategory[ErrorCategory.UNSUPPORTED_FORMAT] > 0) {
      recommendations.push('Run "imgconv formats" to see which formats the codec can handle');
    }

    if (stats.errorsByCategory[ErrorCategory.CORRUPT_INPUT] > 0) {
      recommendations.push('Re-export damaged source images from their original application');
    }

    if (stats.errorsByCategory[ErrorCategory.FILE_SYSTEM] > 0) {
      recommendations.push('Check available disk space and destination permissions');
    }

    return recommendations;
  }
}
