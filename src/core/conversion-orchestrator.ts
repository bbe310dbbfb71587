// Batch conversion orchestrator: validates a request, converts each file once, reports per file

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import type { Stats } from 'fs';
import {
  BatchReport,
  ConversionOutcome,
  ConversionRequest,
  EncodeOptions,
  Logger,
  TargetFormat,
} from '../types';
import { ImageCodec } from '../services/codec/interfaces';
import { DirectoryManager } from '../services/local/directory-manager';
import { FileWriter } from '../services/local/file-writer';
import { PathUtils } from '../services/local/path-utils';
import { BatchItem, BatchProcessor } from './batch-processor';
import { OUTCOME_REASONS } from './constants';
import { ErrorHandler, toFailureCategory } from './error-handler';
import { ConversionFailureError, SourceUnavailableError, ValidationError, toError } from './errors';
import { FormatValidator } from './format-validator';

export type OutcomeListener = (outcome: ConversionOutcome, index: number, total: number) => void;

export interface ConvertBatchOptions {
  onOutcome?: OutcomeListener;
}

interface ConversionItem extends BatchItem {
  sourcePath: string;
  destinationPath: string;
  startedAt?: number;
  outcome?: ConversionOutcome;
}

/**
 * Orchestrates one conversion batch. Stateless between calls apart from the
 * error statistics it accumulates for reporting.
 */
export class ConversionOrchestrator {
  private readonly codec: ImageCodec;
  private readonly logger: Logger;
  private readonly directoryManager: DirectoryManager;
  private readonly fileWriter: FileWriter;
  private readonly formatValidator: FormatValidator;
  private readonly errorHandler: ErrorHandler;

  constructor(codec: ImageCodec, logger: Logger, errorHandler?: ErrorHandler) {
    this.codec = codec;
    this.logger = logger;
    this.directoryManager = new DirectoryManager(logger);
    this.fileWriter = new FileWriter(logger);
    this.formatValidator = new FormatValidator(codec);
    this.errorHandler = errorHandler ?? new ErrorHandler(logger);
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  /**
   * Convert every source path of the request. Throws ValidationError before any
   * conversion when the request as a whole cannot be served.
   */
  async convertBatch(request: ConversionRequest, options: ConvertBatchOptions = {}): Promise<BatchReport> {
    const targetFormat = await this.validateRequest(request);
    const encodeOptions = request.encodeOptions ?? {};
    const startedAt = new Date();

    const items: ConversionItem[] = request.sourcePaths.map((sourcePath, index) => ({
      id: `${index}`,
      status: 'pending',
      sourcePath,
      destinationPath: PathUtils.deriveOutputPath(request.destinationDirectory, sourcePath, targetFormat),
    }));

    this.logger.info(
      `Converting ${items.length} file(s) to ${targetFormat} in ${request.destinationDirectory}`
    );

    const processor = new BatchProcessor<ConversionItem>(this.logger, {
      onError: (item, error) => {
        item.outcome = this.createFailedOutcome(item, error);
      },
      onItemComplete: (item, _success, index) => {
        if (item.outcome && options.onOutcome) {
          options.onOutcome(item.outcome, index, items.length);
        }
      },
    });

    await processor.process(items, async (item) => {
      item.startedAt = Date.now();
      await this.convertOne(item, targetFormat, encodeOptions);
      item.outcome = {
        sourcePath: item.sourcePath,
        destinationPath: item.destinationPath,
        status: { kind: 'success' },
        durationMs: Date.now() - item.startedAt,
      };
    });

    const outcomes = items.map((item) => item.outcome ?? this.createFailedOutcome(item, new Error('Not processed')));
    const succeeded = outcomes.filter((outcome) => outcome.status.kind === 'success').length;

    const report: BatchReport = {
      targetFormat,
      destinationDirectory: request.destinationDirectory,
      outcomes: Object.freeze(outcomes.map((outcome) => Object.freeze(outcome))),
      total: outcomes.length,
      succeeded,
      failed: outcomes.length - succeeded,
      startedAt,
      durationMs: Date.now() - startedAt.getTime(),
    };

    this.logger.info(`Batch finished: ${report.succeeded}/${report.total} converted`);
    return Object.freeze(report);
  }

  private async validateRequest(request: ConversionRequest): Promise<TargetFormat> {
    if (request.sourcePaths.length === 0) {
      throw this.reject('No source files were given');
    }

    const formatValidation = this.formatValidator.validate(request.targetFormat, request.encodeOptions);
    formatValidation.warnings.forEach((warning) => this.logger.warn(warning));
    if (!formatValidation.valid || !formatValidation.format) {
      throw this.reject('Invalid target format or encode options', formatValidation.errors);
    }

    const destination = await this.directoryManager.verifyWritableDirectory(request.destinationDirectory);
    if (!destination.success) {
      throw this.reject(destination.error ?? `Destination is not writable: ${request.destinationDirectory}`);
    }

    return formatValidation.format;
  }

  private reject(message: string, details: string[] = []): ValidationError {
    const error = new ValidationError(details.length > 0 ? `${message}: ${details.join('; ')}` : message, details);
    this.errorHandler.handleError(error, { operation: 'validate_request', timestamp: new Date() });
    return error;
  }

  private async convertOne(item: ConversionItem, format: TargetFormat, options: EncodeOptions): Promise<void> {
    await this.checkSource(item.sourcePath);

    const existedBefore = await this.fileWriter.exists(item.destinationPath);

    try {
      await this.codec.decodeThenEncode(item.sourcePath, item.destinationPath, format, options);
    } catch (error) {
      if (!existedBefore) {
        await this.fileWriter.remove(item.destinationPath);
      }
      throw new ConversionFailureError(item.sourcePath, toError(error).message, { cause: error });
    }

    this.logger.debug(`Converted ${item.sourcePath} -> ${item.destinationPath}`);
  }

  private async checkSource(sourcePath: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await fs.stat(sourcePath);
    } catch {
      throw new SourceUnavailableError(sourcePath, OUTCOME_REASONS.SOURCE_NOT_FOUND);
    }

    if (!stats.isFile()) {
      throw new SourceUnavailableError(sourcePath, OUTCOME_REASONS.SOURCE_UNREADABLE);
    }

    try {
      await fs.access(sourcePath, fsConstants.R_OK);
    } catch {
      throw new SourceUnavailableError(sourcePath, OUTCOME_REASONS.SOURCE_UNREADABLE);
    }
  }

  private createFailedOutcome(item: ConversionItem, error: Error): ConversionOutcome {
    const categorized = this.errorHandler.handleError(error, {
      operation: 'convert_file',
      sourcePath: item.sourcePath,
      destinationPath: item.destinationPath,
      timestamp: new Date(),
    });

    return {
      sourcePath: item.sourcePath,
      destinationPath: item.destinationPath,
      status: { kind: 'failed', reason: error.message },
      category: toFailureCategory(categorized.category),
      durationMs: item.startedAt !== undefined ? Date.now() - item.startedAt : 0,
    };
  }
}

/**
 * Functional form of ConversionOrchestrator.convertBatch
 */
export function convertBatch(
  request: ConversionRequest,
  codec: ImageCodec,
  logger: Logger,
  options: ConvertBatchOptions = {}
): Promise<BatchReport> {
  return new ConversionOrchestrator(codec, logger).convertBatch(request, options);
}
