// Sequential batch processing with per-item status tracking

import { Logger } from '../types';
import { toError } from './errors';

export type BatchItemStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface BatchItem {
  id: string;
  status: BatchItemStatus;
  error?: string;
}

export interface BatchProcessorOptions<T extends BatchItem> {
  onProgress?: (processed: number, total: number, current: T) => void;
  onItemComplete?: (item: T, success: boolean, index: number) => void;
  onError?: (item: T, error: Error) => void;
}

export interface BatchProcessorResult<T extends BatchItem> {
  totalItems: number;
  successfulItems: number;
  failedItems: number;
  items: T[];
  duration: number;
  averageProcessingTime: number;
}

/**
 * Runs a processor over items one at a time, in input order. A failing item is
 * marked failed and never stops the items after it. Each item is attempted once.
 */
export class BatchProcessor<T extends BatchItem> {
  private readonly logger: Logger;
  private readonly options: BatchProcessorOptions<T>;
  private isProcessing = false;
  private startTime = 0;
  private processedCount = 0;

  constructor(logger: Logger, options: BatchProcessorOptions<T> = {}) {
    this.logger = logger;
    this.options = options;
  }

  /**
   * Process items sequentially
   */
  async process(
    items: T[],
    processor: (item: T, index: number) => Promise<void>
  ): Promise<BatchProcessorResult<T>> {
    if (this.isProcessing) {
      throw new Error('Batch processor is already running');
    }

    this.isProcessing = true;
    this.startTime = Date.now();
    this.processedCount = 0;

    try {
      this.logger.info(`Starting batch processing of ${items.length} items`);

      for (let index = 0; index < items.length; index++) {
        await this.processItem(items[index], index, items.length, processor);
      }

      const result = this.generateResult(items, Date.now() - this.startTime);
      this.logger.info(`Batch processing completed: ${result.successfulItems}/${result.totalItems} successful`);
      return result;
    } finally {
      this.isProcessing = false;
    }
  }

  isRunning(): boolean {
    return this.isProcessing;
  }

  /**
   * Get current processing statistics
   */
  getStatistics(): { isProcessing: boolean; processedCount: number; elapsedTime: number } {
    return {
      isProcessing: this.isProcessing,
      processedCount: this.processedCount,
      elapsedTime: this.isProcessing ? Date.now() - this.startTime : 0,
    };
  }

  private async processItem(
    item: T,
    index: number,
    total: number,
    processor: (item: T, index: number) => Promise<void>
  ): Promise<void> {
    item.status = 'processing';
    let success = true;

    try {
      await processor(item, index);
      item.status = 'completed';
    } catch (error) {
      const normalized = toError(error);
      success = false;
      item.status = 'failed';
      item.error = normalized.message;

      if (this.options.onError) {
        this.options.onError(item, normalized);
      }

      this.logger.debug(`Item ${item.id} failed: ${item.error}`);
    }

    this.processedCount++;

    if (this.options.onProgress) {
      this.options.onProgress(this.processedCount, total, item);
    }

    if (this.options.onItemComplete) {
      this.options.onItemComplete(item, success, index);
    }
  }

  private generateResult(items: T[], duration: number): BatchProcessorResult<T> {
    const successfulItems = items.filter(item => item.status === 'completed').length;
    const failedItems = items.filter(item => item.status === 'failed').length;
    const processed = successfulItems + failedItems;

    return {
      totalItems: items.length,
      successfulItems,
      failedItems,
      items,
      duration,
      averageProcessingTime: processed > 0 ? duration / processed : 0,
    };
  }
}
