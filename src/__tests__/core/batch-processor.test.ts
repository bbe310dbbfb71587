import { BatchProcessor, BatchItem } from '../../core/batch-processor';
import { ConsoleLogger } from '../../core/logger';

interface TestBatchItem extends BatchItem {
  value: number;
  shouldFail?: boolean;
}

function createItems(count: number, failing: number[] = []): TestBatchItem[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `${index + 1}`,
    status: 'pending' as const,
    value: index + 1,
    shouldFail: failing.includes(index + 1),
  }));
}

describe('BatchProcessor', () => {
  let logger: ConsoleLogger;

  beforeEach(() => {
    logger = new ConsoleLogger('ERROR');
  });

  describe('Basic Processing', () => {
    it('should process items successfully', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);
      const items = createItems(5);
      const mockProcessor = jest.fn().mockResolvedValue(undefined);

      const result = await processor.process(items, mockProcessor);

      expect(result.totalItems).toBe(5);
      expect(result.successfulItems).toBe(5);
      expect(result.failedItems).toBe(0);
      expect(mockProcessor).toHaveBeenCalledTimes(5);
      items.forEach((item) => {
        expect(item.status).toBe('completed');
      });
    });

    it('should process items one at a time in input order', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);
      const items = createItems(4);
      const events: string[] = [];

      await processor.process(items, async (item) => {
        events.push(`start ${item.id}`);
        await new Promise((resolve) => setTimeout(resolve, 5 - item.value));
        events.push(`end ${item.id}`);
      });

      expect(events).toEqual([
        'start 1', 'end 1',
        'start 2', 'end 2',
        'start 3', 'end 3',
        'start 4', 'end 4',
      ]);
    });

    it('should pass the item index to the processor', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);
      const indexes: number[] = [];

      await processor.process(createItems(3), async (_item, index) => {
        indexes.push(index);
      });

      expect(indexes).toEqual([0, 1, 2]);
    });
  });

  describe('Error Handling', () => {
    it('should continue after a failing item and attempt it only once', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);
      const items = createItems(3, [2]);
      const mockProcessor = jest.fn().mockImplementation(async (item: TestBatchItem) => {
        if (item.shouldFail) {
          throw new Error(`Item ${item.id} failed`);
        }
      });

      const result = await processor.process(items, mockProcessor);

      expect(mockProcessor).toHaveBeenCalledTimes(3);
      expect(result.successfulItems).toBe(2);
      expect(result.failedItems).toBe(1);
      expect(items[1].status).toBe('failed');
      expect(items[1].error).toBe('Item 2 failed');
      expect(items[2].status).toBe('completed');
    });

    it('should normalize non-Error rejections', async () => {
      const onError = jest.fn();
      const processor = new BatchProcessor<TestBatchItem>(logger, { onError });
      const items = createItems(1);

      await processor.process(items, async () => {
        throw 'plain string';
      });

      expect(onError).toHaveBeenCalledWith(items[0], new Error('plain string'));
      expect(items[0].error).toBe('plain string');
    });

    it('should refuse to start while already running', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);
      let release: () => void = () => undefined;
      const blocked = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = processor.process(createItems(1), () => blocked);

      await expect(processor.process(createItems(1), async () => undefined)).rejects.toThrow(
        'Batch processor is already running'
      );

      release();
      await first;
      expect(processor.isRunning()).toBe(false);
    });
  });

  describe('Callbacks', () => {
    it('should report progress and completion for every item', async () => {
      const onProgress = jest.fn();
      const onItemComplete = jest.fn();
      const processor = new BatchProcessor<TestBatchItem>(logger, { onProgress, onItemComplete });
      const items = createItems(2, [1]);

      await processor.process(items, async (item) => {
        if (item.shouldFail) {
          throw new Error('boom');
        }
      });

      expect(onProgress).toHaveBeenNthCalledWith(1, 1, 2, items[0]);
      expect(onProgress).toHaveBeenNthCalledWith(2, 2, 2, items[1]);
      expect(onItemComplete).toHaveBeenNthCalledWith(1, items[0], false, 0);
      expect(onItemComplete).toHaveBeenNthCalledWith(2, items[1], true, 1);
    });

    it('should call onError before onItemComplete for a failed item', async () => {
      const calls: string[] = [];
      const processor = new BatchProcessor<TestBatchItem>(logger, {
        onError: () => calls.push('error'),
        onItemComplete: () => calls.push('complete'),
      });

      await processor.process(createItems(1, [1]), async () => {
        throw new Error('boom');
      });

      expect(calls).toEqual(['error', 'complete']);
    });
  });

  describe('Statistics', () => {
    it('should report idle statistics after processing', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);

      await processor.process(createItems(3), async () => undefined);

      expect(processor.getStatistics()).toEqual({
        isProcessing: false,
        processedCount: 3,
        elapsedTime: 0,
      });
    });

    it('should report zero average time for an empty batch', async () => {
      const processor = new BatchProcessor<TestBatchItem>(logger);

      const result = await processor.process([], async () => undefined);

      expect(result.totalItems).toBe(0);
      expect(result.averageProcessingTime).toBe(0);
    });
  });
});
