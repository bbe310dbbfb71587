import { ConsoleLogger, EnhancedLogger } from '../../core/logger';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('EnhancedLogger', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'imgconv-logger-test-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write JSON lines at or above the configured level', async () => {
    const logger = new EnhancedLogger({ level: 'WARN', enableConsole: false, enableFileLogging: true, logDirectory: tempDir });

    logger.info('hidden');
    logger.warn('Destination almost full', { freeBytes: 10 });

    const files = await fs.readdir(tempDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^converter-.*\.log$/);

    const entries = (await fs.readFile(path.join(tempDir, files[0]), 'utf8'))
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    expect(entries).toHaveLength(1);
    expect(entries[0]).toEqual(
      expect.objectContaining({ level: 'WARN', message: 'Destination almost full', meta: { freeBytes: 10 } })
    );
  });

  it('should prefix console output with level and timestamp', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new EnhancedLogger({ level: 'ERROR' });

    logger.error('decode failed', { file: 'cat.png' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/^\[ERROR\] \S+ decode failed \{"file":"cat.png"\}$/);
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should drop messages below its level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('ERROR');

    logger.info('quiet');
    logger.error('loud');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] loud', '');
  });
});
