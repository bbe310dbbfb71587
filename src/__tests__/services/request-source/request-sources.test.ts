import { ConverterConfigManager, ConverterConfig } from '../../../core/config-manager';
import { ValidationError } from '../../../core/errors';
import { ConsoleLogger } from '../../../core/logger';
import { DirectoryManager } from '../../../services/local/directory-manager';
import {
  CliRequestSource,
  InteractiveRequestSource,
  StaticRequestSource,
  buildEncodeOptions,
  expandSourcePaths,
  inputDirectoryOf,
  parsePathList,
} from '../../../services/request-source';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('Request sources', () => {
  let tempDir: string;
  let directoryManager: DirectoryManager;
  let config: ConverterConfig;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'imgconv-request-test-'));
    directoryManager = new DirectoryManager(new ConsoleLogger('ERROR'));
    config = ConverterConfigManager.createDefault();

    await fs.mkdir(path.join(tempDir, 'album', 'nested'), { recursive: true });
    await fs.writeFile(path.join(tempDir, 'album', 'one.png'), '');
    await fs.writeFile(path.join(tempDir, 'album', 'two.jpg'), '');
    await fs.writeFile(path.join(tempDir, 'album', 'list.txt'), '');
    await fs.writeFile(path.join(tempDir, 'album', 'nested', 'three.webp'), '');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('expandSourcePaths', () => {
    it('should replace directories with their images and keep other paths as given', async () => {
      const missing = path.join(tempDir, 'missing.png');

      const paths = await expandSourcePaths([path.join(tempDir, 'album'), missing], directoryManager, false);

      expect(paths).toEqual([
        path.join(tempDir, 'album', 'one.png'),
        path.join(tempDir, 'album', 'two.jpg'),
        missing,
      ]);
    });

    it('should include subdirectories when recursive', async () => {
      const paths = await expandSourcePaths([path.join(tempDir, 'album')], directoryManager, true);

      expect(paths).toContain(path.join(tempDir, 'album', 'nested', 'three.webp'));
      expect(paths).toHaveLength(3);
    });
  });

  describe('buildEncodeOptions', () => {
    it('should apply configured quality to lossy formats only', () => {
      expect(buildEncodeOptions('jpeg', config)).toEqual({ quality: 90 });
      expect(buildEncodeOptions('png', config)).toEqual({});
    });

    it('should apply configured compression to tiff', () => {
      expect(buildEncodeOptions('tif', config)).toEqual({ quality: 90, compression: 'lzw' });
    });

    it('should prefer explicit overrides', () => {
      expect(buildEncodeOptions('webp', config, { quality: 50, lossless: true })).toEqual({
        quality: 50,
        lossless: true,
      });
    });
  });

  describe('inputDirectoryOf', () => {
    it('should return the directory of the first source', () => {
      expect(inputDirectoryOf(['/a/b/cat.png', '/c/dog.png'])).toBe('/a/b');
      expect(inputDirectoryOf([])).toBeUndefined();
    });
  });

  describe('StaticRequestSource', () => {
    it('should hand out copies of its request', async () => {
      const request = { sourcePaths: ['/a.png'], targetFormat: 'png', destinationDirectory: '/out' };
      const source = new StaticRequestSource(request);

      const created = await source.createRequest();
      created.sourcePaths.push('/b.png');

      expect(source.describe()).toBe('static request (1 file(s))');
      expect((await source.createRequest()).sourcePaths).toEqual(['/a.png']);
    });
  });

  describe('CliRequestSource', () => {
    it('should build a request from arguments', async () => {
      const source = new CliRequestSource(
        { paths: [path.join(tempDir, 'album')], format: 'jpg', output: path.join(tempDir, 'out'), quality: 60 },
        config,
        directoryManager
      );

      const request = await source.createRequest();

      expect(request).toEqual({
        sourcePaths: [path.join(tempDir, 'album', 'one.png'), path.join(tempDir, 'album', 'two.jpg')],
        targetFormat: 'jpg',
        destinationDirectory: path.join(tempDir, 'out'),
        encodeOptions: { quality: 60 },
      });
    });

    it('should fall back to the remembered format and destination', async () => {
      const remembered = { ...config, outputFormat: 'gif' as const, outputDirectory: tempDir, recursive: true };
      const source = new CliRequestSource({ paths: [path.join(tempDir, 'album')] }, remembered, directoryManager);

      const request = await source.createRequest();

      expect(request.targetFormat).toBe('gif');
      expect(request.destinationDirectory).toBe(tempDir);
      expect(request.sourcePaths).toHaveLength(3);
    });

    it('should require a destination', async () => {
      const source = new CliRequestSource({ paths: ['cat.png'] }, config, directoryManager);

      await expect(source.createRequest()).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('InteractiveRequestSource', () => {
    it('should resolve answers against the last input directory', async () => {
      const answers = ['"album/one.png", album/two.jpg', 'webp', 'out'];
      const questions: string[] = [];
      const prompt = jest.fn(async (question: string) => {
        questions.push(question);
        return answers.shift() ?? '';
      });
      const source = new InteractiveRequestSource({ ...config, lastInputDirectory: tempDir }, directoryManager, prompt);

      const request = await source.createRequest();

      expect(request).toEqual({
        sourcePaths: [path.join(tempDir, 'album', 'one.png'), path.join(tempDir, 'album', 'two.jpg')],
        targetFormat: 'webp',
        destinationDirectory: path.join(tempDir, 'out'),
        encodeOptions: { quality: 90 },
      });
      expect(questions[1]).toBe('Target format [png/jpeg/tiff/webp/avif/gif] (png): ');
    });

    it('should use configured defaults for empty answers', async () => {
      const answers = [path.join(tempDir, 'album', 'one.png'), '', ''];
      const prompt = async () => answers.shift() ?? '';
      const remembered = { ...config, outputDirectory: path.join(tempDir, 'previous'), outputFormat: 'tiff' as const };
      const source = new InteractiveRequestSource(remembered, directoryManager, prompt);

      const request = await source.createRequest();

      expect(request.targetFormat).toBe('tiff');
      expect(request.destinationDirectory).toBe(path.join(tempDir, 'previous'));
      expect(request.encodeOptions).toEqual({ quality: 90, compression: 'lzw' });
    });

    it('should reject an empty file list', async () => {
      const source = new InteractiveRequestSource(config, directoryManager, async () => '');

      await expect(source.createRequest()).rejects.toThrow('No source files were given');
    });
  });

  describe('parsePathList', () => {
    it('should split on commas and whitespace and honor quotes', () => {
      expect(parsePathList(`a.png, b.png  'my photo.jpg' "x y.tif"`)).toEqual([
        'a.png',
        'b.png',
        'my photo.jpg',
        'x y.tif',
      ]);
    });
  });
});
