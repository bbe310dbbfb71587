import * as fs from 'fs/promises';
import { EncodeOptions, ImageInfo, TargetFormat } from '../../types';
import { SUPPORTED_TARGET_FORMATS } from '../../core/constants';
import { ImageCodec } from '../../services/codec/interfaces';

export const CORRUPT_MARKER = 'CORRUPT';

export interface FakeCodecCall {
  sourcePath: string;
  destinationPath: string;
  format: TargetFormat;
  options: EncodeOptions;
}

/**
 * Deterministic in-memory codec. The "encoded" file is `<format>:<source text>`.
 * Sources starting with CORRUPT fail after leaving a partial destination file.
 */
export class FakeCodec implements ImageCodec {
  readonly calls: FakeCodecCall[] = [];
  private readonly name: string;
  private readonly supportedFormats: TargetFormat[];

  constructor(name = 'fake', supportedFormats: TargetFormat[] = [...SUPPORTED_TARGET_FORMATS]) {
    this.name = name;
    this.supportedFormats = supportedFormats;
  }

  getName(): string {
    return this.name;
  }

  getSupportedFormats(): TargetFormat[] {
    return [...this.supportedFormats];
  }

  async decodeThenEncode(
    sourcePath: string,
    destinationPath: string,
    format: TargetFormat,
    options: EncodeOptions = {}
  ): Promise<void> {
    this.calls.push({ sourcePath, destinationPath, format, options });
    const text = await fs.readFile(sourcePath, 'utf8');

    if (text.startsWith(CORRUPT_MARKER)) {
      await fs.writeFile(destinationPath, 'partial');
      throw new Error('Input file is corrupt');
    }

    await fs.writeFile(destinationPath, `${format}:${text}`);
  }

  async getImageInfo(imagePath: string): Promise<ImageInfo> {
    const stats = await fs.stat(imagePath);
    return {
      path: imagePath,
      format: 'fake',
      width: 2,
      height: 1,
      channels: 3,
      hasAlpha: false,
      sizeBytes: stats.size,
    };
  }
}
