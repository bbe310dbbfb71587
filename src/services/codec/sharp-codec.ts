import sharp from 'sharp';
import * as bmp from 'bmp-js';
import * as fs from 'fs/promises';
import { EncodeOptions, ImageInfo, Logger, TargetFormat } from '../../types';
import { SUPPORTED_TARGET_FORMATS } from '../../core/constants';
import { FileWriter } from '../local/file-writer';
import { ImageCodec } from './interfaces';

const BMP_SIGNATURE = 'BM';

interface DecodedBmp {
  pixels: Buffer;
  width: number;
  height: number;
  channels: 3 | 4;
}

function isBmp(data: Buffer): boolean {
  return data.length > 2 && data.toString('latin1', 0, 2) === BMP_SIGNATURE;
}

/**
 * libvips has no BMP loader, so bitmaps are decoded by bmp-js. Its pixel data is
 * ABGR; alpha is only meaningful when the decoder reports it.
 */
function decodeBmp(data: Buffer): DecodedBmp {
  const image = bmp.decode(data);
  const channels = image.is_with_alpha ? 4 : 3;
  const pixelCount = image.width * image.height;
  const pixels = Buffer.alloc(pixelCount * channels);

  for (let i = 0; i < pixelCount; i++) {
    const from = i * 4;
    const to = i * channels;
    pixels[to] = image.data[from + 3];
    pixels[to + 1] = image.data[from + 2];
    pixels[to + 2] = image.data[from + 1];
    if (channels === 4) {
      pixels[to + 3] = image.data[from];
    }
  }

  return { pixels, width: image.width, height: image.height, channels };
}

/**
 * Codec backed by sharp (libvips). Encodes into memory, then hands the bytes to
 * FileWriter so the destination only ever holds a complete file.
 */
export class SharpCodec implements ImageCodec {
  private readonly logger: Logger;
  private readonly fileWriter: FileWriter;

  constructor(logger: Logger, fileWriter?: FileWriter) {
    this.logger = logger;
    this.fileWriter = fileWriter ?? new FileWriter(logger);
  }

  getName(): string {
    return 'sharp';
  }

  getSupportedFormats(): TargetFormat[] {
    return SUPPORTED_TARGET_FORMATS.filter((format) => sharp.format[format]?.output.file === true);
  }

  async decodeThenEncode(
    sourcePath: string,
    destinationPath: string,
    targetFormat: TargetFormat,
    options: EncodeOptions = {}
  ): Promise<void> {
    this.logger.debug(`Encoding ${sourcePath} -> ${destinationPath} (${targetFormat})`);

    const input = await this.open(sourcePath);
    // rotate() applies EXIF orientation before the metadata is dropped
    const pipeline = this.applyEncoder(input.rotate(), targetFormat, options);
    const buffer = await pipeline.toBuffer();

    const writeResult = await this.fileWriter.writeAtomic(destinationPath, buffer);
    if (!writeResult.success) {
      throw new Error(writeResult.error ?? `Failed to write ${destinationPath}`);
    }
  }

  async getImageInfo(imagePath: string): Promise<ImageInfo> {
    const data = await fs.readFile(imagePath);

    if (isBmp(data)) {
      const decoded = decodeBmp(data);
      return {
        path: imagePath,
        format: 'bmp',
        width: decoded.width,
        height: decoded.height,
        channels: decoded.channels,
        hasAlpha: decoded.channels === 4,
        space: 'srgb',
        sizeBytes: data.length,
      };
    }

    const metadata = await sharp(data).metadata();

    return {
      path: imagePath,
      format: metadata.format ?? 'unknown',
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
      channels: metadata.channels ?? 0,
      hasAlpha: metadata.hasAlpha ?? false,
      space: metadata.space,
      sizeBytes: data.length,
    };
  }

  private async open(sourcePath: string): Promise<sharp.Sharp> {
    const data = await fs.readFile(sourcePath);

    if (!isBmp(data)) {
      return sharp(data);
    }

    const { pixels, width, height, channels } = decodeBmp(data);
    return sharp(pixels, { raw: { width, height, channels } });
  }

  private applyEncoder(pipeline: sharp.Sharp, format: TargetFormat, options: EncodeOptions): sharp.Sharp {
    const { quality, lossless } = options;

    switch (format) {
      case 'png':
        return pipeline.png();
      case 'jpeg':
        // JPEG has no alpha channel; transparent areas become white instead of black
        return pipeline.flatten({ background: '#ffffff' }).jpeg({ quality });
      case 'tiff':
        return pipeline.tiff({ quality, compression: options.compression });
      case 'webp':
        return pipeline.webp({ quality, lossless });
      case 'avif':
        return pipeline.avif({ quality, lossless });
      case 'gif':
        return pipeline.gif();
    }
  }
}
