/**
 * Base interfaces for the image codec capability
 */

import { EncodeOptions, ImageInfo, TargetFormat } from '../../types';

export interface ImageCodec {
  /**
   * Name used to register and select the codec
   */
  getName(): string;

  /**
   * Target formats this codec can write
   */
  getSupportedFormats(): TargetFormat[];

  /**
   * Decode the source image and encode it into `targetFormat` at `destinationPath`.
   * Rejects with the library's reason when the conversion fails.
   */
  decodeThenEncode(
    sourcePath: string,
    destinationPath: string,
    targetFormat: TargetFormat,
    options?: EncodeOptions
  ): Promise<void>;

  getImageInfo(imagePath: string): Promise<ImageInfo>;
}
