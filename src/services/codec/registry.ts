import { ImageCodec } from './interfaces';

/**
 * Registry for image codecs; the first registered codec is the default
 */
export class CodecRegistry {
  private codecs: Map<string, ImageCodec> = new Map();
  private defaultCodecName?: string;

  register(codec: ImageCodec, options: { makeDefault?: boolean } = {}): void {
    const name = codec.getName();
    if (this.codecs.has(name)) {
      throw new Error(`Codec with name '${name}' is already registered`);
    }
    this.codecs.set(name, codec);

    if (!this.defaultCodecName || options.makeDefault) {
      this.defaultCodecName = name;
    }
  }

  unregister(codecName: string): boolean {
    const removed = this.codecs.delete(codecName);
    if (removed && this.defaultCodecName === codecName) {
      this.defaultCodecName = this.codecs.keys().next().value;
    }
    return removed;
  }

  /**
   * Get a codec by name, or the default codec when no name is given
   */
  getCodec(name?: string): ImageCodec {
    const codecName = name ?? this.defaultCodecName;
    const codec = codecName !== undefined ? this.codecs.get(codecName) : undefined;

    if (!codec) {
      const available = this.getCodecNames();
      throw new Error(
        name
          ? `Unknown codec '${name}'. Available codecs: ${available.join(', ') || 'none'}`
          : 'No codec registered'
      );
    }
    return codec;
  }

  getCodecNames(): string[] {
    return Array.from(this.codecs.keys());
  }

  getCodecCount(): number {
    return this.codecs.size;
  }
}
