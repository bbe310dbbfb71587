// bmp-js ships without type definitions

declare module 'bmp-js' {
  export interface BmpImage {
    width: number;
    height: number;
    /** Four bytes per pixel in ABGR order */
    data: Buffer;
    is_with_alpha: boolean;
  }

  export function decode(data: Buffer): BmpImage;
}
