/**
 * Raster image types shared by the rasterizer, stitcher and codec
 */

/**
 * Channel layouts produced by the decoder:
 * 1 = grayscale, 2 = grayscale + alpha, 3 = RGB, 4 = RGBA
 */
export type Channels = 1 | 2 | 3 | 4;

/**
 * One rasterized PDF page as raw, row-major, 8-bit pixels
 */
export interface PageImage {
  width: number;
  height: number;
  channels: Channels;
  data: Uint8Array;
}

/**
 * The stitched output. Always opaque RGB.
 */
export interface CompositeImage {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

type Alignment = "left" | "center";

export interface StitchOptions {
  spacing?: number;
  background?: RgbColor;
  align?: Alignment;
  onProgress?: (done: number, total: number) => void;
}

export type ImageFormat = "png" | "jpeg" | "webp";

export interface WriteOptions {
  quality: number;
}
