/**
 * Stitcher Module
 * Stacks rasterized pages top to bottom into one opaque RGB canvas
 */

import { InvalidInputError } from "../errors";
import { WHITE } from "../utils/color";
import type {
  CompositeImage,
  PageImage,
  RgbColor,
  StitchOptions,
} from "../types";

export const DEFAULT_SPACING = 10;

// ============================================================================
// Color normalization
// ============================================================================

/**
 * Blend one 8-bit channel over the background using straight alpha
 */
function blend(source: number, alpha: number, background: number): number {
  return Math.round((source * alpha + background * (255 - alpha)) / 255);
}

/**
 * Convert a page to packed RGB
 * Gray is replicated across channels; alpha is composited over the
 * background so no transparency reaches the canvas
 */
export function toRgb(image: PageImage, background: RgbColor): Uint8Array {
  const { width, height, channels, data } = image;
  if (channels === 3) return data;

  const pixels = width * height;
  const rgb = new Uint8Array(pixels * 3);

  for (let i = 0; i < pixels; i++) {
    const src = i * channels;
    const dst = i * 3;

    switch (channels) {
      case 1: {
        const gray = data[src];
        rgb[dst] = gray;
        rgb[dst + 1] = gray;
        rgb[dst + 2] = gray;
        break;
      }
      case 2: {
        const gray = data[src];
        const alpha = data[src + 1];
        rgb[dst] = blend(gray, alpha, background.r);
        rgb[dst + 1] = blend(gray, alpha, background.g);
        rgb[dst + 2] = blend(gray, alpha, background.b);
        break;
      }
      case 4: {
        const alpha = data[src + 3];
        rgb[dst] = blend(data[src], alpha, background.r);
        rgb[dst + 1] = blend(data[src + 1], alpha, background.g);
        rgb[dst + 2] = blend(data[src + 2], alpha, background.b);
        break;
      }
    }
  }

  return rgb;
}

// ============================================================================
// Validation
// ============================================================================

function assertSpacing(spacing: number): void {
  if (!Number.isInteger(spacing) || spacing < 0) {
    throw new InvalidInputError(`图片间距必须是非负整数: ${spacing}`);
  }
}

function assertPage(image: PageImage, index: number): void {
  const { width, height, channels, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidInputError(
      `第 ${index + 1} 页尺寸无效: ${width}x${height}`,
    );
  }
  if (data.length !== width * height * channels) {
    throw new InvalidInputError(
      `第 ${index + 1} 页像素数据长度不匹配: 期望 ${width * height * channels}, 实际 ${data.length}`,
    );
  }
}

// ============================================================================
// Main Stitch Function
// ============================================================================

/**
 * Stitch pages vertically into one composite
 *
 * Canvas width is the widest page, so nothing is clipped; with uniform page
 * widths it equals the first page's width. Height is the sum of page heights
 * plus `spacing` between consecutive pages (none before the first or after
 * the last). Gaps, and any area beside a narrower page, show `background`.
 *
 * @throws InvalidInputError for an empty sequence, a negative or fractional
 * spacing, or a page whose pixel buffer does not match its dimensions
 */
export function stitch(
  images: readonly PageImage[],
  options: StitchOptions = {},
): CompositeImage {
  if (images.length === 0) {
    throw new InvalidInputError("图片列表为空");
  }

  const spacing = options.spacing ?? DEFAULT_SPACING;
  const background = options.background ?? WHITE;
  const align = options.align ?? "left";

  assertSpacing(spacing);
  images.forEach(assertPage);

  let width = 0;
  let contentHeight = 0;
  for (const image of images) {
    width = Math.max(width, image.width);
    contentHeight += image.height;
  }
  const height = contentHeight + spacing * (images.length - 1);

  const rowBytes = width * 3;
  const data = Buffer.alloc(rowBytes * height);

  // Fill the first row with the background, then copy it down
  for (let x = 0; x < width; x++) {
    data[x * 3] = background.r;
    data[x * 3 + 1] = background.g;
    data[x * 3 + 2] = background.b;
  }
  for (let y = 1; y < height; y++) {
    data.copyWithin(y * rowBytes, 0, rowBytes);
  }

  let offsetY = 0;
  for (const [index, image] of images.entries()) {
    const rgb = toRgb(image, background);
    const pageRowBytes = image.width * 3;
    const offsetX =
      align === "center" ? Math.floor((width - image.width) / 2) : 0;

    for (let y = 0; y < image.height; y++) {
      const src = y * pageRowBytes;
      const dst = (offsetY + y) * rowBytes + offsetX * 3;
      data.set(rgb.subarray(src, src + pageRowBytes), dst);
    }

    offsetY += image.height + spacing;
    options.onProgress?.(index + 1, images.length);
  }

  return { width, height, channels: 3, data };
}
