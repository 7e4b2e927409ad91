/**
 * Codec Module
 * Decodes rendered pages to raw pixels and encodes the composite, via sharp
 */

import { mkdir } from "fs/promises";
import { dirname, extname } from "node:path";
import sharp from "sharp";
import { EncodingError } from "../errors";
import type {
  CompositeImage,
  ImageFormat,
  ImageWriter,
  PageImage,
  WriteOptions,
} from "../types";

const FORMATS_BY_EXTENSION: Record<string, ImageFormat> = {
  ".png": "png",
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".webp": "webp",
};

/**
 * Pick the output format from the file extension (case-insensitive)
 *
 * @throws EncodingError for extensions sharp is not asked to write
 */
export function formatFromPath(outputPath: string): ImageFormat {
  const extension = extname(outputPath).toLowerCase();
  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    throw new EncodingError(
      `不支持的图片格式: ${extension || "(无扩展名)"} (支持 .png, .jpg, .jpeg, .webp)`,
    );
  }
  return format;
}

/**
 * Decode an encoded image (PNG, JPEG, ...) into raw 8-bit pixels
 * Palette images come back expanded to RGB or RGBA
 */
export async function decodeImage(input: Buffer): Promise<PageImage> {
  const { data, info } = await sharp(input)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    width: info.width,
    height: info.height,
    channels: info.channels,
    data,
  };
}

/**
 * Encode the composite in the format implied by the path and write it
 */
export async function writeImage(
  image: CompositeImage,
  outputPath: string,
  options: WriteOptions,
): Promise<void> {
  const format = formatFromPath(outputPath);

  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
    // Long documents easily pass the default input pixel limit
    limitInputPixels: false,
  });

  switch (format) {
    case "png":
      pipeline.png();
      break;
    case "jpeg":
      pipeline.jpeg({ quality: options.quality });
      break;
    case "webp":
      pipeline.webp({ quality: options.quality });
      break;
  }

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await pipeline.toFile(outputPath);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new EncodingError(`图片保存失败: ${details}`, { cause: error });
  }
}

export const sharpWriter: ImageWriter = {
  write: writeImage,
};
