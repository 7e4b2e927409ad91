/**
 * Converter Module
 * Rasterizes one local PDF, stitches the pages and writes the long image
 */

import { stat } from "fs/promises";
import path from "node:path";
import { InputNotFoundError, toFailure } from "../errors";
import {
  defaultOutputPath,
  fileExists,
  formatFileSize,
  parseHexColor,
} from "../utils";
import { stitch } from "./stitcher";
import type {
  ConversionContext,
  ConversionResult,
  ConvertOptions,
} from "../types";

/**
 * Log roughly every tenth page, and always the last one
 */
function progressLogger(ctx: ConversionContext) {
  return (done: number, total: number): void => {
    const step = Math.max(1, Math.floor(total / 10));
    if (done % step === 0 || done === total) {
      ctx.logger.info(`Stitching pages: ${done}/${total}`);
    }
  };
}

/**
 * Convert a local PDF into a single stitched image
 *
 * Never throws: a missing input or any failure while rendering, stitching or
 * writing comes back as `{ success: false, error, reason }`
 */
export async function convertPdf(
  ctx: ConversionContext,
  pdfPath: string,
  options: ConvertOptions = {},
): Promise<ConversionResult> {
  const { config, logger } = ctx;
  logger.info(`Converting PDF: ${pdfPath}`);

  if (!(await fileExists(pdfPath))) {
    const failure = toFailure(
      new InputNotFoundError(`PDF 文件不存在: ${pdfPath}`),
    );
    logger.error(failure.error);
    return failure;
  }

  try {
    const dpi = options.dpi ?? config.render.dpi;
    const spacing = options.spacing ?? config.stitch.spacing;

    logger.debug(`Rendering at ${dpi} DPI`);
    const pages = await ctx.rasterizer.rasterize(pdfPath, dpi);

    logger.info(`Stitching ${pages.length} pages...`);
    const composite = stitch(pages, {
      spacing,
      background: parseHexColor(config.stitch.background),
      align: config.stitch.align,
      onProgress: progressLogger(ctx),
    });
    logger.debug(
      `Canvas ${composite.width}x${composite.height}px, spacing ${spacing}px`,
    );

    const outputPath = path.resolve(
      options.output ?? defaultOutputPath(pdfPath, config.output),
    );
    logger.info(`Saving image to: ${outputPath}`);
    await ctx.writer.write(composite, outputPath, {
      quality: config.output.quality,
    });

    const { size } = await stat(outputPath);

    return {
      success: true,
      output_path: outputPath,
      ...formatFileSize(size),
      pages: pages.length,
      width: composite.width,
      height: composite.height,
    };
  } catch (error) {
    const failure = toFailure(error);
    logger.error(`Conversion failed: ${failure.error}`, error);
    return failure;
  }
}
