/**
 * Conversion context - passed to every orchestrator
 * Holds the merged config and the external collaborators, so tests can swap
 * the rasterizer and writer for in-process fakes
 */

import type { ConversionConfig } from "./config";
import type { CompositeImage, PageImage, WriteOptions } from "./image";
import type { Logger } from "../utils/logger";

export interface Rasterizer {
  /**
   * Render every page of a PDF, in page order
   */
  rasterize(pdfPath: string, dpi: number): Promise<PageImage[]>;
}

export interface ImageWriter {
  /**
   * Encode the composite and write it to disk
   */
  write(
    image: CompositeImage,
    outputPath: string,
    options: WriteOptions,
  ): Promise<void>;
}

export interface ConversionContext {
  config: ConversionConfig;
  logger: Logger;
  rasterizer: Rasterizer;
  writer: ImageWriter;
}
