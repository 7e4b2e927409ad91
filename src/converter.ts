/**
 * Converter - entry point for programmatic use
 * Wires config and collaborators into a context; no business logic here
 */

import type {
  BatchResult,
  ConversionConfig,
  ConversionContext,
  ConversionResult,
  ConvertOptions,
  ImageWriter,
  Rasterizer,
} from "./types";
import { Logger } from "./utils/logger";
import { pdfRasterizer } from "./modules/rasterizer";
import * as modules from "./modules";

export interface ConverterOptions {
  logger?: Logger;
  rasterizer?: Rasterizer;
  writer?: ImageWriter;
}

export class Converter {
  private ctx: ConversionContext;

  constructor(config: ConversionConfig, options: ConverterOptions = {}) {
    this.ctx = {
      config,
      logger: options.logger ?? new Logger(config.logging.level),
      rasterizer: options.rasterizer ?? pdfRasterizer,
      writer: options.writer ?? modules.sharpWriter,
    };
  }

  convert(pdfPath: string, options?: ConvertOptions): Promise<ConversionResult> {
    return modules.convertPdf(this.ctx, pdfPath, options);
  }

  convertFromUrl(
    url: string,
    options?: ConvertOptions,
  ): Promise<ConversionResult> {
    return modules.convertFromUrl(this.ctx, url, options);
  }

  convertDirectory(
    pdfDir: string,
    outputDir?: string,
    options?: Omit<ConvertOptions, "output">,
  ): Promise<BatchResult> {
    return modules.convertDirectory(this.ctx, pdfDir, outputDir, options);
  }
}
