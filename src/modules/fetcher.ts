/**
 * Fetcher Module
 * Downloads a remote PDF to a scoped temp file and converts it
 */

import path from "node:path";
import { toFailure } from "../errors";
import { downloadFile, outputFilename, stemFromUrl, withTempFile } from "../utils";
import { convertPdf } from "./converter";
import type {
  ConversionContext,
  ConversionResult,
  ConvertOptions,
} from "../types";

/**
 * Download `url` and convert it like a local file
 *
 * The temp copy is removed on every exit path. Without an explicit output the
 * image lands in the working directory, named after the URL's file name.
 */
export async function convertFromUrl(
  ctx: ConversionContext,
  url: string,
  options: ConvertOptions = {},
): Promise<ConversionResult> {
  const { config, logger } = ctx;
  logger.info(`Downloading PDF: ${url}`);

  const output =
    options.output ??
    path.resolve(outputFilename(stemFromUrl(url), config.output));

  try {
    return await withTempFile(".pdf", async (tempPath) => {
      const bytes = await downloadFile(url, tempPath, {
        timeout: config.download.timeout,
      });
      logger.info(`Download complete: ${tempPath} (${bytes} bytes)`);

      return convertPdf(ctx, tempPath, { ...options, output });
    });
  } catch (error) {
    const failure = toFailure(error);
    logger.error(`Download or conversion failed: ${failure.error}`, error);
    return failure;
  }
}
