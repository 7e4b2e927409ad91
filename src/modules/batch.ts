/**
 * Batch Module
 * Converts every PDF directly inside a directory, one file at a time
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import glob from "fast-glob";
import chalk from "chalk";
import {
  DirectoryNotFoundError,
  NoPdfFilesError,
  toFailure,
} from "../errors";
import { isDirectory, outputFilename } from "../utils";
import { convertPdf } from "./converter";
import type {
  BatchEntry,
  BatchResult,
  ConversionContext,
  ConvertOptions,
} from "../types";

/**
 * List `*.pdf` files directly inside `directory`, sorted by name
 */
export async function findPdfFiles(directory: string): Promise<string[]> {
  const files = await glob("*.pdf", {
    cwd: directory,
    absolute: true,
    onlyFiles: true,
    deep: 1,
  });

  return files.sort((a, b) =>
    path.basename(a).localeCompare(path.basename(b)),
  );
}

/**
 * Convert all PDFs in `pdfDir`
 *
 * Writes `<stem>_stitched.png` per file into `outputDir`
 * (default `<pdfDir>/converted`). A failing file is recorded and the batch
 * moves on; only a missing directory or an empty listing fails the batch.
 */
export async function convertDirectory(
  ctx: ConversionContext,
  pdfDir: string,
  outputDir?: string,
  options: Omit<ConvertOptions, "output"> = {},
): Promise<BatchResult> {
  const { config, logger } = ctx;
  logger.info(`Batch converting directory: ${pdfDir}`);

  try {
    if (!(await isDirectory(pdfDir))) {
      throw new DirectoryNotFoundError(`目录不存在: ${pdfDir}`);
    }

    const pdfFiles = await findPdfFiles(pdfDir);
    if (pdfFiles.length === 0) {
      throw new NoPdfFilesError(`目录中没有找到 PDF 文件: ${pdfDir}`);
    }
    logger.info(`Found ${pdfFiles.length} PDF files`);

    const targetDir = outputDir ?? path.join(pdfDir, config.output.batchDirectory);
    await mkdir(targetDir, { recursive: true });

    const results: BatchEntry[] = [];
    let successCount = 0;
    let failCount = 0;

    for (const [index, pdfFile] of pdfFiles.entries()) {
      const file = path.basename(pdfFile);
      logger.info(`[${index + 1}/${pdfFiles.length}] Processing: ${file}`);

      const output = path.join(
        targetDir,
        outputFilename(path.parse(pdfFile).name, config.output),
      );
      const result = await convertPdf(ctx, pdfFile, { ...options, output });
      results.push({ file, result });

      if (result.success) {
        successCount++;
      } else {
        failCount++;
      }
    }

    logger.info(
      `Batch complete: ${chalk.green(`${successCount} succeeded`)}, ${
        failCount > 0 ? chalk.red(`${failCount} failed`) : `${failCount} failed`
      }`,
    );

    return {
      success: true,
      total: pdfFiles.length,
      success_count: successCount,
      fail_count: failCount,
      results,
    };
  } catch (error) {
    const failure = toFailure(error);
    logger.error(failure.error);
    return failure;
  }
}
