/**
 * Rasterizer Module
 * Renders PDF pages with pdf-to-img and decodes them for the stitcher
 */

import { pdf as pdfToImg } from "pdf-to-img";
import { MalformedDocumentError } from "../errors";
import { decodeImage } from "./codec";
import type { PageImage, Rasterizer } from "../types";

// PDF user space: 72 units per inch, rendered 1:1 at scale 1
const PDF_UNITS_PER_INCH = 72;

/**
 * Render scale for a target resolution, e.g. 150 DPI -> 2.0833
 */
export function scaleForDpi(dpi: number): number {
  return dpi / PDF_UNITS_PER_INCH;
}

/**
 * Render every page of a PDF file at `dpi`, in page order
 * Pages are handled one at a time; the PNG of a page is dropped once decoded
 *
 * @throws MalformedDocumentError when the document cannot be opened or a page
 * fails to render
 */
export async function rasterize(
  pdfPath: string,
  dpi: number,
): Promise<PageImage[]> {
  const pages: PageImage[] = [];

  try {
    const document = await pdfToImg(pdfPath, { scale: scaleForDpi(dpi) });
    for await (const page of document) {
      pages.push(await decodeImage(page));
    }
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new MalformedDocumentError(`PDF 解析失败: ${details}`, {
      cause: error,
    });
  }

  return pages;
}

export const pdfRasterizer: Rasterizer = {
  rasterize,
};
