/**
 * In-process stand-ins for the rasterizer, shared by the module tests
 */

import { readFile } from "fs/promises";
import { MalformedDocumentError } from "../errors";
import { sharpWriter } from "../modules/codec";
import { Logger } from "../utils/logger";
import { loadDefaultConfig } from "../utils/load-config";
import type {
  Channels,
  ConversionContext,
  PageImage,
  Rasterizer,
} from "../types";

export type Pixel =
  | [number]
  | [number, number]
  | [number, number, number]
  | [number, number, number, number];

/**
 * A page filled with one pixel value, e.g. [255, 0, 0] or [0, 0, 0, 0]
 */
export function solidPage(
  width: number,
  height: number,
  pixel: Pixel = [255, 255, 255],
): PageImage {
  const channels: Channels = pixel.length;
  const data = new Uint8Array(width * height * channels);
  for (let i = 0; i < data.length; i += channels) {
    data.set(pixel, i);
  }
  return { width, height, channels, data };
}

export const PDF_HEADER = "%PDF-1.7\n";

/**
 * A minimal PDF with `pageCount` blank US Letter pages (612 x 792 points)
 */
export function letterPdf(pageCount: number): Buffer {
  const pageIds = Array.from({ length: pageCount }, (_, i) => i + 3);
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageCount} >>`,
    ...pageIds.map(
      () => "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] >>",
    ),
  ];

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\n`;
  body += `startxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, "latin1");
}

/**
 * Rasterizer that accepts any file starting with a PDF header and returns
 * the given pages; anything else is treated as a corrupt document
 */
export class FakeRasterizer implements Rasterizer {
  calls: Array<{ pdfPath: string; dpi: number }> = [];

  constructor(private pages: PageImage[]) {}

  async rasterize(pdfPath: string, dpi: number): Promise<PageImage[]> {
    this.calls.push({ pdfPath, dpi });
    const content = await readFile(pdfPath, "latin1");
    if (!content.startsWith("%PDF-")) {
      throw new MalformedDocumentError("PDF 解析失败: Invalid PDF structure.");
    }
    return this.pages;
  }
}

export async function createTestContext(
  rasterizer: Rasterizer,
): Promise<ConversionContext> {
  return {
    config: await loadDefaultConfig(),
    logger: new Logger("silent"),
    rasterizer,
    writer: sharpWriter,
  };
}
