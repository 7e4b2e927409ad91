/**
 * Output path helpers
 */

import path from "node:path";
import type { OutputConfig } from "../types";

/**
 * Output filename for a source stem, e.g. "report" -> "report_stitched.png"
 */
export function outputFilename(stem: string, output: OutputConfig): string {
  return `${stem}${output.suffix}${output.extension}`;
}

/**
 * Default output path for a local PDF: beside the input, same stem
 *
 * @example
 * defaultOutputPath("/docs/report.pdf", output) // "/docs/report_stitched.png"
 */
export function defaultOutputPath(pdfPath: string, output: OutputConfig): string {
  const { dir, name } = path.parse(pdfPath);
  return path.join(dir, outputFilename(name, output));
}

/**
 * File stem taken from the last path segment of a URL
 * Falls back to "download" when the URL has no usable filename
 *
 * @example
 * stemFromUrl("https://example.com/files/Annual%20Report.pdf?v=2") // "Annual Report"
 * stemFromUrl("https://example.com/") // "download"
 */
export function stemFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "download";
  }

  const segment = pathname.split("/").filter((s) => s.length > 0).pop();
  if (!segment) return "download";

  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    decoded = segment;
  }

  const stem = path.parse(decoded).name;
  return stem.length > 0 ? stem : "download";
}
