/**
 * Download a file over HTTP with a hard timeout
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "node:path";
import { NetworkError } from "../errors";

export interface DownloadOptions {
  timeout: number; // In milliseconds
}

/**
 * Fetch `url` and write the body to `destination`
 * A single attempt: non-2xx statuses, network failures and the timeout all
 * reject with NetworkError
 */
export async function downloadFile(
  url: string,
  destination: string,
  options: DownloadOptions,
): Promise<number> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeout);

  try {
    const response = await fetch(url, { signal: controller.signal });

    if (!response.ok) {
      throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`);
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, buffer);
    return buffer.length;
  } catch (error) {
    if (error instanceof NetworkError) throw error;
    if (error instanceof Error && error.name === "AbortError") {
      throw new NetworkError(
        `下载超时 (${options.timeout / 1000}s): ${url}`,
        { cause: error },
      );
    }
    if (error instanceof TypeError) {
      throw new NetworkError(`下载失败: ${error.message}`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
