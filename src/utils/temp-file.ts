/**
 * Scoped temporary files
 */

import { rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { IdGenerator } from "./id-generator";

const ids = new IdGenerator();

/**
 * Unique path in the OS temp directory, e.g. /tmp/pdf-longshot-k3x9a0b2c7dd.pdf
 */
export function createTempPath(extension: string): string {
  return join(tmpdir(), `pdf-longshot-${ids.generate()}${extension}`);
}

/**
 * Run `fn` with a fresh temp path and remove the file afterwards,
 * whether `fn` resolves or throws. The file does not need to exist.
 */
export async function withTempFile<T>(
  extension: string,
  fn: (tempPath: string) => Promise<T>,
): Promise<T> {
  const tempPath = createTempPath(extension);
  try {
    return await fn(tempPath);
  } finally {
    await rm(tempPath, { force: true });
  }
}
