const BYTES_PER_MB = 1024 * 1024;

export interface FileSize {
  file_size_mb: number;
  file_size_str: string;
}

/**
 * Describe a byte count the way the result document reports it:
 * megabytes with two decimals from 1 MB up, whole kilobytes below
 *
 * @example
 * formatFileSize(3 * 1024 * 1024) // { file_size_mb: 3, file_size_str: "3.00 MB" }
 * formatFileSize(2048)            // { file_size_mb: 0.001953125, file_size_str: "2 KB" }
 */
export function formatFileSize(bytes: number): FileSize {
  const megabytes = bytes / BYTES_PER_MB;
  const text =
    megabytes >= 1
      ? `${megabytes.toFixed(2)} MB`
      : `${(megabytes * 1024).toFixed(0)} KB`;

  return { file_size_mb: megabytes, file_size_str: text };
}
