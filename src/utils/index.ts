/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists, isDirectory } from "./fs";
export { withTempFile } from "./temp-file";

// Path utilities
export { outputFilename, defaultOutputPath, stemFromUrl } from "./output-path";

// Formatting utilities
export { formatFileSize } from "./format-file-size";
export { parseHexColor } from "./color";

// Network utilities
export { downloadFile } from "./download";

// Config utilities
export { loadConfig, getUserConfigPath } from "./load-config";
