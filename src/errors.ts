/**
 * Error types for pdf-longshot.
 * Every failure a conversion can report maps to one code of a closed set, so
 * callers can branch on `reason` instead of matching message text.
 */

import type { ConversionFailure } from "./types/result";

export type ErrorCode =
  | "input-not-found"
  | "invalid-input"
  | "network"
  | "malformed-document"
  | "encoding"
  | "directory-not-found"
  | "no-pdf-files";

export type ErrorReason = ErrorCode | "io" | "unexpected";

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ConversionError";
  }
}

export class InputNotFoundError extends ConversionError {
  constructor(message: string) {
    super(message, "input-not-found");
    this.name = "InputNotFoundError";
  }
}

export class InvalidInputError extends ConversionError {
  constructor(message: string) {
    super(message, "invalid-input");
    this.name = "InvalidInputError";
  }
}

export class NetworkError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "network", options);
    this.name = "NetworkError";
  }
}

export class MalformedDocumentError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "malformed-document", options);
    this.name = "MalformedDocumentError";
  }
}

export class EncodingError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "encoding", options);
    this.name = "EncodingError";
  }
}

export class DirectoryNotFoundError extends ConversionError {
  constructor(message: string) {
    super(message, "directory-not-found");
    this.name = "DirectoryNotFoundError";
  }
}

export class NoPdfFilesError extends ConversionError {
  constructor(message: string) {
    super(message, "no-pdf-files");
    this.name = "NoPdfFilesError";
  }
}

function isSystemError(error: Error): error is NodeJS.ErrnoException {
  return "code" in error && typeof error.code === "string";
}

/**
 * Map any thrown value to a failure result
 */
export function toFailure(error: unknown): ConversionFailure {
  if (error instanceof ConversionError) {
    return { success: false, error: error.message, reason: error.code };
  }
  if (error instanceof Error) {
    return {
      success: false,
      error: error.message,
      reason: isSystemError(error) ? "io" : "unexpected",
    };
  }
  return { success: false, error: String(error), reason: "unexpected" };
}
