export const MIB = 1024 * 1024;

/**
 * Format a byte count as mebibytes with one decimal, e.g. "11.0MB"
 */
export function formatMegabytes(sizeBytes: number): string {
  return `${(sizeBytes / MIB).toFixed(1)}MB`;
}

/**
 * Base class for every error the narrator raises on purpose
 */
export class NarratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UploadTooLargeError extends NarratorError {
  constructor(
    readonly sizeBytes: number,
    readonly limitBytes: number
  ) {
    super(
      `File too large! Maximum size allowed is ${Number(
        (limitBytes / MIB).toFixed(1)
      )}MB. Your file is ${formatMegabytes(sizeBytes)}.`
    );
  }
}

export class UnsupportedFormatError extends NarratorError {
  constructor(readonly format: string) {
    super(
      `Unsupported image format: ${format}. Use PNG, JPG, JPEG, BMP or WEBP.`
    );
  }
}

/**
 * The image could not be decoded or re-encoded
 */
export class EncodingError extends NarratorError {}

export class ConfigError extends NarratorError {}

export class TimeoutError extends NarratorError {
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

export interface ProviderFailure {
  provider: string;
  error: unknown;
}

/**
 * Every description model in the fallback list failed
 */
export class AllServicesUnavailableError extends NarratorError {
  constructor(readonly failures: ProviderFailure[]) {
    super("All models failed. Please try again later.");
  }
}

/**
 * Render an unknown thrown value for logs and user messages
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
