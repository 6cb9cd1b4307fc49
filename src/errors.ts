/**
 * Error thrown when required configuration is missing or invalid.
 * This is the only error that aborts a run.
 */
export class ConfigMissingError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join("; ")}`);
    this.name = "ConfigMissingError";
  }
}

/**
 * Error thrown when article content cannot be fetched.
 * `status` is set when the upstream service answered with a non-2xx code.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

export class SummarizeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SummarizeError";
  }
}

export class ClassifyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClassifyError";
  }
}

/**
 * Error thrown when the archive file cannot be read or replaced.
 * The archive on disk is left as it was.
 */
export class ArchiveIoError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ArchiveIoError";
  }
}

/**
 * Get a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
