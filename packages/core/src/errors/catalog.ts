/**
 * Typed error catalog for the sync / export / archive pipeline.
 *
 * None of these are fatal to the process: each one is caught at the
 * narrowest scope (per cycle, per entity, per format, per file) and
 * reduced to a log line.
 */

export class TrackerError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Network / HTTP failures

export class TransportError extends TrackerError {
  constructor(
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown; errorCode?: string; statusText?: string },
  ) {
    super(
      options?.errorCode ?? "TRANSPORT_ERROR",
      `Request to ${url} failed: ${describeFailure(status, options)}`,
      { url, ...(status !== undefined && { status }) },
      { cause: options?.cause },
    );
  }
}

export class AuthorizationError extends TransportError {
  constructor(url: string) {
    super(url, 401, { errorCode: "UNAUTHORIZED", statusText: "Unauthorized" });
  }
}

// Content failures

export class ParseError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("PARSE_ERROR", message, details, { cause });
  }
}

export class ExtractionError extends TrackerError {
  constructor(
    public readonly member: string,
    cause?: unknown,
  ) {
    super(
      "EXTRACTION_ERROR",
      `Failed to extract ${member}: ${errorMessage(cause)}`,
      { member },
      { cause },
    );
  }
}

// Archive service failures

export class ArchiveSubmissionError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ARCHIVE_SUBMISSION_ERROR", message, details);
  }
}

/** Builds the matching TransportError for a non-2xx response. */
export function httpError(url: string, res: Response): TransportError {
  if (res.status === 401) {
    return new AuthorizationError(url);
  }
  return new TransportError(url, res.status, {
    statusText: res.statusText,
    errorCode: res.status === 429 ? "RATE_LIMITED" : undefined,
  });
}

function describeFailure(
  status: number | undefined,
  options?: { cause?: unknown; statusText?: string },
): string {
  if (status === undefined) return errorMessage(options?.cause);
  return options?.statusText ? `HTTP ${status} ${options.statusText}` : `HTTP ${status}`;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
