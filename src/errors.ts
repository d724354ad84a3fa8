/**
 * Errors raised by transcript reading.
 *
 * Malformed lines, timestamps and record shapes are recovered inside the
 * parser and never surface here. Only I/O problems do:
 *   - TRANSCRIPT_SEEK: the start offset is not a usable byte position
 *   - TRANSCRIPT_IO:   the file could not be opened or read
 */

export type TranscriptErrorCode = "TRANSCRIPT_SEEK" | "TRANSCRIPT_IO";

export class TranscriptReadError extends Error {
  readonly code: TranscriptErrorCode;
  readonly path: string;
  readonly offset: number;
  /** Structured debugging context, e.g. the underlying errno code. */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: TranscriptErrorCode,
    details: {
      path: string;
      offset: number;
      cause?: unknown;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = "TranscriptReadError";
    this.code = code;
    this.path = details.path;
    this.offset = details.offset;
    this.context = details.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      path: this.path,
      offset: this.offset,
      context: this.context
    };
  }
}

/**
 * Wrap a filesystem failure, keeping its errno code when it has one.
 */
export function toTranscriptReadError(
  error: unknown,
  path: string,
  offset: number
): TranscriptReadError {
  const reason = error instanceof Error ? error.message : String(error);
  const errno =
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
      ? error.code
      : undefined;

  return new TranscriptReadError(
    `Failed to read transcript ${path}: ${reason}`,
    "TRANSCRIPT_IO",
    {
      path,
      offset,
      cause: error,
      context: errno ? { errno } : {}
    }
  );
}
