/**
 * transcript-tail - Incremental Claude transcript parsing
 *
 * Turn append-only JSONL transcripts into ordered, preview-bounded events,
 * resuming from a byte offset on each call.
 *
 * @example
 * ```typescript
 * import { parseTranscript, tailTranscripts, parseTailState } from "transcript-tail";
 *
 * // Parse one transcript, then resume later from the returned offset
 * const { events, offset } = await parseTranscript("/path/to/session.jsonl");
 * const next = await parseTranscript("/path/to/session.jsonl", { sinceOffset: offset });
 *
 * // Tail every transcript under a projects directory
 * const { events: fresh, state } = await tailTranscripts(
 *   "~/.claude/projects",
 *   parseTailState(savedJson)
 * );
 * ```
 */

// Types
export * from "./types.js";

// Errors
export { TranscriptReadError } from "./errors.js";
export type { TranscriptErrorCode } from "./errors.js";

// Schema logger
export { createSchemaLogger } from "./schema-logger.js";
export type {
  SchemaLoggerOptions,
  IssueFilter,
  FilterableSchemaLogger
} from "./schema-logger.js";

// Parsing
export {
  parseTranscript,
  parseTranscriptLine,
  parseTranscriptRecord,
  transcriptIdentity,
  extractMessageText,
  buildToolPreview
} from "./adapters/claude.js";
export type { RecordContext } from "./adapters/claude.js";

export { parseIsoTimestamp, daysFromCivil } from "./adapters/timestamp.js";

// Tailing
export {
  tailTranscripts,
  scanTranscriptFiles,
  emptyTailState,
  parseTailState,
  serializeTailState
} from "./adapters/tail.js";

// Shared utilities
export {
  truncateBytes,
  extractTextContent,
  expandHome
} from "./adapters/shared.js";
