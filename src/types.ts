/**
 * Type definitions for transcript events.
 *
 * A transcript line becomes zero or more TranscriptEvents. Cursors and tail
 * state are plain JSON so callers can persist them wherever they like.
 */

import { z } from "zod";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_PREVIEW_LEN = 500;
export const TOOL_INPUT_PREVIEW_LEN = 200;
export const DEFAULT_PROJECTS_DIR = "~/.claude/projects";

// ============================================================================
// Message Types
// ============================================================================

/**
 * `user`, `assistant_text`, `tool_use:<name>` or `tool_result:<name>`.
 */
export const MessageTypeSchema = z
  .string()
  .regex(/^(user|assistant_text|tool_use:.*|tool_result:.*)$/s);
export type MessageType = z.infer<typeof MessageTypeSchema>;

// ============================================================================
// Transcript Event
// ============================================================================

export const TranscriptEventSchema = z.object({
  /** Epoch seconds (UTC). 0 means the record had no usable timestamp. */
  timestamp: z.number(),
  sessionId: z.string(),
  messageType: MessageTypeSchema,
  contentPreview: z.string(),
  projectPath: z.string()
});
export type TranscriptEvent = z.infer<typeof TranscriptEventSchema>;

export const MISSING_TIMESTAMP = 0;

// ============================================================================
// Parse Options and Results
// ============================================================================

export interface ParseTranscriptOptions {
  sinceOffset?: number;
  previewLen?: number;
  schemaLogger?: SchemaLogger;
}

export interface ParseTranscriptResult {
  events: TranscriptEvent[];
  /** Byte offset to pass as `sinceOffset` on the next call. */
  offset: number;
}

// ============================================================================
// Tail State
// ============================================================================

export const FileCursorSchema = z.object({
  mtimeMs: z.number(),
  offset: z.number().int().nonnegative()
});
export type FileCursor = z.infer<typeof FileCursorSchema>;

export const TailStateSchema = z.object({
  /** False until the first tail call has recorded existing files. */
  initialized: z.boolean().default(false),
  files: z.record(FileCursorSchema)
});
export type TailState = z.infer<typeof TailStateSchema>;

export interface TailResult {
  events: TranscriptEvent[];
  state: TailState;
  /** True when this call only recorded file positions (first run). */
  indexed: boolean;
}

export const TailConfigSchema = z.object({
  previewLen: z.number().int().nonnegative().default(DEFAULT_PREVIEW_LEN),
  /** Parse existing files from the start instead of indexing them on first run. */
  importHistory: z.boolean().default(false)
});
export type TailConfig = z.infer<typeof TailConfigSchema>;

export interface TailOptions extends Partial<TailConfig> {
  schemaLogger?: SchemaLogger;
  /** Replaces the missing-timestamp sentinel in emitted events. */
  fallbackTimestamp?: () => number;
}

// ============================================================================
// Schema Issues
// ============================================================================

export const SchemaIssueTypeSchema = z.enum([
  "parse_error",
  "invalid_timestamp",
  "unexpected_structure",
  "unknown_entry_type",
  "read_error"
]);
export type SchemaIssueType = z.infer<typeof SchemaIssueTypeSchema>;

export const SchemaIssueSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  transcriptPath: z.string(),
  offset: z.number().optional(),
  issueType: SchemaIssueTypeSchema,
  description: z.string(),
  rawEntry: z.unknown().optional()
});
export type SchemaIssue = z.infer<typeof SchemaIssueSchema>;

// ============================================================================
// Schema Logger Interface
// ============================================================================

export interface SchemaLoggerInput {
  transcriptPath: string;
  offset?: number;
  issueType: SchemaIssueType;
  description: string;
  rawEntry?: unknown;
}

export interface SchemaLogger {
  log(issue: SchemaLoggerInput): void;
  getIssues(): SchemaIssue[];
  getStats(): { total: number; byType: Record<string, number> };
  clear(): void;
}
