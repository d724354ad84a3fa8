/**
 * Claude Code transcript parser adapter.
 *
 * Claude transcripts are JSONL files stored at ~/.claude/projects/{project-path}/
 * Each line is a JSON object. The types that produce events:
 * - user: User messages (string content or text blocks)
 * - assistant: Responses whose content is a list of text / tool_use / thinking blocks
 * - progress: Tool results (data.type = "tool_result"), agent and hook progress
 *
 * Everything else (summary, system, file-history-snapshot, queue-operation)
 * is skipped. Files are parsed from a byte offset so a growing transcript can
 * be tailed.
 */

import { parse } from "path";
import {
  DEFAULT_PREVIEW_LEN,
  MISSING_TIMESTAMP,
  TOOL_INPUT_PREVIEW_LEN
} from "../types.js";
import type {
  MessageType,
  ParseTranscriptOptions,
  ParseTranscriptResult,
  SchemaLogger,
  TranscriptEvent
} from "../types.js";
import { TranscriptReadError } from "../errors.js";
import { parseIsoTimestamp } from "./timestamp.js";
import {
  extractTextContent,
  isRecord,
  readJsonlLines,
  stringField,
  truncateBytes,
  type TextBlockRule
} from "./shared.js";

const TEXT_RULES: TextBlockRule[] = [{ type: "text", key: "text" }];

const IGNORED_RECORD_TYPES = new Set([
  "summary",
  "system",
  "file-history-snapshot",
  "queue-operation"
]);

// ============================================================================
// Content Extraction
// ============================================================================

/**
 * Flatten a message's content into plain text. Text blocks are joined with
 * a single space; other block types are dropped.
 */
export function extractMessageText(message: unknown): string {
  if (!isRecord(message)) return "";
  return extractTextContent(message.content, TEXT_RULES, " ");
}

// ============================================================================
// Tool Call Previews
// ============================================================================

/**
 * Short human-readable summary of a tool call's input.
 */
export function buildToolPreview(toolName: string, input: unknown): string {
  const fields = isRecord(input) ? input : {};

  switch (toolName) {
    case "Bash":
      return stringField(fields, "command") ?? "";
    case "Read":
    case "Glob":
      return (
        stringField(fields, "file_path") ?? stringField(fields, "pattern") ?? ""
      );
    case "Write": {
      const filePath = stringField(fields, "file_path") ?? "";
      const size = Buffer.byteLength(stringField(fields, "content") ?? "", "utf-8");
      return `${filePath} (${size} chars)`;
    }
    case "Edit":
      return stringField(fields, "file_path") ?? "";
    case "Grep": {
      const pattern = stringField(fields, "pattern") ?? "";
      const searchPath = stringField(fields, "path") ?? ".";
      return `/${pattern}/ in ${searchPath}`;
    }
    case "Task":
      return stringField(fields, "description") ?? "";
    default:
      return truncateBytes(JSON.stringify(input) ?? "", TOOL_INPUT_PREVIEW_LEN);
  }
}

// ============================================================================
// Record Parsing
// ============================================================================

type EventDraft = {
  messageType: MessageType;
  text: string;
};

export interface RecordContext {
  transcriptPath: string;
  sessionId: string;
  projectPath: string;
  previewLen: number;
  /** Byte offset of the line, for issue reports. */
  offset?: number;
  schemaLogger?: SchemaLogger;
}

function userDrafts(record: Record<string, unknown>): EventDraft[] {
  const text = extractMessageText(record.message);
  if (!text.trim()) return [];
  return [{ messageType: "user", text }];
}

function assistantDrafts(
  record: Record<string, unknown>,
  context: RecordContext
): EventDraft[] {
  const content = isRecord(record.message) ? record.message.content : undefined;
  if (!Array.isArray(content)) {
    context.schemaLogger?.log({
      transcriptPath: context.transcriptPath,
      offset: context.offset,
      issueType: "unexpected_structure",
      description: "Assistant message content is not a block array",
      rawEntry: record
    });
    return [];
  }

  const drafts: EventDraft[] = [];
  for (const block of content) {
    if (!isRecord(block)) continue;

    if (block.type === "text") {
      drafts.push({
        messageType: "assistant_text",
        text: stringField(block, "text") ?? ""
      });
    } else if (block.type === "tool_use") {
      const toolName = stringField(block, "name") ?? "";
      const input = block.input === undefined ? {} : block.input;
      drafts.push({
        messageType: `tool_use:${toolName}`,
        text: buildToolPreview(toolName, input)
      });
    }
  }
  return drafts;
}

function progressDrafts(record: Record<string, unknown>): EventDraft[] {
  const data = record.data;
  if (!isRecord(data) || data.type !== "tool_result") return [];

  const toolName = stringField(data, "tool_name") ?? "";
  const output = data.output;
  let text = "";
  if (typeof output === "string") {
    text = output;
  } else if (output !== undefined) {
    text = JSON.stringify(output);
  }
  return [{ messageType: `tool_result:${toolName}`, text }];
}

function recordTimestamp(
  record: Record<string, unknown>,
  context: RecordContext
): number {
  const value = record.timestamp;
  if (value === undefined || value === "") return MISSING_TIMESTAMP;

  const seconds = typeof value === "string" ? parseIsoTimestamp(value) : null;
  if (seconds === null) {
    context.schemaLogger?.log({
      transcriptPath: context.transcriptPath,
      offset: context.offset,
      issueType: "invalid_timestamp",
      description: `Unreadable timestamp: ${JSON.stringify(value)}`,
      rawEntry: record
    });
    return MISSING_TIMESTAMP;
  }
  return seconds;
}

/**
 * Turn one decoded transcript record into events. Unknown record types and
 * shapes yield no events.
 */
export function parseTranscriptRecord(
  record: unknown,
  context: RecordContext
): TranscriptEvent[] {
  if (!isRecord(record)) return [];

  const type = stringField(record, "type") ?? "";
  let drafts: EventDraft[];

  switch (type) {
    case "user":
      drafts = userDrafts(record);
      break;
    case "assistant":
      drafts = assistantDrafts(record, context);
      break;
    case "progress":
      drafts = progressDrafts(record);
      break;
    default:
      if (!IGNORED_RECORD_TYPES.has(type)) {
        context.schemaLogger?.log({
          transcriptPath: context.transcriptPath,
          offset: context.offset,
          issueType: "unknown_entry_type",
          description: `Unknown entry type: ${type || "(none)"}`,
          rawEntry: record
        });
      }
      return [];
  }

  if (drafts.length === 0) return [];

  const timestamp = recordTimestamp(record, context);
  return drafts.map((draft) => ({
    timestamp,
    sessionId: context.sessionId,
    messageType: draft.messageType,
    contentPreview: truncateBytes(draft.text, context.previewLen),
    projectPath: context.projectPath
  }));
}

/**
 * Parse a single JSONL line. Malformed JSON yields no events.
 */
export function parseTranscriptLine(
  line: string,
  context: RecordContext
): TranscriptEvent[] {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch (error) {
    context.schemaLogger?.log({
      transcriptPath: context.transcriptPath,
      offset: context.offset,
      issueType: "parse_error",
      description: `Failed to parse JSONL line: ${error instanceof Error ? error.message : String(error)}`,
      rawEntry: line
    });
    return [];
  }
  return parseTranscriptRecord(record, context);
}

// ============================================================================
// Transcript Parsing
// ============================================================================

/**
 * Session id and project path come from the file path alone: the file name
 * without extension, and its parent directory.
 */
export function transcriptIdentity(filePath: string): {
  sessionId: string;
  projectPath: string;
} {
  const { name, dir } = parse(filePath);
  return { sessionId: name, projectPath: dir };
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a Claude transcript from `sinceOffset` to end of file.
 *
 * Returns the events in file order and the offset to resume from. A final
 * line without a newline is only consumed when it is complete JSON, so a
 * line still being written is picked up by a later call.
 *
 * Rejects with TranscriptReadError when the file cannot be opened or read,
 * or the offset is unusable. No events are returned in that case.
 */
export async function parseTranscript(
  filePath: string,
  options: ParseTranscriptOptions = {}
): Promise<ParseTranscriptResult> {
  const {
    sinceOffset = 0,
    previewLen = DEFAULT_PREVIEW_LEN,
    schemaLogger
  } = options;

  if (!Number.isSafeInteger(sinceOffset) || sinceOffset < 0) {
    throw new TranscriptReadError(
      `Cannot seek to offset ${sinceOffset} in ${filePath}`,
      "TRANSCRIPT_SEEK",
      { path: filePath, offset: sinceOffset }
    );
  }

  const { sessionId, projectPath } = transcriptIdentity(filePath);
  const events: TranscriptEvent[] = [];

  const { offset } = await readJsonlLines(
    filePath,
    (line) => {
      if (!line.terminated && !isJson(line.text)) {
        return false;
      }
      events.push(
        ...parseTranscriptLine(line.text, {
          transcriptPath: filePath,
          sessionId,
          projectPath,
          previewLen,
          offset: line.start,
          schemaLogger
        })
      );
      return true;
    },
    { start: sinceOffset }
  );

  return { events, offset };
}
