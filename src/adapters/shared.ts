/**
 * Shared utilities for transcript parsing adapters
 */

import { open } from "fs/promises";
import { toTranscriptReadError } from "../errors.js";

export const JSONL_STREAM_CHUNK_SIZE = 64 * 1024; // 64KB

const NEWLINE = 0x0a;

export type TextBlockRule = {
  type: string;
  key: string;
};

export type JsonlLine = {
  /** Line text without its newline, trimmed. */
  text: string;
  /** Byte offset of the first byte of the line. */
  start: number;
  /** Byte offset just past the line (and its newline, when it has one). */
  end: number;
  /** False for a final fragment with no newline yet. */
  terminated: boolean;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringField(
  obj: Record<string, unknown>,
  key: string
): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Cut text to at most `maxBytes` UTF-8 bytes without splitting a character.
 * Lone surrogates come back as U+FFFD, so the result is always well-formed.
 */
export function truncateBytes(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, "utf-8");
  if (bytes.length <= maxBytes) {
    return bytes.toString("utf-8");
  }

  let end = Math.max(0, Math.floor(maxBytes) || 0);
  // Continuation bytes look like 10xxxxxx
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return bytes.toString("utf-8", 0, end);
}

export function extractTextContent(
  content: unknown,
  rules: TextBlockRule[],
  separator = " "
): string {
  if (typeof content === "string") {
    return content;
  }
  if (!Array.isArray(content)) {
    return "";
  }

  const texts: string[] = [];
  for (const block of content) {
    if (!isRecord(block) || typeof block.type !== "string") continue;
    const rule = rules.find((item) => item.type === block.type);
    if (!rule) continue;
    const value = block[rule.key];
    if (typeof value === "string") texts.push(value);
  }
  return texts.join(separator);
}

/**
 * Expand ~ to home directory
 */
export function expandHome(path: string): string {
  if (path === "~" || path.startsWith("~/") || path.startsWith("~\\")) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? "";
    return `${home}${path.slice(1)}`;
  }
  return path;
}

/**
 * Stream JSONL lines from a byte offset without loading the file into memory.
 *
 * Blank lines are skipped. `onLine` returns whether it consumed the line;
 * that only matters for an unterminated final fragment, which is left
 * unconsumed when rejected. The returned offset is just past the last
 * consumed line.
 *
 * Filesystem failures reject with TranscriptReadError; anything thrown by
 * `onLine` propagates as-is.
 */
export async function readJsonlLines(
  filePath: string,
  onLine: (line: JsonlLine) => boolean,
  options: { start?: number; chunkSize?: number } = {}
): Promise<{ offset: number; total: number }> {
  const start = options.start ?? 0;
  const chunkSize = options.chunkSize ?? JSONL_STREAM_CHUNK_SIZE;
  const handle = await open(filePath, "r").catch((error: unknown) => {
    throw toTranscriptReadError(error, filePath, start);
  });
  // Chunks of the current unterminated line, joined once its newline arrives
  const parts: Buffer[] = [];
  let position = start;
  let lineStart = start;
  let offset = start;
  let total = 0;

  try {
    while (true) {
      const chunk = Buffer.allocUnsafe(chunkSize);
      const { bytesRead } = await handle
        .read(chunk, 0, chunk.length, position)
        .catch((error: unknown) => {
          throw toTranscriptReadError(error, filePath, position);
        });
      if (!bytesRead) break;

      position += bytesRead;
      const received = chunk.subarray(0, bytesRead);
      parts.push(received);
      if (received.indexOf(NEWLINE) === -1) continue;

      const data = parts.length === 1 ? received : Buffer.concat(parts);
      parts.length = 0;

      let cursor = 0;
      let newline = data.indexOf(NEWLINE, cursor);
      while (newline !== -1) {
        const end = lineStart + (newline - cursor) + 1;
        const text = data.toString("utf-8", cursor, newline).trim();
        if (text) {
          onLine({ text, start: lineStart, end, terminated: true });
          total++;
        }
        lineStart = end;
        offset = end;
        cursor = newline + 1;
        newline = data.indexOf(NEWLINE, cursor);
      }
      if (cursor < data.length) parts.push(data.subarray(cursor));
    }

    const pending = Buffer.concat(parts);
    const fragment = pending.toString("utf-8").trim();
    if (fragment) {
      const end = lineStart + pending.length;
      if (onLine({ text: fragment, start: lineStart, end, terminated: false })) {
        offset = end;
        total++;
      }
    }
  } finally {
    await handle.close();
  }

  return { offset, total };
}
