/**
 * Incremental collection across a directory of transcripts.
 *
 * The caller owns the TailState and persists it between calls (it is plain
 * JSON). Each call only reads files modified since their recorded cursor.
 */

import { readdir, stat } from "fs/promises";
import { join } from "path";
import {
  MISSING_TIMESTAMP,
  TailConfigSchema,
  TailStateSchema
} from "../types.js";
import type {
  FileCursor,
  TailOptions,
  TailResult,
  TailState,
  TranscriptEvent
} from "../types.js";
import { TranscriptReadError } from "../errors.js";
import { parseTranscript } from "./claude.js";
import { expandHome } from "./shared.js";

export function emptyTailState(): TailState {
  return { initialized: false, files: {} };
}

/**
 * Read persisted tail state. Anything unreadable starts over from empty.
 */
export function parseTailState(json: string | null | undefined): TailState {
  if (!json) return emptyTailState();

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return emptyTailState();
  }

  const result = TailStateSchema.safeParse(raw);
  return result.success ? result.data : emptyTailState();
}

export function serializeTailState(state: TailState): string {
  return JSON.stringify(state);
}

/**
 * All .jsonl files under `basePath`, recursively, sorted by path.
 * A missing or unreadable directory contributes nothing.
 */
export async function scanTranscriptFiles(basePath: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true }).catch(() => []);
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(".jsonl")) {
        files.push(fullPath);
      }
    }
  }

  await walk(expandHome(basePath));
  return files.sort();
}

/**
 * Collect events appended to transcripts under `basePath` since `state`.
 *
 * On the first call (uninitialized state) existing files are only indexed
 * at their current size, unless `importHistory` is set. Files that shrank
 * below their cursor are read again from the start. A file that fails to
 * read keeps its old cursor and is reported to the schema logger.
 */
export async function tailTranscripts(
  basePath: string,
  state: TailState = emptyTailState(),
  options: TailOptions = {}
): Promise<TailResult> {
  const { previewLen, importHistory } = TailConfigSchema.parse({
    previewLen: options.previewLen,
    importHistory: options.importHistory
  });
  const { schemaLogger, fallbackTimestamp } = options;

  const files = await scanTranscriptFiles(basePath);
  const cursors: Record<string, FileCursor> = {};

  if (!state.initialized && !importHistory) {
    for (const file of files) {
      const info = await stat(file).catch(() => null);
      if (info) {
        cursors[file] = { mtimeMs: info.mtimeMs, offset: info.size };
      }
    }
    return {
      events: [],
      state: { initialized: true, files: cursors },
      indexed: true
    };
  }

  const events: TranscriptEvent[] = [];

  for (const file of files) {
    const previous = state.files[file];
    if (previous) cursors[file] = previous;

    const info = await stat(file).catch(() => null);
    if (!info) continue;
    if (previous && info.mtimeMs <= previous.mtimeMs) continue;

    const sinceOffset =
      previous && info.size >= previous.offset ? previous.offset : 0;

    try {
      const result = await parseTranscript(file, {
        sinceOffset,
        previewLen,
        schemaLogger
      });
      events.push(...result.events);
      cursors[file] = { mtimeMs: info.mtimeMs, offset: result.offset };
    } catch (error) {
      if (!(error instanceof TranscriptReadError)) throw error;
      schemaLogger?.log({
        transcriptPath: file,
        offset: sinceOffset,
        issueType: "read_error",
        description: error.message
      });
    }
  }

  return {
    events: fallbackTimestamp
      ? events.map((event) =>
          event.timestamp === MISSING_TIMESTAMP
            ? { ...event, timestamp: fallbackTimestamp() }
            : event
        )
      : events,
    state: { initialized: true, files: cursors },
    indexed: false
  };
}
