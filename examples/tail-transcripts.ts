/**
 * Tail Claude transcripts and print new events.
 *
 * Usage:
 *   npx tsx examples/tail-transcripts.ts [projects-dir] [--state file] [--watch seconds]
 *
 * The first run only records where each transcript currently ends; later
 * runs print whatever was appended since. Pass --state to keep cursors
 * between runs.
 */

import { readFile, writeFile } from "fs/promises";
import {
  DEFAULT_PROJECTS_DIR,
  createSchemaLogger,
  parseTailState,
  serializeTailState,
  tailTranscripts
} from "../src/index.js";
import type { TailState, TranscriptEvent } from "../src/index.js";

function argValue(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  return index === -1 ? undefined : process.argv[index + 1];
}

function formatEvent(event: TranscriptEvent): string {
  const time =
    event.timestamp > 0
      ? new Date(event.timestamp * 1000).toISOString().slice(11, 19)
      : "--:--:--";
  const preview = event.contentPreview.replace(/\s+/g, " ").slice(0, 80);
  return `[${time}] ${event.sessionId.slice(0, 8)} ${event.messageType.padEnd(22)} ${preview}`;
}

async function loadState(path: string | undefined): Promise<TailState> {
  if (!path) return parseTailState(null);
  const json = await readFile(path, "utf-8").catch(() => null);
  return parseTailState(json);
}

async function main() {
  const positional = process.argv.slice(2).filter((arg, i, all) => {
    return !arg.startsWith("--") && !all[i - 1]?.startsWith("--");
  });
  const projectsDir = positional[0] ?? DEFAULT_PROJECTS_DIR;
  const statePath = argValue("--state");
  const watchSeconds = Number(argValue("--watch") ?? 0);

  const schemaLogger = createSchemaLogger();
  let state = await loadState(statePath);

  while (true) {
    const result = await tailTranscripts(projectsDir, state, {
      schemaLogger,
      fallbackTimestamp: () => Date.now() / 1000
    });
    state = result.state;

    if (result.indexed) {
      console.log(`Indexed ${Object.keys(state.files).length} transcripts under ${projectsDir}`);
    }
    for (const event of result.events) {
      console.log(formatEvent(event));
    }

    if (statePath) {
      await writeFile(statePath, serializeTailState(state));
    }

    if (!(watchSeconds > 0)) break;
    await new Promise((resolve) => setTimeout(resolve, watchSeconds * 1000));
  }

  const { total, byType } = schemaLogger.getStats();
  if (total > 0) {
    console.log(`Recovered from ${total} schema issues:`, byType);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
