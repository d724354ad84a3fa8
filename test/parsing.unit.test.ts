import { describe, expect, test } from "vitest";
import {
  buildToolPreview,
  createSchemaLogger,
  daysFromCivil,
  extractMessageText,
  parseIsoTimestamp,
  parseTranscriptLine,
  transcriptIdentity,
  truncateBytes,
  TranscriptEventSchema
} from "../src/index.js";
import type { RecordContext } from "../src/index.js";

function context(overrides: Partial<RecordContext> = {}): RecordContext {
  return {
    transcriptPath: "/projects/-home-dev-app/session-1.jsonl",
    sessionId: "session-1",
    projectPath: "/projects/-home-dev-app",
    previewLen: 500,
    ...overrides
  };
}

// ============================================================================
// Truncation
// ============================================================================

describe("truncateBytes", () => {
  test("returns text unchanged when it fits", () => {
    expect(truncateBytes("hello", 10)).toBe("hello");
    expect(truncateBytes("hello", 5)).toBe("hello");
    expect(truncateBytes("", 0)).toBe("");
  });

  test("cuts ASCII at the byte limit", () => {
    expect(truncateBytes("hello", 3)).toBe("hel");
    expect(truncateBytes("hello", 0)).toBe("");
  });

  test("backs off to a character boundary", () => {
    expect(truncateBytes("日本語", 4)).toBe("日");
    expect(truncateBytes("日本語", 6)).toBe("日本");
    expect(truncateBytes("日本語", 2)).toBe("");
    expect(truncateBytes("héllo", 2)).toBe("h");
    expect(truncateBytes("a😀b", 4)).toBe("a");
    expect(truncateBytes("a😀b", 5)).toBe("a😀");
  });

  test("lone surrogates come back as replacement characters", () => {
    expect(truncateBytes("a\ud83d", 10)).toBe("a\ufffd");
    expect(truncateBytes("a\ud83db", 4)).toBe("a\ufffd");
    expect(truncateBytes("a\ud83db", 3)).toBe("a");
  });

  test("never exceeds the limit or splits a character", () => {
    const text = "aé日😀z";
    for (let limit = 0; limit <= 12; limit++) {
      const result = truncateBytes(text, limit);
      expect(Buffer.byteLength(result, "utf-8")).toBeLessThanOrEqual(limit);
      expect(text.startsWith(result)).toBe(true);
      expect(result).not.toContain("�");
    }
  });
});

// ============================================================================
// Timestamps
// ============================================================================

describe("daysFromCivil", () => {
  function referenceDays(year: number, month: number, day: number): number {
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    return date.getTime() / 86_400_000;
  }

  test("epoch and nearby days", () => {
    expect(daysFromCivil(1970, 1, 1)).toBe(0);
    expect(daysFromCivil(1970, 1, 2)).toBe(1);
    expect(daysFromCivil(1969, 12, 31)).toBe(-1);
    expect(daysFromCivil(2024, 1, 1)).toBe(19723);
  });

  test("leap days around era boundaries", () => {
    expect(daysFromCivil(2000, 2, 29)).toBe(11016);
    expect(daysFromCivil(2000, 3, 1)).toBe(11017);
    expect(daysFromCivil(1900, 3, 1) - daysFromCivil(1900, 2, 28)).toBe(1);
    expect(daysFromCivil(2400, 3, 1) - daysFromCivil(2400, 2, 28)).toBe(2);
  });

  test("year zero and negative years", () => {
    expect(daysFromCivil(0, 3, 1)).toBe(-719468);
    expect(daysFromCivil(-1, 1, 1)).toBe(-719893);
  });

  test("agrees with the platform calendar across eras", () => {
    const dates: Array<[number, number, number]> = [
      [-400, 1, 1],
      [-401, 12, 31],
      [-1, 12, 31],
      [0, 2, 29],
      [1, 1, 1],
      [399, 12, 31],
      [400, 1, 1],
      [1600, 2, 29],
      [1900, 2, 28],
      [1969, 12, 31],
      [2100, 3, 1],
      [2400, 2, 29],
      [9999, 12, 31]
    ];
    for (const [year, month, day] of dates) {
      expect(daysFromCivil(year, month, day)).toBe(
        referenceDays(year, month, day)
      );
    }
  });
});

describe("parseIsoTimestamp", () => {
  test("UTC designator", () => {
    expect(parseIsoTimestamp("2024-01-01T00:00:00Z")).toBe(1704067200);
    expect(parseIsoTimestamp("1969-12-31T23:59:59Z")).toBe(-1);
  });

  test("fractional seconds", () => {
    expect(parseIsoTimestamp("2026-02-25T08:16:18.720Z")).toBeCloseTo(
      1772007378.72,
      6
    );
    expect(parseIsoTimestamp("2024-01-01T00:00:00.5Z")).toBe(1704067200.5);
  });

  test("very long fractions stay finite", () => {
    const value = parseIsoTimestamp(
      `2024-01-01T00:00:00.${"1".repeat(320)}Z`
    );
    expect(value).toBeCloseTo(1704067200.1111, 3);
  });

  test("explicit offsets", () => {
    expect(parseIsoTimestamp("2024-01-01T00:00:00+00:00")).toBe(1704067200);
    expect(parseIsoTimestamp("2024-01-01T05:30:00+05:30")).toBe(1704067200);
    expect(parseIsoTimestamp("2023-12-31T19:00:00-05:00")).toBe(1704067200);
    expect(parseIsoTimestamp("2024-01-01T00:00:00+05")).toBe(1704049200);
  });

  test("missing seconds default to zero", () => {
    expect(parseIsoTimestamp("2024-01-01T00:00Z")).toBe(1704067200);
  });

  test("returns null for unreadable values", () => {
    expect(parseIsoTimestamp("not-a-timestamp")).toBeNull();
    expect(parseIsoTimestamp("")).toBeNull();
    expect(parseIsoTimestamp("2024-01-01 00:00:00Z")).toBeNull();
    expect(parseIsoTimestamp("2024-01T00:00:00Z")).toBeNull();
    expect(parseIsoTimestamp("2024-01-01T12")).toBeNull();
    expect(parseIsoTimestamp("2024-01-01Txx:00:00Z")).toBeNull();
    expect(parseIsoTimestamp("2024-01-01T00:00:00.5xZ")).toBeNull();
    expect(parseIsoTimestamp("2024-Jan-01T00:00:00Z")).toBeNull();
  });
});

// ============================================================================
// Content and Tool Previews
// ============================================================================

describe("extractMessageText", () => {
  test("string content is returned as-is", () => {
    expect(extractMessageText({ content: "  hello\n" })).toBe("  hello\n");
  });

  test("text blocks are joined with a space", () => {
    expect(
      extractMessageText({
        content: [
          { type: "text", text: "one" },
          { type: "tool_result", content: "skipped" },
          { type: "text", text: 7 },
          { type: "text", text: "two" }
        ]
      })
    ).toBe("one two");
  });

  test("other shapes yield empty text", () => {
    expect(extractMessageText({})).toBe("");
    expect(extractMessageText({ content: 42 })).toBe("");
    expect(extractMessageText({ content: { type: "text" } })).toBe("");
    expect(extractMessageText("content")).toBe("");
    expect(extractMessageText(null)).toBe("");
  });
});

describe("buildToolPreview", () => {
  test("Bash shows the command", () => {
    expect(buildToolPreview("Bash", { command: "pwd" })).toBe("pwd");
    expect(buildToolPreview("Bash", {})).toBe("");
  });

  test("Read and Glob fall back from file_path to pattern", () => {
    expect(buildToolPreview("Read", { file_path: "/src/a.ts" })).toBe(
      "/src/a.ts"
    );
    expect(buildToolPreview("Glob", { pattern: "**/*.ts" })).toBe("**/*.ts");
    expect(buildToolPreview("Read", {})).toBe("");
  });

  test("Write shows path and content byte length", () => {
    expect(
      buildToolPreview("Write", { file_path: "/tmp/x", content: "abcde" })
    ).toBe("/tmp/x (5 chars)");
    expect(
      buildToolPreview("Write", { file_path: "/tmp/x", content: "héllo" })
    ).toBe("/tmp/x (6 chars)");
    expect(buildToolPreview("Write", { file_path: "/tmp/x" })).toBe(
      "/tmp/x (0 chars)"
    );
  });

  test("Edit, Grep and Task", () => {
    expect(buildToolPreview("Edit", { file_path: "/src/b.ts" })).toBe(
      "/src/b.ts"
    );
    expect(buildToolPreview("Grep", { pattern: "TODO", path: "src" })).toBe(
      "/TODO/ in src"
    );
    expect(buildToolPreview("Grep", { pattern: "TODO" })).toBe("/TODO/ in .");
    expect(buildToolPreview("Task", { description: "Explore repo" })).toBe(
      "Explore repo"
    );
  });

  test("non-string fields degrade to defaults", () => {
    expect(buildToolPreview("Bash", { command: ["ls"] })).toBe("");
    expect(buildToolPreview("Bash", "ls")).toBe("");
    expect(buildToolPreview("Grep", { path: 3 })).toBe("// in .");
  });

  test("other tools serialize their input to at most 200 characters", () => {
    expect(buildToolPreview("WebFetch", { url: "https://example.test" })).toBe(
      '{"url":"https://example.test"}'
    );

    const input = { data: "x".repeat(500) };
    const preview = buildToolPreview("mcp__notes__save", input);
    expect(preview).toHaveLength(200);
    expect(preview).toBe(JSON.stringify(input).slice(0, 200));
  });

  test("other tools with null input", () => {
    expect(buildToolPreview("Custom", null)).toBe("null");
  });
});

// ============================================================================
// Line Parsing
// ============================================================================

describe("parseTranscriptLine", () => {
  test("user message without timestamp", () => {
    const events = parseTranscriptLine(
      '{"type":"user","message":{"content":"hello"}}',
      context()
    );
    expect(events).toEqual([
      {
        timestamp: 0,
        sessionId: "session-1",
        messageType: "user",
        contentPreview: "hello",
        projectPath: "/projects/-home-dev-app"
      }
    ]);
    expect(TranscriptEventSchema.safeParse(events[0]).success).toBe(true);
  });

  test("a lone surrogate in content becomes a replacement character", () => {
    const [event] = parseTranscriptLine(
      '{"type":"user","message":{"content":"a\\ud83d"}}',
      context()
    );
    expect(event.contentPreview).toBe("a\ufffd");
  });

  test("blank user messages are dropped", () => {
    expect(
      parseTranscriptLine(
        '{"type":"user","message":{"content":"  \\n "}}',
        context()
      )
    ).toEqual([]);
    expect(parseTranscriptLine('{"type":"user"}', context())).toEqual([]);
  });

  test("assistant blocks become events in order", () => {
    const events = parseTranscriptLine(
      JSON.stringify({
        type: "assistant",
        timestamp: "2024-01-01T00:00:00Z",
        message: {
          content: [
            { type: "text", text: "hi" },
            { type: "thinking", thinking: "hmm" },
            { type: "tool_use", name: "Bash", input: { command: "pwd" } }
          ]
        }
      }),
      context()
    );

    expect(events.map((e) => [e.messageType, e.contentPreview])).toEqual([
      ["assistant_text", "hi"],
      ["tool_use:Bash", "pwd"]
    ]);
    expect(events.every((e) => e.timestamp === 1704067200)).toBe(true);
  });

  test("tool_use without name or input", () => {
    const events = parseTranscriptLine(
      '{"type":"assistant","message":{"content":[{"type":"tool_use"}]}}',
      context()
    );
    expect(events.map((e) => [e.messageType, e.contentPreview])).toEqual([
      ["tool_use:", "{}"]
    ]);
  });

  test("assistant content that is not an array is skipped and reported", () => {
    const schemaLogger = createSchemaLogger();
    const events = parseTranscriptLine(
      '{"type":"assistant","message":{"content":"plain"}}',
      context({ schemaLogger, offset: 120 })
    );

    expect(events).toEqual([]);
    const issues = schemaLogger.getIssues();
    expect(issues).toHaveLength(1);
    expect(issues[0].issueType).toBe("unexpected_structure");
    expect(issues[0].offset).toBe(120);
  });

  test("progress tool results", () => {
    const stringOutput = parseTranscriptLine(
      '{"type":"progress","data":{"type":"tool_result","tool_name":"Bash","output":"done"}}',
      context()
    );
    expect(stringOutput.map((e) => [e.messageType, e.contentPreview])).toEqual([
      ["tool_result:Bash", "done"]
    ]);

    const objectOutput = parseTranscriptLine(
      '{"type":"progress","data":{"type":"tool_result","tool_name":"Read","output":{"lines":3,"ok":true}}}',
      context()
    );
    expect(objectOutput[0].contentPreview).toBe('{"lines":3,"ok":true}');

    const noOutput = parseTranscriptLine(
      '{"type":"progress","data":{"type":"tool_result"}}',
      context()
    );
    expect(noOutput.map((e) => [e.messageType, e.contentPreview])).toEqual([
      ["tool_result:", ""]
    ]);
  });

  test("other progress records are ignored", () => {
    expect(
      parseTranscriptLine(
        '{"type":"progress","data":{"type":"hook_progress"}}',
        context()
      )
    ).toEqual([]);
    expect(parseTranscriptLine('{"type":"progress"}', context())).toEqual([]);
  });

  test("previews respect previewLen", () => {
    const events = parseTranscriptLine(
      '{"type":"user","message":{"content":"héllo wörld"}}',
      context({ previewLen: 2 })
    );
    expect(events[0].contentPreview).toBe("h");
  });

  test("malformed JSON yields no events and is reported", () => {
    const schemaLogger = createSchemaLogger();
    expect(parseTranscriptLine("{oops", context({ schemaLogger }))).toEqual([]);
    expect(schemaLogger.getIssues()[0].issueType).toBe("parse_error");
    expect(schemaLogger.getIssues()[0].rawEntry).toBe("{oops");
  });

  test("non-object JSON yields no events", () => {
    expect(parseTranscriptLine("42", context())).toEqual([]);
    expect(parseTranscriptLine("null", context())).toEqual([]);
    expect(parseTranscriptLine('["user"]', context())).toEqual([]);
  });

  test("unknown record types are reported, known metadata types are not", () => {
    const schemaLogger = createSchemaLogger();
    parseTranscriptLine('{"type":"summary","summary":"x"}', context({ schemaLogger }));
    parseTranscriptLine('{"type":"file-history-snapshot"}', context({ schemaLogger }));
    parseTranscriptLine('{"type":"mystery"}', context({ schemaLogger }));

    const issues = schemaLogger.getIssues();
    expect(issues).toHaveLength(1);
    expect(issues[0].issueType).toBe("unknown_entry_type");
    expect(issues[0].description).toBe("Unknown entry type: mystery");
  });

  test("unreadable timestamps fall back to zero and are reported", () => {
    const schemaLogger = createSchemaLogger();
    const events = parseTranscriptLine(
      '{"type":"user","timestamp":"yesterday","message":{"content":"hi"}}',
      context({ schemaLogger })
    );
    expect(events[0].timestamp).toBe(0);
    expect(schemaLogger.getIssues({ issueType: "invalid_timestamp" })).toHaveLength(1);

    const numeric = parseTranscriptLine(
      '{"type":"user","timestamp":1704067200,"message":{"content":"hi"}}',
      context()
    );
    expect(numeric[0].timestamp).toBe(0);
  });
});

// ============================================================================
// Identity and Schema Logger
// ============================================================================

describe("transcriptIdentity", () => {
  test("derives session id and project path from the path", () => {
    expect(
      transcriptIdentity("/home/dev/.claude/projects/-home-dev-app/abc-123.jsonl")
    ).toEqual({
      sessionId: "abc-123",
      projectPath: "/home/dev/.claude/projects/-home-dev-app"
    });
    expect(transcriptIdentity("session.v2.jsonl")).toEqual({
      sessionId: "session.v2",
      projectPath: ""
    });
  });
});

describe("createSchemaLogger", () => {
  test("keeps the most recent issues up to maxIssues", () => {
    const seen: string[] = [];
    const logger = createSchemaLogger({
      maxIssues: 2,
      onIssue: (issue) => seen.push(issue.id)
    });

    for (const path of ["a.jsonl", "b.jsonl", "c.jsonl"]) {
      logger.log({
        transcriptPath: path,
        issueType: "parse_error",
        description: "bad line"
      });
    }

    expect(seen).toEqual(["issue-1", "issue-2", "issue-3"]);
    expect(logger.getIssues().map((i) => i.transcriptPath)).toEqual([
      "b.jsonl",
      "c.jsonl"
    ]);
    expect(logger.getIssues({ transcriptPath: "c.jsonl" })).toHaveLength(1);
    expect(logger.getStats()).toEqual({ total: 2, byType: { parse_error: 2 } });

    logger.clear();
    expect(logger.getStats()).toEqual({ total: 0, byType: {} });
  });
});
