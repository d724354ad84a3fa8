/**
 * Schema issue logger - records lines and fields the parser recovered from.
 *
 * Parsing never rejects bad content, so this is where malformed lines,
 * unusable timestamps and odd record shapes become visible.
 */

import type {
  SchemaIssue,
  SchemaIssueType,
  SchemaLogger,
  SchemaLoggerInput
} from "./types.js";

export type { SchemaLogger, SchemaLoggerInput };

export interface SchemaLoggerOptions {
  /** Oldest issues are dropped past this count. */
  maxIssues?: number;
  onIssue?: (issue: SchemaIssue) => void;
}

export interface IssueFilter {
  issueType?: SchemaIssueType;
  transcriptPath?: string;
}

export interface FilterableSchemaLogger extends SchemaLogger {
  getIssues(filter?: IssueFilter): SchemaIssue[];
}

export function createSchemaLogger(
  options: SchemaLoggerOptions = {}
): FilterableSchemaLogger {
  const { maxIssues = 1000, onIssue } = options;
  const issues: SchemaIssue[] = [];
  let sequence = 0;

  return {
    log(input) {
      sequence++;
      const issue: SchemaIssue = {
        id: `issue-${sequence}`,
        timestamp: new Date().toISOString(),
        ...input
      };

      issues.push(issue);
      while (issues.length > Math.max(0, maxIssues)) {
        issues.shift();
      }

      onIssue?.(issue);
    },

    getIssues(filter = {}) {
      return issues.filter(
        (issue) =>
          (filter.issueType === undefined ||
            issue.issueType === filter.issueType) &&
          (filter.transcriptPath === undefined ||
            issue.transcriptPath === filter.transcriptPath)
      );
    },

    getStats() {
      const byType: Record<string, number> = {};
      for (const { issueType } of issues) {
        byType[issueType] = (byType[issueType] ?? 0) + 1;
      }
      return { total: issues.length, byType };
    },

    clear() {
      issues.length = 0;
      sequence = 0;
    }
  };
}
