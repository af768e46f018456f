// src/classifier.ts — Completeness classification for a single chapter file

import { readFileSync, statSync } from "node:fs";
import { resolve } from "node:path";
import type { DocumentClassification } from "./types.js";
import { AuditConfigError, errorMessage } from "./errors.js";

/**
 * Count newline characters, the way `wc -l` does. A final line without a
 * trailing newline is not counted.
 */
export function countLines(content: string): number {
  let count = 0;
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) count++;
  }
  return count;
}

export function assertThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new AuditConfigError(
      `Stub threshold must be a positive integer, got ${threshold}`,
    );
  }
}

/**
 * Classify a chapter referenced from the summary.
 *
 * missing: no file at the resolved path, or it cannot be read
 * stub: zero bytes, or fewer than `threshold` lines
 * complete: everything else
 */
export function classifyDocument(
  contentRoot: string,
  path: string,
  threshold: number,
): DocumentClassification {
  assertThreshold(threshold);
  const filePath = resolve(contentRoot, path);

  let content: string;
  try {
    const stat = statSync(filePath, { throwIfNoEntry: false });
    if (!stat) return { status: "missing", reason: "missing", lineCount: 0 };
    if (!stat.isFile()) {
      return {
        status: "missing",
        reason: "unreadable",
        lineCount: 0,
        error: "not a regular file",
      };
    }
    if (stat.size === 0) return { status: "stub", reason: "empty", lineCount: 0 };
    content = readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    return {
      status: "missing",
      reason: "unreadable",
      lineCount: 0,
      error: errorMessage(err),
    };
  }

  const lineCount = countLines(content);
  if (lineCount < threshold) {
    return { status: "stub", reason: "stub", lineCount };
  }
  return { status: "complete", reason: "complete", lineCount };
}
