// src/summary-parser.ts — Chapter extraction from the book's SUMMARY.md
// Chapters are markdown link targets of the form (./path/to/file.md).

import { readFileSync } from "node:fs";
import type { SummaryEntry, Warning } from "./types.js";
import { errorMessage } from "./errors.js";
import { titleFromPath } from "./stub-generator.js";

const CHAPTER_LINK = /(?:\[([^\]]*)\])?\(\.\/([^)]+\.md)\)/g;
const LIST_ITEM = /^([ \t]*)[-*+]\s/;

/**
 * Extract chapter references in document order.
 * A path listed twice is kept at its first occurrence.
 */
export function parseSummary(
  content: string,
  warnings: Warning[] = [],
): SummaryEntry[] {
  const entries: SummaryEntry[] = [];
  const seen = new Map<string, number>();
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const depth = indentDepth(line);

    for (const match of line.matchAll(CHAPTER_LINK)) {
      const path = match[2];
      const firstLine = seen.get(path);
      if (firstLine !== undefined) {
        warnings.push({
          level: "info",
          module: "summary-parser",
          message: `Duplicate reference to ${path} on line ${i + 1} (first on line ${firstLine})`,
        });
        continue;
      }
      seen.set(path, i + 1);

      const linkText = match[1]?.trim();
      entries.push({
        path,
        title: linkText ? linkText : titleFromPath(path),
        depth,
        line: i + 1,
      });
    }
  }

  return entries;
}

/**
 * Read and parse a summary file. A summary that cannot be read yields no
 * entries and an error warning.
 */
export function readSummary(
  summaryPath: string,
  warnings: Warning[] = [],
): SummaryEntry[] {
  let content: string;
  try {
    content = readFileSync(summaryPath, "utf-8");
  } catch (err: unknown) {
    warnings.push({
      level: "error",
      module: "summary-parser",
      message: `Cannot read summary: ${errorMessage(err)}`,
      file: summaryPath,
    });
    return [];
  }
  return parseSummary(content, warnings);
}

/** Nesting level of a list item: one per tab or per two spaces. */
function indentDepth(line: string): number {
  const m = LIST_ITEM.exec(line);
  if (!m) return 0;
  let spaces = 0;
  let tabs = 0;
  for (const ch of m[1]) {
    if (ch === "\t") tabs++;
    else spaces++;
  }
  return tabs + Math.floor(spaces / 2);
}
