// src/audit.ts — Audit orchestrator
// Summary → classify every chapter → counts, percentage, issues, orphans.

import { dirname, relative, resolve, sep } from "node:path";
import type {
  AuditCounts,
  AuditEntry,
  AuditResult,
  SummaryEntry,
  Warning,
} from "./types.js";
import { readSummary } from "./summary-parser.js";
import { assertThreshold, classifyDocument } from "./classifier.js";
import { discoverMarkdownFiles, findOrphans } from "./file-discovery.js";

export interface AuditOptions {
  summary: string;
  /** Defaults to the directory containing the summary. */
  contentRoot?: string;
  threshold: number;
  exclude?: string[];
  /** Skip the unlinked-file scan. */
  skipOrphans?: boolean;
  verbose?: boolean;
  /** Receives verbose lines, newline-terminated. Defaults to process.stderr. */
  log?: (text: string) => void;
}

function writeStderr(text: string): void {
  process.stderr.write(text);
}

export function auditBook(options: AuditOptions): AuditResult {
  assertThreshold(options.threshold);
  const warnings: Warning[] = [];
  const verbose = options.verbose ?? false;
  const log = options.log ?? writeStderr;
  /** Verbose logger — writes only when verbose is enabled. */
  const vlog = (msg: string): void => {
    if (verbose) log(`[INFO] ${msg}\n`);
  };
  const summary = resolve(options.summary);
  const contentRoot = resolve(options.contentRoot ?? dirname(summary));

  const summaryEntries = readSummary(summary, warnings);
  vlog(`Summary references ${summaryEntries.length} chapter(s)`);

  const entries = classifyEntries(summaryEntries, contentRoot, options.threshold);
  const counts = tally(entries);
  vlog(
    `Classified: ${counts.complete} complete, ${counts.stub} stub, ${counts.missing} missing`,
  );

  if (counts.total === 0) {
    warnings.push({
      level: "warn",
      module: "audit",
      message: "Summary references no chapters; completion is reported as 0%",
      file: summary,
    });
  }

  let orphans: string[] = [];
  if (!options.skipOrphans) {
    const discovered = discoverMarkdownFiles(contentRoot, options.exclude ?? [], warnings);
    const summaryPath = relative(contentRoot, summary).split(sep).join("/");
    orphans = findOrphans(
      discovered.filter((f) => f !== summaryPath),
      entries.map((e) => e.path),
    );
    vlog(`Unlinked markdown files: ${orphans.length}`);
  }

  return {
    summary,
    contentRoot,
    threshold: options.threshold,
    entries,
    counts,
    percent: completionPercent(counts),
    issues: entries.filter((e) => e.status !== "complete"),
    orphans,
    warnings,
  };
}

export function classifyEntries(
  summaryEntries: SummaryEntry[],
  contentRoot: string,
  threshold: number,
): AuditEntry[] {
  return summaryEntries.map((entry) => ({
    ...entry,
    ...classifyDocument(contentRoot, entry.path, threshold),
  }));
}

export function tally(entries: AuditEntry[]): AuditCounts {
  const counts: AuditCounts = { total: 0, complete: 0, stub: 0, missing: 0 };
  for (const entry of entries) {
    counts.total++;
    counts[entry.status]++;
  }
  return counts;
}

/**
 * Integer percentage of complete chapters, rounded down. An empty book is 0%.
 */
export function completionPercent(counts: AuditCounts): number {
  if (counts.total === 0) return 0;
  return Math.floor((counts.complete * 100) / counts.total);
}
