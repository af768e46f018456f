// Template for PROGRESS.md — the course progress dashboard

import type { AuditEntry, AuditResult } from "../types.js";

const PROGRESS_BAR_URL = "https://progress-bar.dev";

const STATUS_LABELS: Record<AuditEntry["reason"], string> = {
  missing: "❌ Missing",
  unreadable: "❌ Unreadable",
  empty: "🚧 Empty",
  stub: "🚧 Stub",
  complete: "✅ Complete",
};

export function progressBarUrl(percent: number): string {
  return `${PROGRESS_BAR_URL}/${percent}/?title=Complete&width=400`;
}

export function renderProgressReport(
  result: AuditResult,
  generatedAt: Date,
): string {
  const { counts, percent } = result;
  const lines: string[] = [
    "# Course Progress Dashboard",
    "",
    `Last Updated: ${generatedAt.toISOString()}`,
    "",
    "## Overall Progress",
    "",
    `![Progress](${progressBarUrl(percent)})`,
    "",
    `- ✅ Complete: ${counts.complete}`,
    `- 🚧 Stubs: ${counts.stub}`,
    `- ❌ Missing: ${counts.missing}`,
    `- 📊 Total: ${counts.total}`,
    "",
    `**Completion Rate: ${percent}%**`,
  ];

  if (result.issues.length > 0) {
    lines.push("", "## Incomplete Chapters", "", "| Chapter | Status | Lines |", "|---|---|---|");
    for (const entry of result.issues) {
      lines.push(`| \`${escapeCell(entry.path)}\` | ${STATUS_LABELS[entry.reason]} | ${entry.lineCount} |`);
    }
  }

  return lines.join("\n") + "\n";
}

/** One-line console summary printed after the dashboard is written. */
export function formatProgressLine(result: AuditResult): string {
  return `Progress: ${result.counts.complete}/${result.counts.total} (${result.percent}%)`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}
