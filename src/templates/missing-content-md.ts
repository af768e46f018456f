// Template for .github/MISSING_CONTENT.md — checklist of incomplete chapters

import type { AuditEntry, AuditResult } from "../types.js";

export function formatChecklistItem(entry: AuditEntry): string {
  const name = `\`${entry.path}\``;
  switch (entry.reason) {
    case "empty":
      return `- [ ] ${name} (empty)`;
    case "stub":
      return `- [ ] ${name} (stub - ${entry.lineCount} lines)`;
    case "unreadable":
      return `- [ ] ${name} (unreadable)`;
    default:
      return `- [ ] ${name}`;
  }
}

/** Console line for an issue, or undefined for a complete chapter. */
export function formatIssueLine(entry: AuditEntry): string | undefined {
  switch (entry.reason) {
    case "missing":
      return `❌ Missing: ${entry.path}`;
    case "unreadable":
      return `❌ Unreadable: ${entry.path}${entry.error ? ` (${entry.error})` : ""}`;
    case "empty":
      return `⚠️  Empty: ${entry.path}`;
    case "stub":
      return `⚠️  Stub: ${entry.path} (${entry.lineCount} lines)`;
    case "complete":
      return undefined;
  }
}

export function renderMissingReport(
  result: AuditResult,
  generatedAt: Date,
): string {
  const lines: string[] = [
    "# Missing Content Audit",
    `Generated: ${generatedAt.toISOString()}`,
    "",
  ];

  for (const entry of result.issues) {
    lines.push(formatChecklistItem(entry));
  }

  lines.push("", `**Total Issues: ${result.issues.length}**`);

  if (result.orphans.length > 0) {
    lines.push("", "## Unlinked Files", "");
    for (const orphan of result.orphans) {
      lines.push(`- \`${orphan}\``);
    }
  }

  return lines.join("\n") + "\n";
}
