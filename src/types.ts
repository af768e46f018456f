// src/types.ts — Shared types for the book content audit

export const ENGINE_VERSION = "0.1.0";

// ─── Configuration ───────────────────────────────────────────────────────────

export type AuditCommand = "progress" | "audit" | "stub";

export interface Thresholds {
  /** Minimum line count for the progress dashboard. */
  progress: number;
  /** Minimum line count for the missing-content audit. */
  audit: number;
}

export interface ResolvedConfig {
  summary: string;
  contentRoot: string;
  output: {
    progress: string;
    missing: string;
  };
  thresholds: Thresholds;
  exclude: string[];
  verbose: boolean;
  quiet: boolean;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Summary ─────────────────────────────────────────────────────────────────

export interface SummaryEntry {
  /** Path relative to the content root, without the leading "./". */
  path: string;
  title: string;
  depth: number;
  /** 1-based line in the summary file. */
  line: number;
}

// ─── Classification ──────────────────────────────────────────────────────────

export type DocumentStatus = "missing" | "stub" | "complete";

/** Finer-grained cause behind a status; the reports distinguish these. */
export type ClassificationReason =
  | "missing"
  | "unreadable"
  | "empty"
  | "stub"
  | "complete";

export interface DocumentClassification {
  status: DocumentStatus;
  reason: ClassificationReason;
  lineCount: number;
  error?: string;
}

export interface AuditEntry extends SummaryEntry, DocumentClassification {}

export interface AuditCounts {
  total: number;
  complete: number;
  stub: number;
  missing: number;
}

export interface AuditResult {
  summary: string;
  contentRoot: string;
  threshold: number;
  entries: AuditEntry[];
  counts: AuditCounts;
  percent: number;
  issues: AuditEntry[];
  orphans: string[];
  warnings: Warning[];
}
