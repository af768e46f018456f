// src/index.ts — Library API

export type {
  AuditCommand,
  AuditCounts,
  AuditEntry,
  AuditResult,
  ClassificationReason,
  DocumentClassification,
  DocumentStatus,
  ResolvedConfig,
  SummaryEntry,
  Thresholds,
  Warning,
} from "./types.js";
export type { AuditOptions } from "./audit.js";
export type { CreateStubOptions } from "./stub-generator.js";
export type { FileConfig, ParsedArgs } from "./config.js";
export type { CliIO } from "./cli.js";

export { ENGINE_VERSION } from "./types.js";
export { AuditConfigError, StubExistsError } from "./errors.js";
export { parseSummary, readSummary } from "./summary-parser.js";
export { classifyDocument, countLines } from "./classifier.js";
export { auditBook, completionPercent, tally } from "./audit.js";
export { discoverMarkdownFiles, findOrphans } from "./file-discovery.js";
export { createStub, renderStub, titleFromPath } from "./stub-generator.js";
export { renderProgressReport, formatProgressLine, progressBarUrl } from "./templates/progress-md.js";
export { renderMissingReport, formatChecklistItem, formatIssueLine } from "./templates/missing-content-md.js";
export { parseCliArgs, resolveConfig, loadConfigFile, DEFAULTS } from "./config.js";
export { runCli } from "./cli.js";
