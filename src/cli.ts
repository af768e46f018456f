// src/cli.ts — Command dispatch for the book-audit binary
// Returns the exit status instead of exiting so commands can be driven from tests.

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, relative, resolve } from "node:path";
import type { AuditResult, ResolvedConfig, Warning } from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import { parseCliArgs, resolveConfig, type ParsedArgs } from "./config.js";
import { auditBook } from "./audit.js";
import { createStub } from "./stub-generator.js";
import { AuditConfigError, StubExistsError, errorMessage } from "./errors.js";
import { formatProgressLine, renderProgressReport } from "./templates/progress-md.js";
import { formatIssueLine, renderMissingReport } from "./templates/missing-content-md.js";

export interface CliIO {
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  now: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_ISSUES = 1;
export const EXIT_USAGE = 2;

const HELP_TEXT = `
book-audit v${ENGINE_VERSION}

Usage:
  book-audit progress                 Write the progress dashboard (PROGRESS.md)
  book-audit audit                    Write the missing-content checklist; exit 1 if anything is incomplete
  book-audit stub <path...>           Create placeholder chapters (paths relative to the content root)
  book-audit stub --missing           Create a placeholder for every missing chapter in the summary

Options:
  --summary <path>     Summary file (default: book/src/SUMMARY.md)
  --root <dir>         Content root chapter paths resolve against (default: summary's directory)
  --output, -o         Report path (default: PROGRESS.md / .github/MISSING_CONTENT.md)
  --threshold, -t      Minimum line count for a complete chapter (default: 20 progress, 10 audit)
  --config, -c         Path to config file (default: book-audit.config.json or package.json "bookAudit")
  --exclude <glob>     Ignore matching files when listing unlinked files (repeatable)
  --json               Print the audit result as JSON instead of writing a report
  --force              Let stub overwrite existing files
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress details to stderr
  --help, -h           Show this help text
`.trim();

function processIO(): CliIO {
  return {
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    now: () => new Date(),
  };
}

export async function runCli(
  argv: string[],
  io: Partial<CliIO> = {},
): Promise<number> {
  const cli: CliIO = { ...processIO(), ...io };
  const out = (msg: string): void => cli.stdout(msg + "\n");
  const err = (msg: string): void => cli.stderr(msg + "\n");

  let args: ParsedArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e: unknown) {
    err(`[error] ${errorMessage(e)}`);
    return EXIT_USAGE;
  }

  if (args.help) {
    out(HELP_TEXT);
    return EXIT_OK;
  }

  if (!args.command) {
    err(HELP_TEXT);
    return EXIT_USAGE;
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, cli.cwd, warnings);
  const printWarnings = (list: Warning[]): void => {
    if (config.quiet) return;
    for (const w of list) err(`[${w.level}] ${w.module}: ${w.message}`);
  };

  try {
    switch (args.command) {
      case "progress": {
        const result = runAudit(config, args, args.threshold ?? config.thresholds.progress, cli.stderr);
        printWarnings([...warnings, ...result.warnings]);
        if (args.json) {
          out(JSON.stringify(result, null, 2));
          return EXIT_OK;
        }
        const outputPath = args.output ? resolve(cli.cwd, args.output) : config.output.progress;
        writeFileSafe(outputPath, renderProgressReport(result, cli.now()));
        if (!config.quiet) err(`Written to ${relative(cli.cwd, outputPath)}`);
        out(formatProgressLine(result));
        return EXIT_OK;
      }

      case "audit": {
        const result = runAudit(config, args, args.threshold ?? config.thresholds.audit, cli.stderr);
        printWarnings([...warnings, ...result.warnings]);
        const status = result.issues.length > 0 ? EXIT_ISSUES : EXIT_OK;
        if (args.json) {
          out(JSON.stringify(result, null, 2));
          return status;
        }

        for (const entry of result.issues) {
          const line = formatIssueLine(entry);
          if (line) out(line);
        }

        const report = renderMissingReport(result, cli.now());
        const outputPath = args.output ? resolve(cli.cwd, args.output) : config.output.missing;
        writeFileSafe(outputPath, report);

        if (status === EXIT_ISSUES) {
          out("");
          out(`Found ${result.issues.length} content issues`);
          cli.stdout(report);
        } else {
          out("✅ All content files present");
        }
        return status;
      }

      case "stub":
        printWarnings(warnings);
        return runStub(config, args, cli, printWarnings);

      default:
        err(`[error] Unknown command: ${args.command}`);
        err(`Run \`book-audit --help\` for usage.`);
        return EXIT_USAGE;
    }
  } catch (e: unknown) {
    if (e instanceof AuditConfigError) {
      err(`[error] ${e.message}`);
      return EXIT_USAGE;
    }
    throw e;
  }
}

function runAudit(
  config: ResolvedConfig,
  args: ParsedArgs,
  threshold: number,
  log: (text: string) => void,
): AuditResult {
  return auditBook({
    summary: config.summary,
    contentRoot: config.contentRoot,
    threshold,
    exclude: config.exclude,
    verbose: config.verbose,
    log,
    skipOrphans: args.command === "stub",
  });
}

function runStub(
  config: ResolvedConfig,
  args: ParsedArgs,
  cli: CliIO,
  printWarnings: (list: Warning[]) => void,
): number {
  const out = (msg: string): void => cli.stdout(msg + "\n");
  const err = (msg: string): void => cli.stderr(msg + "\n");
  const targets = new Set<string>();

  if (args.missing) {
    const result = runAudit(config, args, args.threshold ?? config.thresholds.audit, cli.stderr);
    printWarnings(result.warnings);
    for (const entry of result.entries) {
      if (entry.reason === "missing") targets.add(entry.path);
    }
    if (targets.size === 0 && args.paths.length === 0) {
      out("✅ No missing chapters");
      return EXIT_OK;
    }
  }

  for (const path of args.paths) targets.add(path);

  if (targets.size === 0) {
    err("[error] stub needs at least one path, or --missing");
    return EXIT_USAGE;
  }

  let failed = 0;
  for (const path of targets) {
    try {
      createStub(config.contentRoot, path, { force: args.force });
      out(`✅ Created stub: ${path}`);
    } catch (e: unknown) {
      if (!(e instanceof StubExistsError)) throw e;
      err(`[error] ${e.message}`);
      failed++;
    }
  }

  return failed > 0 ? EXIT_ISSUES : EXIT_OK;
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}
