// src/config.ts — Config Resolver
// defaults ← book-audit.config.json / package.json "bookAudit" ← CLI flags

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import mri from "mri";
import type { ResolvedConfig, Thresholds, Warning } from "./types.js";
import { AuditConfigError, errorMessage } from "./errors.js";

export const CONFIG_FILENAME = "book-audit.config.json";
export const PACKAGE_JSON_KEY = "bookAudit";

export interface ParsedArgs {
  command?: string;
  /** Positional arguments after the command. */
  paths: string[];
  summary?: string;
  root?: string;
  output?: string;
  config?: string;
  threshold?: number;
  exclude: string[];
  json: boolean;
  force: boolean;
  missing: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

/** Shape accepted from a config file; every field optional. */
export interface FileConfig {
  summary?: string;
  contentRoot?: string;
  output?: {
    progress?: string;
    missing?: string;
  };
  thresholds?: Partial<Thresholds>;
  exclude?: string[];
}

export const DEFAULTS = {
  summary: "book/src/SUMMARY.md",
  output: {
    progress: "PROGRESS.md",
    missing: ".github/MISSING_CONTENT.md",
  },
  thresholds: {
    progress: 20,
    audit: 10,
  },
} as const;

/**
 * Parse CLI args using mri.
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const args = mri(argv, {
    alias: { o: "output", c: "config", t: "threshold", q: "quiet", v: "verbose", h: "help" },
    boolean: ["json", "force", "missing", "quiet", "verbose", "help"],
    string: ["summary", "root", "output", "config", "threshold", "exclude"],
  });

  const positionals = args._.map(String);

  return {
    command: positionals[0],
    paths: positionals.slice(1),
    summary: optionalString(args.summary, "--summary"),
    root: optionalString(args.root, "--root"),
    output: optionalString(args.output, "--output"),
    config: optionalString(args.config, "--config"),
    threshold: parseThreshold(args.threshold),
    exclude: stringList(args.exclude),
    json: args.json === true,
    force: args.force === true,
    missing: args.missing === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
  };
}

/**
 * Resolve config from CLI args, config file, and defaults. Relative paths are
 * resolved against `cwd`.
 */
export function resolveConfig(
  args: ParsedArgs,
  cwd: string = process.cwd(),
  warnings: Warning[] = [],
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, cwd, warnings) ?? {};

  const summary = resolve(cwd, args.summary ?? fileConfig.summary ?? DEFAULTS.summary);
  const rootSetting = args.root ?? fileConfig.contentRoot;

  return {
    summary,
    contentRoot: rootSetting ? resolve(cwd, rootSetting) : dirname(summary),
    output: {
      progress: resolve(cwd, fileConfig.output?.progress ?? DEFAULTS.output.progress),
      missing: resolve(cwd, fileConfig.output?.missing ?? DEFAULTS.output.missing),
    },
    thresholds: {
      progress: fileConfig.thresholds?.progress ?? DEFAULTS.thresholds.progress,
      audit: fileConfig.thresholds?.audit ?? DEFAULTS.thresholds.audit,
    },
    exclude: [...(fileConfig.exclude ?? []), ...args.exclude],
    verbose: args.verbose,
    quiet: args.quiet,
  };
}

/**
 * Explicit --config path first, then book-audit.config.json, then the
 * "bookAudit" key of package.json.
 */
export function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[] = [],
): FileConfig | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && pkg[PACKAGE_JSON_KEY] !== undefined) {
        return validateFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch (err: unknown) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Failed to parse ${pkgJson}: ${errorMessage(err)}`,
        file: pkgJson,
      });
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return validateFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${errorMessage(err)}`,
      file: filePath,
    });
    return null;
  }
}

/**
 * Keep the fields that have the right shape; warn about and drop the rest.
 */
export function validateFileConfig(
  raw: unknown,
  filePath: string,
  warnings: Warning[] = [],
): FileConfig {
  const warn = (message: string): void => {
    warnings.push({ level: "warn", module: "config", message, file: filePath });
  };

  if (!isRecord(raw)) {
    warn("Config must be a JSON object; ignoring it");
    return {};
  }
  const fields = raw;

  const config: FileConfig = {};

  const pathField = (key: string): string | undefined => {
    const value = fields[key];
    if (value === undefined) return undefined;
    if (typeof value === "string" && value.length > 0) return value;
    warn(`"${key}" must be a non-empty string; using the default`);
    return undefined;
  };

  config.summary = pathField("summary");
  config.contentRoot = pathField("contentRoot");

  if (fields.output !== undefined) {
    if (isRecord(fields.output)) {
      const output: NonNullable<FileConfig["output"]> = {};
      for (const key of ["progress", "missing"] as const) {
        const value = fields.output[key];
        if (value === undefined) continue;
        if (typeof value === "string" && value.length > 0) output[key] = value;
        else warn(`"output.${key}" must be a non-empty string; using the default`);
      }
      config.output = output;
    } else {
      warn(`"output" must be an object; using the defaults`);
    }
  }

  if (fields.thresholds !== undefined) {
    if (isRecord(fields.thresholds)) {
      const thresholds: Partial<Thresholds> = {};
      for (const key of ["progress", "audit"] as const) {
        const value = fields.thresholds[key];
        if (value === undefined) continue;
        if (isPositiveInteger(value)) thresholds[key] = value;
        else warn(`"thresholds.${key}" must be a positive integer; using the default`);
      }
      config.thresholds = thresholds;
    } else {
      warn(`"thresholds" must be an object; using the defaults`);
    }
  }

  if (fields.exclude !== undefined) {
    if (Array.isArray(fields.exclude) && fields.exclude.every((p) => typeof p === "string")) {
      config.exclude = fields.exclude.filter((p): p is string => typeof p === "string");
    } else {
      warn(`"exclude" must be an array of glob strings; ignoring it`);
    }
  }

  return config;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function optionalString(value: unknown, flag: string): string | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value)) {
    throw new AuditConfigError(`${flag} may only be given once`);
  }
  if (typeof value !== "string" || value.length === 0) {
    throw new AuditConfigError(`${flag} requires a value`);
  }
  return value;
}

function stringList(value: unknown): string[] {
  if (value === undefined) return [];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.filter((v): v is string => typeof v === "string" && v.length > 0);
}

function parseThreshold(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const text = typeof value === "string" ? value.trim() : "";
  const parsed = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!isPositiveInteger(parsed)) {
    throw new AuditConfigError(
      `--threshold must be a positive integer, got "${String(value)}"`,
    );
  }
  return parsed;
}
