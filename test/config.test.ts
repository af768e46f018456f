import { describe, it, expect, afterAll } from "vitest";
import { join } from "node:path";
import { parseCliArgs, resolveConfig, validateFileConfig } from "../src/config.js";
import { AuditConfigError } from "../src/errors.js";
import type { Warning } from "../src/types.js";
import { makeTree, cleanupTrees } from "./helpers/book.js";

afterAll(() => cleanupTrees());

describe("parseCliArgs", () => {
  it("parses the command, options and aliases", () => {
    const args = parseCliArgs([
      "audit",
      "--threshold",
      "15",
      "--exclude",
      "drafts/**",
      "--exclude",
      "*.tmp.md",
      "-o",
      "report.md",
      "-q",
    ]);
    expect(args.command).toBe("audit");
    expect(args.threshold).toBe(15);
    expect(args.exclude).toEqual(["drafts/**", "*.tmp.md"]);
    expect(args.output).toBe("report.md");
    expect(args.quiet).toBe(true);
    expect(args.verbose).toBe(false);
    expect(args.json).toBe(false);
  });

  it("collects positional paths after the command", () => {
    const args = parseCliArgs(["stub", "a.md", "swift/b.md", "--force"]);
    expect(args.command).toBe("stub");
    expect(args.paths).toEqual(["a.md", "swift/b.md"]);
    expect(args.force).toBe(true);
  });

  it("has no command when none is given", () => {
    const args = parseCliArgs(["--help"]);
    expect(args.command).toBeUndefined();
    expect(args.help).toBe(true);
  });

  it("rejects a threshold that is not a positive integer", () => {
    expect(() => parseCliArgs(["audit", "--threshold", "abc"])).toThrow(AuditConfigError);
    expect(() => parseCliArgs(["audit", "--threshold", "0"])).toThrow(AuditConfigError);
    expect(() => parseCliArgs(["audit", "--threshold", "1.5"])).toThrow(AuditConfigError);
  });

  it("rejects an option given without a value", () => {
    expect(() => parseCliArgs(["audit", "--summary"])).toThrow("--summary requires a value");
  });
});

describe("resolveConfig", () => {
  it("uses defaults when there is no config file", () => {
    const cwd = makeTree({});
    const config = resolveConfig(parseCliArgs(["progress"]), cwd);
    expect(config).toEqual({
      summary: join(cwd, "book/src/SUMMARY.md"),
      contentRoot: join(cwd, "book/src"),
      output: {
        progress: join(cwd, "PROGRESS.md"),
        missing: join(cwd, ".github/MISSING_CONTENT.md"),
      },
      thresholds: { progress: 20, audit: 10 },
      exclude: [],
      verbose: false,
      quiet: false,
    });
  });

  it("reads book-audit.config.json and appends CLI excludes", () => {
    const cwd = makeTree({
      "book-audit.config.json": JSON.stringify({
        summary: "docs/SUMMARY.md",
        thresholds: { audit: 5 },
        exclude: ["drafts/**"],
        output: { missing: "reports/missing.md" },
      }),
    });
    const config = resolveConfig(parseCliArgs(["audit", "--exclude", "*.bak.md"]), cwd);
    expect(config.summary).toBe(join(cwd, "docs/SUMMARY.md"));
    expect(config.contentRoot).toBe(join(cwd, "docs"));
    expect(config.thresholds).toEqual({ progress: 20, audit: 5 });
    expect(config.exclude).toEqual(["drafts/**", "*.bak.md"]);
    expect(config.output.missing).toBe(join(cwd, "reports/missing.md"));
    expect(config.output.progress).toBe(join(cwd, "PROGRESS.md"));
  });

  it("reads the bookAudit key from package.json", () => {
    const cwd = makeTree({
      "package.json": JSON.stringify({ name: "course", bookAudit: { contentRoot: "content" } }),
    });
    const config = resolveConfig(parseCliArgs(["audit"]), cwd);
    expect(config.contentRoot).toBe(join(cwd, "content"));
  });

  it("lets CLI flags override the config file", () => {
    const cwd = makeTree({
      "book-audit.config.json": JSON.stringify({ summary: "docs/SUMMARY.md", contentRoot: "docs" }),
    });
    const config = resolveConfig(
      parseCliArgs(["audit", "--summary", "other/SUMMARY.md", "--root", "other/src"]),
      cwd,
    );
    expect(config.summary).toBe(join(cwd, "other/SUMMARY.md"));
    expect(config.contentRoot).toBe(join(cwd, "other/src"));
  });

  it("uses an explicit --config path", () => {
    const cwd = makeTree({
      "ci/audit.json": JSON.stringify({ thresholds: { progress: 50 } }),
    });
    const config = resolveConfig(parseCliArgs(["progress", "-c", "ci/audit.json"]), cwd);
    expect(config.thresholds.progress).toBe(50);
  });

  it("warns when the explicit config file is missing", () => {
    const cwd = makeTree({});
    const warnings: Warning[] = [];
    resolveConfig(parseCliArgs(["audit", "--config", "nope.json"]), cwd, warnings);
    expect(warnings).toEqual([
      { level: "warn", module: "config", message: "Config file not found: nope.json" },
    ]);
  });

  it("warns about unparseable config files and falls back to defaults", () => {
    const cwd = makeTree({ "book-audit.config.json": "{ not json" });
    const warnings: Warning[] = [];
    const config = resolveConfig(parseCliArgs(["audit"]), cwd, warnings);
    expect(config.thresholds).toEqual({ progress: 20, audit: 10 });
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message.startsWith("Failed to parse config file")).toBe(true);
  });
});

describe("validateFileConfig", () => {
  it("drops fields with the wrong shape and warns", () => {
    const warnings: Warning[] = [];
    const config = validateFileConfig(
      { summary: 42, thresholds: { progress: -1, audit: 8 }, exclude: "drafts/**" },
      "book-audit.config.json",
      warnings,
    );
    expect(config.summary).toBeUndefined();
    expect(config.thresholds).toEqual({ audit: 8 });
    expect(config.exclude).toBeUndefined();
    expect(warnings.map((w) => w.message)).toEqual([
      '"summary" must be a non-empty string; using the default',
      '"thresholds.progress" must be a positive integer; using the default',
      '"exclude" must be an array of glob strings; ignoring it',
    ]);
  });

  it("ignores a config that is not an object", () => {
    const warnings: Warning[] = [];
    expect(validateFileConfig([1, 2], "x.json", warnings)).toEqual({});
    expect(warnings[0].message).toBe("Config must be a JSON object; ignoring it");
  });
});
