// src/file-discovery.ts — Markdown files under the content root
// Used to find chapters that exist on disk but are never linked from the summary.

import { readdirSync, statSync, realpathSync } from "node:fs";
import { resolve, relative, join, sep, isAbsolute } from "node:path";
import picomatch from "picomatch";
import type { Warning } from "./types.js";
import { errorMessage } from "./errors.js";

const SKIP_DIRS: readonly string[] = ["node_modules", ".git"];
const MARKDOWN_EXTENSION = /\.md$/i;
const SUMMARY_FILE = "SUMMARY.md";

/**
 * Discover markdown files below `contentRoot`, as sorted paths relative to it
 * using "/" separators. SUMMARY.md is never returned.
 */
export function discoverMarkdownFiles(
  contentRoot: string,
  excludePatterns: string[] = [],
  warnings: Warning[] = [],
): string[] {
  const absRoot = resolve(contentRoot);
  const files: string[] = [];
  const root = realRoot(absRoot);
  const visited = new Set<number>(); // inode set for symlink cycle detection
  const rootStat = statSync(root, { throwIfNoEntry: false });
  if (rootStat) visited.add(rootStat.ino);
  walkDirectory(absRoot, { base: absRoot, real: root }, files, visited, warnings);

  const isExcluded =
    excludePatterns.length > 0
      ? picomatch(excludePatterns, { dot: true })
      : () => false;

  return files
    .map((f) => relative(absRoot, f).split(sep).join("/"))
    .filter((rel) => rel !== SUMMARY_FILE && !isExcluded(rel))
    .sort();
}

/**
 * Files on disk that no summary entry points at.
 */
export function findOrphans(
  discovered: string[],
  referenced: Iterable<string>,
): string[] {
  const linked = new Set<string>();
  for (const path of referenced) linked.add(normalizeReference(path));
  return discovered.filter((f) => !linked.has(f));
}

function normalizeReference(path: string): string {
  return path
    .split("/")
    .filter((part) => part !== "" && part !== ".")
    .join("/");
}

function realRoot(absRoot: string): string {
  try {
    return realpathSync(absRoot);
  } catch {
    // Reported by the walk itself
    return absRoot;
  }
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== ".." && !rel.startsWith(".." + sep) && !isAbsolute(rel);
}

interface WalkRoot {
  /** Root as given; used for messages. */
  base: string;
  /** Root with symlinks resolved; used for boundary checks. */
  real: string;
}

function walkDirectory(
  dir: string,
  root: WalkRoot,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${errorMessage(err)}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (SKIP_DIRS.includes(entry.name)) continue;
      walkDirectory(fullPath, root, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        if (!isInside(root.real, realPath)) {
          warnings.push({
            level: "info",
            module: "file-discovery",
            message: `Symlink ${relative(root.base, fullPath)} points outside the content root — skipped`,
            file: fullPath,
          });
          continue;
        }
        const stat = statSync(realPath);
        if (stat.isDirectory()) {
          if (SKIP_DIRS.includes(entry.name)) continue;
          if (visitedInodes.has(stat.ino)) {
            warnings.push({
              level: "info",
              module: "file-discovery",
              message: `Symlink cycle detected at ${relative(root.base, fullPath)} — skipped`,
              file: fullPath,
            });
            continue;
          }
          visitedInodes.add(stat.ino);
          walkDirectory(fullPath, root, results, visitedInodes, warnings);
        } else if (stat.isFile() && MARKDOWN_EXTENSION.test(entry.name)) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        warnings.push({
          level: "warn",
          module: "file-discovery",
          message: `Cannot resolve symlink: ${errorMessage(err)}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile() && MARKDOWN_EXTENSION.test(entry.name)) {
      results.push(fullPath);
    }
  }
}
