// src/stub-generator.ts — Placeholder chapters for summary entries not yet written

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import { StubExistsError } from "./errors.js";

export interface CreateStubOptions {
  force?: boolean;
  /** Overrides the title derived from the file name. */
  title?: string;
}

/**
 * "swift/async-await.md" → "Async Await"
 */
export function titleFromPath(path: string): string {
  return basename(path)
    .replace(/\.md$/i, "")
    .replace(/-/g, " ")
    .replace(/\b\w/g, (c) => c.toUpperCase());
}

export function renderStub(title: string): string {
  return [
    `# ${title}`,
    "",
    "> 🚧 This section is under development",
    "",
    "## Overview",
    "",
    `This chapter covers ${title} in the context of modern Swift and iOS development.`,
    "",
    "## Key Concepts",
    "",
    "- Concept 1",
    "- Concept 2",
    "- Concept 3",
    "",
    "## Implementation",
    "",
    "```swift",
    "// Example code coming soon",
    "```",
    "",
    "## Best Practices",
    "",
    "- Best practice 1",
    "- Best practice 2",
    "- Best practice 3",
    "",
    "## Resources",
    "",
    "- [Apple Documentation](https://developer.apple.com)",
    "- [Swift.org](https://swift.org)",
    "",
    "## Next Steps",
    "",
    "Continue to the next chapter to learn more.",
    "",
  ].join("\n");
}

/**
 * Write a stub chapter at `path` (relative to the content root) and return
 * its absolute path.
 */
export function createStub(
  contentRoot: string,
  path: string,
  options: CreateStubOptions = {},
): string {
  const filePath = resolve(contentRoot, path);
  if (!options.force && existsSync(filePath)) {
    throw new StubExistsError(path);
  }
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, renderStub(options.title ?? titleFromPath(path)));
  return filePath;
}
