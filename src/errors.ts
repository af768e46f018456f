// src/errors.ts — Error types surfaced to the CLI

/** Bad option or config value. The CLI exits with status 2. */
export class AuditConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuditConfigError";
  }
}

export class StubExistsError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Refusing to overwrite existing file: ${path} (use --force)`);
    this.name = "StubExistsError";
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
