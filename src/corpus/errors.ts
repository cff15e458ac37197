export class ExtractionError extends Error {
  constructor(
    readonly filename: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not extract ${filename}: ${message}`, options);
    this.name = "ExtractionError";
  }
}

export class PersistenceError extends Error {
  constructor(
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not write ${target}`, options);
    this.name = "PersistenceError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
