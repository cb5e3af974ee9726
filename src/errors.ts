import type { z } from "zod";

export const PREVIEW_LENGTH = 400;

export const toPreview = (text: string, limit = PREVIEW_LENGTH): string =>
  text.length > limit ? `${text.slice(0, limit)}...` : text;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export class CompletionFailure extends Error {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CompletionFailure";
  }
}

/**
 * Raised when model output cannot be turned into the structure a stage needs,
 * either because no JSON object could be recovered or because the object
 * does not match the stage schema.
 */
export class MalformedOutput extends Error {
  readonly preview: string;

  constructor(
    message: string,
    rawText: string,
    readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = "MalformedOutput";
    this.preview = toPreview(rawText);
  }
}

export class UnsafePathError extends Error {
  constructor(readonly rejectedPath: string) {
    super(`Unsafe path rejected: ${rejectedPath}`);
    this.name = "UnsafePathError";
  }
}

export class ProjectLockedError extends Error {
  constructor(readonly lockPath: string) {
    super(`Project root is locked by another run: ${lockPath}. Remove the file if no run is active.`);
    this.name = "ProjectLockedError";
  }
}
