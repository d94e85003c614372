/**
 * Error taxonomy for a daily post run.
 *
 * Only ConfigurationError and PostFailureError ever reach a PostRecord.
 * SourceUnavailableError and RenderUnavailableError are recovered by the
 * content and media fallback chains.
 */

/** One or more required credentials are not set. */
export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

/** A news, search or download call failed or returned nothing usable. */
export class SourceUnavailableError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "SourceUnavailableError";
    this.source = source;
  }
}

/** The image rendering backend could not be loaded. */
export class RenderUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderUnavailableError";
  }
}

/** The posting collaborator failed after content and media were resolved. */
export class PostFailureError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "PostFailureError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
