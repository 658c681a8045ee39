/**
 * Error types for the spec agent pipeline
 *
 * Only UpstreamGenerationError ends a run early. The others are recorded
 * against the artifact or step that failed and the run carries on.
 */

/**
 * The generation backend failed or returned no text. Raised before any file
 * is written.
 */
export class UpstreamGenerationError extends Error {
  readonly name = "UpstreamGenerationError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamGenerationError);
    }
  }
}

/**
 * A filesystem write for one artifact failed.
 */
export class InfrastructureError extends Error {
  readonly name = "InfrastructureError";

  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InfrastructureError);
    }
  }
}

/**
 * The syntax checker could not be run at all (missing binary, not
 * executable, killed by timeout). Distinct from a design that fails to
 * compile.
 */
export class SyntaxCheckerUnavailableError extends Error {
  readonly name = "SyntaxCheckerUnavailableError";

  constructor(
    message: string,
    public readonly command: string,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyntaxCheckerUnavailableError);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
