/**
 * Generation adapter failures.
 *
 * The pipeline wraps either kind in UpstreamGenerationError; the provider and
 * elapsed time end up in the `spec_agent.generation.failed` event.
 */
export abstract class GenerationAdapterError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** The call was aborted after GENERATION_TIMEOUT_MS */
export class UpstreamTimeoutError extends GenerationAdapterError {
  readonly name = "UpstreamTimeoutError";
}

/**
 * The provider answered with a non-2xx status. `code` is the provider's own
 * error code and `requestId` its request id header, when it sent them.
 */
export class UpstreamHTTPError extends GenerationAdapterError {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    elapsedMs: number,
    cause?: unknown
  ) {
    super(message, provider, elapsedMs, cause);
  }
}
