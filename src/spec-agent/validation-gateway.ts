/**
 * Validation Gateway
 *
 * Syntax-checks flat designs. Hierarchical designs are skipped because a
 * single-file check cannot elaborate cross-module references. A checker that
 * cannot run is reported as an infrastructure error, never as a compile
 * failure.
 */

import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import type { SyntaxChecker } from "../adapters/syntax-check/types.js";
import { errorMessage } from "./errors.js";
import type { NormalizedSpec, ResolvedArtifact, ValidationOutcome, ValidationResult } from "./types.js";

export const SKIP_REASON_HIERARCHICAL = "hierarchical design";
export const SKIP_REASON_PARSE_FAILURE = "metadata parse failure";
export const SKIP_REASON_UNAVAILABLE = "syntax checker unavailable";
export const SKIP_REASON_NO_ARTIFACT = "artifact was not written";

function skipped(reason: string): ValidationResult {
  return { status: "skipped", reason };
}

export async function validateDesign(
  spec: NormalizedSpec,
  artifacts: readonly ResolvedArtifact[],
  writtenPaths: readonly string[],
  checker: SyntaxChecker,
  workflowDir: string,
): Promise<ValidationOutcome> {
  switch (spec.kind) {
    case "hierarchical":
      log.info({ module_count: artifacts.length }, "Skipped syntax check (hierarchical)");
      return { result: skipped(SKIP_REASON_HIERARCHICAL) };
    case "parse_failure":
      log.info("Skipped syntax check (metadata parse failure)");
      return { result: skipped(SKIP_REASON_PARSE_FAILURE) };
    case "flat":
      break;
  }

  const [artifact] = artifacts;
  if (!artifact || !writtenPaths.includes(artifact.path)) {
    return { result: skipped(SKIP_REASON_NO_ARTIFACT) };
  }

  try {
    const run = await checker.check(artifact.path, { cwd: workflowDir });

    const result: ValidationResult =
      run.exitCode === 0
        ? { status: "passed" }
        : { status: "failed_compilation", diagnostics: run.stderr || run.stdout };

    emit(TelemetryEvents.SyntaxCheckCompleted, {
      checker: checker.name,
      status: result.status,
      exit_code: run.exitCode,
    });
    return { result };
  } catch (error) {
    // Any throw means the tool never produced a verdict
    log.error({ checker: checker.name, error: errorMessage(error) }, "Syntax checker unavailable");
    emit(TelemetryEvents.SyntaxCheckUnavailable, { checker: checker.name });
    return {
      result: skipped(SKIP_REASON_UNAVAILABLE),
      infrastructureError: { kind: "syntax_checker", path: artifact.path, message: errorMessage(error) },
    };
  }
}
