/**
 * State Reporter
 *
 * Folds the outputs of one run into a SpecAgentResult and forwards its paths
 * to the artifact registry. Registry calls are best effort: every call is
 * isolated, and a failure never changes the result that was already built.
 */

import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import type { ArtifactRegistry } from "../adapters/registry/types.js";
import { errorMessage } from "./errors.js";
import { SKIP_REASON_HIERARCHICAL } from "./validation-gateway.js";
import type {
  InfrastructureFailure,
  NormalizedSpec,
  SpecAgentOutcome,
  SpecAgentResult,
  ValidationResult,
} from "./types.js";

export const REGISTRY_KEYS = Object.freeze({
  output: "spec_agent_output",
  log: "spec_agent_log",
  report: "spec_agent_report",
});

export const AGENT_LABEL = "spec_agent";

export const STATUS_NO_SPEC = "No specification provided";

export interface CompletedRun {
  workflowId: string;
  workflowDir: string;
  spec: NormalizedSpec;
  specPath?: string;
  /** Paths actually written, in resolution order */
  artifactPaths: string[];
  logPath?: string;
  rawOutputPath?: string;
  validation: ValidationResult;
  infrastructureErrors: InfrastructureFailure[];
}

export interface RegistryReport {
  recorded: number;
  failed: number;
}

export function describeValidation(validation: ValidationResult): string {
  switch (validation.status) {
    case "passed":
      return "Verilog syntax check passed";
    case "failed_compilation":
      return "RTL generated but failed compilation";
    case "skipped":
      return validation.reason === SKIP_REASON_HIERARCHICAL
        ? "Skipped syntax check (hierarchical)"
        : `Skipped syntax check (${validation.reason})`;
  }
}

export function buildResult(run: CompletedRun): SpecAgentResult {
  const hierarchical = run.spec.kind === "hierarchical";
  const result: SpecAgentResult = {
    workflow_id: run.workflowId,
    workflow_dir: run.workflowDir,
    outcome: "completed",
    status: describeValidation(run.validation),
    spec_kind: run.spec.kind,
    hierarchical,
    artifact_paths: [...run.artifactPaths],
    validation: run.validation,
    infrastructure_errors: [...run.infrastructureErrors],
  };

  if (run.specPath !== undefined) result.spec_path = run.specPath;
  if (run.logPath !== undefined) result.log_path = run.logPath;
  if (run.rawOutputPath !== undefined) result.raw_output_path = run.rawOutputPath;

  // Top module is resolved last, so the last path is primary either way
  const primary = run.artifactPaths[run.artifactPaths.length - 1];
  if (primary !== undefined) result.primary_artifact = primary;

  return result;
}

/**
 * Result for a run that stopped before writing anything.
 */
export function buildEarlyExitResult(
  workflowId: string,
  workflowDir: string,
  outcome: Exclude<SpecAgentOutcome, "completed">,
  status: string
): SpecAgentResult {
  return {
    workflow_id: workflowId,
    workflow_dir: workflowDir,
    outcome,
    status,
    hierarchical: false,
    artifact_paths: [],
    infrastructure_errors: [],
  };
}

async function appendIsolated(
  registry: ArtifactRegistry,
  workflowId: string,
  key: string,
  path: string
): Promise<boolean> {
  try {
    await registry.append(workflowId, key, path);
    return true;
  } catch (error) {
    log.warn({ workflow_id: workflowId, key, path, error: errorMessage(error) }, "Artifact append failed");
    emit(TelemetryEvents.RegistryAppendFailed, { registry: registry.name, operation: "append", key });
    return false;
  }
}

/**
 * Forward every artifact path, the log and the spec to the registry.
 */
export async function reportToRegistry(result: SpecAgentResult, registry: ArtifactRegistry): Promise<RegistryReport> {
  const entries: Array<[string, string]> = result.artifact_paths.map((path) => [REGISTRY_KEYS.output, path]);
  if (result.log_path !== undefined) entries.push([REGISTRY_KEYS.log, result.log_path]);
  if (result.spec_path !== undefined) entries.push([REGISTRY_KEYS.report, result.spec_path]);

  const report: RegistryReport = { recorded: 0, failed: 0 };
  for (const [key, path] of entries) {
    if (await appendIsolated(registry, result.workflow_id, key, path)) {
      report.recorded += 1;
    } else {
      report.failed += 1;
    }
  }
  return report;
}

/**
 * Upload every file of a completed run to registry storage.
 *
 * @returns storage paths of the files that uploaded
 */
export async function uploadResultFiles(
  result: SpecAgentResult,
  registry: ArtifactRegistry,
  userId?: string
): Promise<string[]> {
  const files = [...result.artifact_paths];
  if (result.log_path !== undefined) files.push(result.log_path);
  if (result.spec_path !== undefined) files.push(result.spec_path);

  const uploaded: string[] = [];
  for (const localPath of files) {
    try {
      uploaded.push(
        await registry.upload({ localPath, userId, workflowId: result.workflow_id, agentLabel: AGENT_LABEL })
      );
    } catch (error) {
      log.warn({ workflow_id: result.workflow_id, local_path: localPath, error: errorMessage(error) }, "Artifact upload failed");
      emit(TelemetryEvents.RegistryUploadFailed, { registry: registry.name, operation: "upload" });
    }
  }
  return uploaded;
}
