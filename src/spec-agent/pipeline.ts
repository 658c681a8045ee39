/**
 * Spec agent pipeline
 *
 * One run: prompt → generate → extract → normalize → resolve → emit →
 * validate → report. Stages run strictly in order and each I/O step is
 * awaited before the next begins.
 *
 * Only an empty request or a generation failure ends a run early, and both do
 * so before anything touches the workflow directory. Every later failure is
 * recorded on the result and the run continues.
 */

import path from "node:path";
import { config } from "../config/index.js";
import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import type { GenerationClient } from "../adapters/llm/types.js";
import { GenerationAdapterError } from "../adapters/llm/errors.js";
import { UpstreamGenerationError, errorMessage } from "./errors.js";
import { extractSegments } from "./extractor.js";
import { normalizeSpec, serializeNormalizedSpec, specArtifactName, specModuleName } from "./normalizer.js";
import { resolveArtifacts, safeArtifactPath } from "./resolver.js";
import { dedupePortDeclarations } from "./port-cleanup.js";
import { emitArtifacts, writeWorkflowFile } from "./emitter.js";
import { validateDesign } from "./validation-gateway.js";
import { buildSpecPrompt } from "./prompt.js";
import {
  STATUS_NO_SPEC,
  buildEarlyExitResult,
  buildResult,
  describeValidation,
  reportToRegistry,
  uploadResultFiles,
} from "./state-reporter.js";
import type {
  InfrastructureFailure,
  NormalizedSpec,
  ResolvedArtifact,
  SpecAgentDeps,
  SpecAgentOptions,
  SpecAgentRequest,
  SpecAgentResult,
  ValidationResult,
} from "./types.js";

export const RAW_OUTPUT_FILE = "llm_raw_output.txt";
export const COMPILE_LOG_FILE = "spec_agent_compile.log";

function resolveOptions(overrides: Partial<SpecAgentOptions> | undefined): SpecAgentOptions {
  return {
    dedupePorts: overrides?.dedupePorts ?? config.specAgent.dedupePorts,
    uploadArtifacts: overrides?.uploadArtifacts ?? config.registry.uploadEnabled,
  };
}

export function defaultWorkflowDir(workflowId: string): string {
  return path.join(config.workflows.rootDir, workflowId);
}

async function generateRaw(generator: GenerationClient, prompt: string, requestId?: string): Promise<string> {
  const startTime = Date.now();
  let text: string;
  try {
    const response = await generator.generate(prompt, { requestId });
    text = response.text;
    emit(TelemetryEvents.GenerationSucceeded, {
      provider: generator.name,
      model: generator.model,
      latency_ms: Date.now() - startTime,
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
    });
  } catch (error) {
    throw new UpstreamGenerationError(errorMessage(error), generator.name, error);
  }

  if (!text.trim()) {
    throw new UpstreamGenerationError("generation returned no text", generator.name);
  }
  return text;
}

/**
 * Write one bookkeeping file; a failure is recorded and the path dropped.
 */
async function writeRecorded(
  filePath: string,
  content: string,
  failures: InfrastructureFailure[]
): Promise<string | undefined> {
  try {
    await writeWorkflowFile(filePath, content);
    return filePath;
  } catch (error) {
    const message = errorMessage(error);
    failures.push({ kind: "artifact_write", path: filePath, message });
    log.error({ path: filePath, error: message }, "Workflow file write failed");
    emit(TelemetryEvents.ArtifactWriteFailed, { file_name: path.basename(filePath) });
    return undefined;
  }
}

export function formatCompileLog(spec: NormalizedSpec, validation: ValidationResult, processedAt: Date): string {
  const lines = [
    `Spec processed at ${processedAt.toISOString()}`,
    `Module: ${specModuleName(spec)}`,
    describeValidation(validation),
  ];
  if (validation.status === "failed_compilation" && validation.diagnostics) {
    lines.push("", validation.diagnostics.trimEnd());
  }
  return lines.join("\n") + "\n";
}

function cleanPorts(artifacts: ResolvedArtifact[]): ResolvedArtifact[] {
  return artifacts.map((artifact) => ({ ...artifact, content: dedupePortDeclarations(artifact.content) }));
}

export async function runSpecAgent(request: SpecAgentRequest, deps: SpecAgentDeps): Promise<SpecAgentResult> {
  const startTime = Date.now();
  const now = deps.now ?? (() => new Date());
  const options = resolveOptions(deps.options);
  const { workflowId } = request;
  const workflowDir = request.workflowDir ?? defaultWorkflowDir(workflowId);

  emit(TelemetryEvents.SpecAgentStarted, { workflow_id: workflowId, provider: deps.generator.name });

  if (!request.spec.trim()) {
    log.warn({ workflow_id: workflowId }, "No specification provided");
    emit(TelemetryEvents.SpecAgentNoSpec, { workflow_id: workflowId });
    return buildEarlyExitResult(workflowId, workflowDir, "no_spec", STATUS_NO_SPEC);
  }

  if (request.resetArtifacts) {
    try {
      await deps.registry.reset(workflowId);
    } catch (error) {
      log.warn({ workflow_id: workflowId, error: errorMessage(error) }, "Artifact reset failed");
      emit(TelemetryEvents.RegistryResetFailed, { registry: deps.registry.name, operation: "reset" });
    }
  }

  let rawText: string;
  try {
    rawText = await generateRaw(deps.generator, buildSpecPrompt(request.spec), request.requestId);
  } catch (error) {
    const message = errorMessage(error);
    log.error({ workflow_id: workflowId, provider: deps.generator.name, error: message }, "Generation failed");
    const cause = error instanceof UpstreamGenerationError ? error.cause : error;
    emit(TelemetryEvents.GenerationFailed, {
      provider: deps.generator.name,
      error_name: cause instanceof Error ? cause.name : "UpstreamGenerationError",
      elapsed_ms: cause instanceof GenerationAdapterError ? cause.elapsedMs : undefined,
    });
    return buildEarlyExitResult(workflowId, workflowDir, "generation_failed", `LLM generation failed: ${message}`);
  }

  const infrastructureErrors: InfrastructureFailure[] = [];

  const rawOutputPath = await writeRecorded(path.join(workflowDir, RAW_OUTPUT_FILE), rawText, infrastructureErrors);

  const { metadataText, codeBlocks } = extractSegments(rawText);
  const spec = normalizeSpec(metadataText);

  const specPath = await writeRecorded(
    safeArtifactPath(workflowDir, specArtifactName(spec)),
    JSON.stringify(serializeNormalizedSpec(spec), null, 2),
    infrastructureErrors
  );

  const resolved = resolveArtifacts(spec, codeBlocks, workflowDir);
  const artifacts = options.dedupePorts ? cleanPorts(resolved) : resolved;

  const emitted = await emitArtifacts(artifacts);
  infrastructureErrors.push(...emitted.failures);

  const validation = await validateDesign(spec, artifacts, emitted.written, deps.syntaxChecker, workflowDir);
  if (validation.infrastructureError) {
    infrastructureErrors.push(validation.infrastructureError);
  }

  const logPath = await writeRecorded(
    path.join(workflowDir, COMPILE_LOG_FILE),
    formatCompileLog(spec, validation.result, now()),
    infrastructureErrors
  );

  const result = buildResult({
    workflowId,
    workflowDir,
    spec,
    specPath,
    artifactPaths: emitted.written,
    logPath,
    rawOutputPath,
    validation: validation.result,
    infrastructureErrors,
  });

  await reportToRegistry(result, deps.registry);
  if (options.uploadArtifacts) {
    await uploadResultFiles(result, deps.registry, request.userId);
  }

  emit(TelemetryEvents.SpecAgentCompleted, {
    workflow_id: workflowId,
    spec_kind: spec.kind,
    validation_status: validation.result.status,
    artifact_count: result.artifact_paths.length,
    infrastructure_error_count: infrastructureErrors.length,
    duration_ms: Date.now() - startTime,
  });
  log.info({ workflow_id: workflowId, status: result.status }, "Completed spec agent run");

  return result;
}
