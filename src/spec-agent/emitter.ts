/**
 * File Emitter
 *
 * Persists resolved artifacts under the workflow directory. Writes happen one
 * at a time, in order; a failed write is recorded for that artifact and the
 * remaining artifacts are still written. Nothing already written is rolled
 * back.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import { InfrastructureError, errorMessage } from "./errors.js";
import type { EmitResult, ResolvedArtifact } from "./types.js";

/**
 * Write a text file, creating parent directories and overwriting any
 * existing file.
 *
 * @throws InfrastructureError when the write fails
 */
export async function writeWorkflowFile(filePath: string, content: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new InfrastructureError(`Failed to write ${path.basename(filePath)}: ${errorMessage(error)}`, filePath, error);
  }
}

export async function emitArtifacts(artifacts: readonly ResolvedArtifact[]): Promise<EmitResult> {
  const result: EmitResult = { written: [], failures: [] };

  for (const artifact of artifacts) {
    try {
      await writeWorkflowFile(artifact.path, artifact.content);
      result.written.push(artifact.path);
      log.info(
        { file_name: artifact.fileName, chars: artifact.content.length, source: artifact.source },
        "Wrote artifact"
      );
    } catch (error) {
      const message = errorMessage(error);
      result.failures.push({ kind: "artifact_write", path: artifact.path, message });
      log.error({ file_name: artifact.fileName, error: message }, "Artifact write failed");
      emit(TelemetryEvents.ArtifactWriteFailed, { file_name: artifact.fileName });
    }
  }

  return result;
}
