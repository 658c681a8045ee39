import path from "node:path";
import type { ArtifactsMap, UploadRequest } from "./types.js";

/**
 * Coerce whatever the `artifacts` column holds into `{ key: path[] }`.
 *
 * Scalar values become one-element lists; null values and empty entries are
 * dropped; anything that is not an object resets to `{}`.
 */
export function normalizeArtifactsMap(raw: unknown): ArtifactsMap {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const fixed: ArtifactsMap = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    fixed[key] = Array.isArray(value)
      ? value.filter((entry) => Boolean(entry)).map((entry) => String(entry))
      : [String(value)];
  }
  return fixed;
}

/**
 * Merge one path into the map without duplicating it under its key.
 * Returns the same map when nothing changes.
 */
export function mergeArtifactPath(artifacts: ArtifactsMap, key: string, artifactPath: string): ArtifactsMap {
  const current = artifacts[key] ?? [];
  if (current.includes(artifactPath)) {
    return artifacts;
  }
  return { ...artifacts, [key]: [...current, artifactPath] };
}

export function storagePath(request: UploadRequest): string {
  const userSegment = request.userId || "anonymous";
  return `${userSegment}/workflows/${request.workflowId}/${request.agentLabel}/${path.basename(request.localPath)}`;
}
