/**
 * Supabase Artifact Registry
 *
 * Requires table:
 * - workflows: id, artifacts (jsonb `{ key: path[] }`)
 *
 * Appends are a read-merge-write on an existing row with no locking; two runs
 * for the same workflow can overwrite each other's additions. A missing row
 * is an error, not an implicit insert.
 */

import { readFile } from "node:fs/promises";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { log } from "../../utils/telemetry.js";
import type { ArtifactRegistry, UploadRequest } from "./types.js";
import { mergeArtifactPath, normalizeArtifactsMap, storagePath } from "./normalize.js";

export interface SupabaseRegistryConfig {
  url: string;
  serviceRoleKey: string;
  table: string;
  bucket: string;
}

export class SupabaseArtifactRegistry implements ArtifactRegistry {
  readonly name = "supabase" as const;
  private readonly client: SupabaseClient;

  constructor(private readonly config: SupabaseRegistryConfig) {
    this.client = createClient(config.url, config.serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  async append(workflowId: string, key: string, artifactPath: string): Promise<void> {
    const { data, error: readError } = await this.client
      .from(this.config.table)
      .select("artifacts")
      .eq("id", workflowId)
      .maybeSingle();

    if (readError) {
      throw new Error(`Failed to read artifacts for ${workflowId}: ${readError.message}`);
    }
    if (data === null) {
      throw new Error(`Failed to record artifact for ${workflowId}: no row in ${this.config.table}`);
    }

    const existing = normalizeArtifactsMap(data.artifacts);
    const merged = mergeArtifactPath(existing, key, artifactPath);
    if (merged === existing) {
      log.debug({ workflow_id: workflowId, key, path: artifactPath }, "Artifact already recorded");
      return;
    }

    const { error: writeError } = await this.client
      .from(this.config.table)
      .update({ artifacts: merged })
      .eq("id", workflowId);

    if (writeError) {
      throw new Error(`Failed to record artifact for ${workflowId}: ${writeError.message}`);
    }

    log.info({ workflow_id: workflowId, key, path: artifactPath }, "Recorded artifact");
  }

  async reset(workflowId: string): Promise<void> {
    log.info({ workflow_id: workflowId }, "Resetting workflow artifacts");
    const { error } = await this.client
      .from(this.config.table)
      .update({ artifacts: {} })
      .eq("id", workflowId);

    if (error) {
      throw new Error(`Failed to reset artifacts for ${workflowId}: ${error.message}`);
    }
  }

  async upload(request: UploadRequest): Promise<string> {
    const target = storagePath(request);
    const body = await readFile(request.localPath);

    log.info({ local_path: request.localPath, bucket: this.config.bucket, path: target }, "Uploading artifact");
    const { error } = await this.client.storage.from(this.config.bucket).upload(target, body, {
      cacheControl: "3600",
      upsert: true,
    });

    if (error) {
      throw new Error(`Failed to upload ${target}: ${error.message}`);
    }
    return target;
  }
}
