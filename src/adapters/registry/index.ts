import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import type { ArtifactRegistry } from "./types.js";
import { InMemoryArtifactRegistry } from "./memory.js";
import { SupabaseArtifactRegistry } from "./supabase.js";

export type { ArtifactRegistry, ArtifactsMap, UploadRequest } from "./types.js";
export { InMemoryArtifactRegistry } from "./memory.js";
export { SupabaseArtifactRegistry } from "./supabase.js";
export { normalizeArtifactsMap, mergeArtifactPath, storagePath } from "./normalize.js";

/**
 * Supabase when credentials are configured, otherwise in-memory.
 */
export function createArtifactRegistry(): ArtifactRegistry {
  const { supabaseUrl, supabaseServiceRoleKey, table, bucket } = config.registry;
  if (supabaseUrl && supabaseServiceRoleKey) {
    return new SupabaseArtifactRegistry({ url: supabaseUrl, serviceRoleKey: supabaseServiceRoleKey, table, bucket });
  }
  log.warn("SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY not set; artifacts are recorded in memory only");
  return new InMemoryArtifactRegistry();
}
