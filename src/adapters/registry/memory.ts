import { readFile } from "node:fs/promises";
import type { ArtifactRegistry, ArtifactsMap, UploadRequest } from "./types.js";
import { mergeArtifactPath, storagePath } from "./normalize.js";

/**
 * In-process registry for local runs and tests.
 */
export class InMemoryArtifactRegistry implements ArtifactRegistry {
  readonly name = "memory" as const;
  private readonly workflows = new Map<string, ArtifactsMap>();
  private readonly objects = new Map<string, Buffer>();

  async append(workflowId: string, key: string, artifactPath: string): Promise<void> {
    const current = this.workflows.get(workflowId) ?? {};
    this.workflows.set(workflowId, mergeArtifactPath(current, key, artifactPath));
  }

  async reset(workflowId: string): Promise<void> {
    this.workflows.set(workflowId, {});
  }

  async upload(request: UploadRequest): Promise<string> {
    const target = storagePath(request);
    this.objects.set(target, await readFile(request.localPath));
    return target;
  }

  artifacts(workflowId: string): ArtifactsMap {
    return this.workflows.get(workflowId) ?? {};
  }

  uploaded(): string[] {
    return [...this.objects.keys()];
  }
}
