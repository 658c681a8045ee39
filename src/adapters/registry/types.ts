/**
 * Workflow artifact registry.
 *
 * Records which files a workflow produced, keyed by a logical name such as
 * `spec_agent_output`. Appends are de-duplicated by path per key.
 */

export type ArtifactsMap = Record<string, string[]>;

export interface UploadRequest {
  localPath: string;
  /** Missing user ids land under `anonymous/` */
  userId?: string;
  workflowId: string;
  agentLabel: string;
}

export interface ArtifactRegistry {
  readonly name: string;
  append(workflowId: string, key: string, path: string): Promise<void>;
  reset(workflowId: string): Promise<void>;
  /**
   * Upload a local file to object storage.
   * @returns the storage path the frontend can sign
   */
  upload(request: UploadRequest): Promise<string>;
}
