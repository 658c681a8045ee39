/**
 * Spec agent data model
 *
 * One run turns a block of generated text into a normalized design spec,
 * one Verilog file per module, a compile log and a result record.
 */

import type { GenerationClient } from "../adapters/llm/types.js";
import type { SyntaxChecker } from "../adapters/syntax-check/types.js";
import type { ArtifactRegistry } from "../adapters/registry/types.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/** Filename under which the generic `VERILOG` block is stored */
export const DEFAULT_BLOCK_KEY = "default.v";

/** Name given to a module that declares none of name / module_name / design_name */
export const AUTO_MODULE_NAME = "auto_module";

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractedSegments {
  /** Text before the first begin marker, trimmed */
  metadataText: string;
  /** filename → trimmed code; insertion order is the order of appearance */
  codeBlocks: Map<string, string>;
}

// ============================================================================
// Normalization
// ============================================================================

export interface ModuleSpec {
  name: string;
  description?: string;
  ports?: JsonValue;
  functionality?: JsonValue;
  rtlOutputFile?: string;
  /** From `inline_code` or `rtl_code` */
  inlineCode?: string;
  /** The module object as the backend sent it, with the canonical `name` applied */
  fields: JsonObject;
}

export interface HierarchySpec {
  designName: string;
  modules: ModuleSpec[];
  topModule: ModuleSpec;
  /** Root metadata object, `hierarchy` excluded */
  root: JsonObject;
}

/**
 * Which flatten rule collapsed a hierarchy wrapper.
 * - top_only: no submodules, only a top module
 * - single_or_redundant: one submodule and no top, or a top that repeats the first submodule
 */
export type FlattenRule = "top_only" | "single_or_redundant";

export type NormalizedSpec =
  | { kind: "flat"; module: ModuleSpec; flattenedBy?: FlattenRule }
  | { kind: "hierarchical"; hierarchy: HierarchySpec }
  | { kind: "parse_failure"; rawText: string; reason: string };

export type SpecKind = NormalizedSpec["kind"];

// ============================================================================
// Resolution and emission
// ============================================================================

/** Where a resolved artifact's content came from */
export type ContentSource = "inline" | "named_block" | "default_block" | "first_block" | "empty";

export interface ResolvedArtifact {
  path: string;
  fileName: string;
  content: string;
  owningModuleName: string;
  source: ContentSource;
}

export interface InfrastructureFailure {
  kind: "artifact_write" | "syntax_checker";
  path?: string;
  message: string;
}

export interface EmitResult {
  written: string[];
  failures: InfrastructureFailure[];
}

// ============================================================================
// Validation
// ============================================================================

export type ValidationResult =
  | { status: "passed" }
  | { status: "skipped"; reason: string }
  | { status: "failed_compilation"; diagnostics: string };

export interface ValidationOutcome {
  result: ValidationResult;
  /** Set when the checker itself could not run; never a design failure */
  infrastructureError?: InfrastructureFailure;
}

// ============================================================================
// Pipeline I/O
// ============================================================================

export interface SpecAgentRequest {
  workflowId: string;
  /** Free-text design request from the user */
  spec: string;
  /** Defaults to `<WORKFLOWS_ROOT>/<workflowId>` */
  workflowDir?: string;
  userId?: string;
  resetArtifacts?: boolean;
  requestId?: string;
}

export interface SpecAgentOptions {
  dedupePorts: boolean;
  uploadArtifacts: boolean;
}

/**
 * Collaborators for one pipeline run, built once by the caller.
 */
export interface SpecAgentDeps {
  generator: GenerationClient;
  syntaxChecker: SyntaxChecker;
  registry: ArtifactRegistry;
  options?: Partial<SpecAgentOptions>;
  now?: () => Date;
}

export type SpecAgentOutcome = "completed" | "no_spec" | "generation_failed";

export interface SpecAgentResult {
  workflow_id: string;
  workflow_dir: string;
  outcome: SpecAgentOutcome;
  /** Human-readable summary */
  status: string;
  spec_kind?: SpecKind;
  hierarchical: boolean;
  spec_path?: string;
  artifact_paths: string[];
  primary_artifact?: string;
  log_path?: string;
  raw_output_path?: string;
  validation?: ValidationResult;
  infrastructure_errors: InfrastructureFailure[];
}
