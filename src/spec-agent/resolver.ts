/**
 * Artifact Resolver
 *
 * Maps every module of a NormalizedSpec to exactly one output file and picks
 * its content from the candidate sources. A miss at one priority level falls
 * through to the next; the last level is the empty string, so resolution
 * never fails.
 *
 * Priorities:
 * - hierarchical module: inline code → block named after the file → ""
 * - flat module: block named `<name>.v` → `default.v` block (else the first
 *   block) → inline code → ""
 */

import path from "node:path";
import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import {
  AUTO_MODULE_NAME,
  DEFAULT_BLOCK_KEY,
  type ContentSource,
  type ModuleSpec,
  type NormalizedSpec,
  type ResolvedArtifact,
} from "./types.js";

interface ContentChoice {
  content: string;
  source: ContentSource;
}

const EMPTY: ContentChoice = { content: "", source: "empty" };

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Keep output files inside the workflow directory: a file name that would
 * escape it is reduced to its base name, or to `auto_module.v` when that
 * base name is itself a directory reference.
 */
export function safeArtifactPath(workflowDir: string, fileName: string): string {
  const root = path.resolve(workflowDir);
  const candidate = path.resolve(root, fileName);
  if (candidate === root || !candidate.startsWith(root + path.sep)) {
    const base = path.basename(fileName);
    const fallback = base === "" || base === "." || base === ".." ? `${AUTO_MODULE_NAME}.v` : base;
    log.warn({ file_name: fileName, fallback }, "Output file name escapes workflow directory");
    return path.join(workflowDir, fallback);
  }
  return path.join(workflowDir, path.relative(root, candidate));
}

export function hierarchicalFileName(module: ModuleSpec): string {
  return module.rtlOutputFile ?? `${module.name}.v`;
}

export function resolveHierarchicalContent(module: ModuleSpec, codeBlocks: ReadonlyMap<string, string>): ContentChoice {
  const inline = nonEmpty(module.inlineCode);
  if (inline !== undefined) {
    return { content: inline, source: "inline" };
  }

  const named = codeBlocks.get(hierarchicalFileName(module));
  if (named !== undefined) {
    return { content: named.trim(), source: "named_block" };
  }

  return EMPTY;
}

export function resolveFlatContent(
  fileName: string,
  inlineCode: string | undefined,
  codeBlocks: ReadonlyMap<string, string>,
): ContentChoice {
  const named = codeBlocks.get(fileName);
  if (named !== undefined) {
    return { content: named.trim(), source: "named_block" };
  }

  const fallback = codeBlocks.get(DEFAULT_BLOCK_KEY);
  if (fallback !== undefined) {
    return { content: fallback.trim(), source: "default_block" };
  }

  const first = codeBlocks.values().next();
  if (!first.done) {
    return { content: first.value.trim(), source: "first_block" };
  }

  const inline = nonEmpty(inlineCode);
  if (inline !== undefined) {
    return { content: inline, source: "inline" };
  }

  return EMPTY;
}

function toArtifact(workflowDir: string, fileName: string, owningModuleName: string, choice: ContentChoice): ResolvedArtifact {
  return {
    path: safeArtifactPath(workflowDir, fileName),
    fileName,
    content: choice.content,
    owningModuleName,
    source: choice.source,
  };
}

function resolveByKind(
  spec: NormalizedSpec,
  codeBlocks: ReadonlyMap<string, string>,
  workflowDir: string,
): ResolvedArtifact[] {
  switch (spec.kind) {
    case "hierarchical": {
      const { modules, topModule } = spec.hierarchy;
      return [...modules, topModule].map((module) =>
        toArtifact(
          workflowDir,
          hierarchicalFileName(module),
          module.name,
          resolveHierarchicalContent(module, codeBlocks),
        ),
      );
    }
    case "flat": {
      const fileName = `${spec.module.name}.v`;
      return [
        toArtifact(
          workflowDir,
          fileName,
          spec.module.name,
          resolveFlatContent(fileName, spec.module.inlineCode, codeBlocks),
        ),
      ];
    }
    case "parse_failure": {
      const fileName = `${AUTO_MODULE_NAME}.v`;
      return [
        toArtifact(workflowDir, fileName, AUTO_MODULE_NAME, resolveFlatContent(fileName, undefined, codeBlocks)),
      ];
    }
  }
}

/**
 * Resolve the ordered artifact list for a spec.
 *
 * Hierarchical designs list submodules in their given order, top module last.
 */
export function resolveArtifacts(
  spec: NormalizedSpec,
  codeBlocks: ReadonlyMap<string, string>,
  workflowDir: string,
): ResolvedArtifact[] {
  const artifacts = resolveByKind(spec, codeBlocks, workflowDir);

  emit(TelemetryEvents.ArtifactsResolved, {
    spec_kind: spec.kind,
    artifact_count: artifacts.length,
    empty_count: artifacts.filter((artifact) => artifact.source === "empty").length,
    sources: artifacts.map((artifact) => artifact.source),
  });

  return artifacts;
}
