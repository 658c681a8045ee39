/**
 * Spec Normalizer
 *
 * Parses the metadata segment into a NormalizedSpec. The generation backend
 * sometimes wraps a single intended module in a hierarchy object; those
 * wrappers are collapsed so resolution always sees the simplest equivalent
 * shape. Pure: the same text always yields the same spec.
 */

import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import {
  AUTO_MODULE_NAME,
  type FlattenRule,
  type JsonObject,
  type JsonValue,
  type ModuleSpec,
  type NormalizedSpec,
} from "./types.js";

const NAME_FIELDS = ["name", "module_name", "design_name"] as const;
const INLINE_CODE_FIELDS = ["inline_code", "rtl_code"] as const;

export const PARSE_FAILURE_DESCRIPTION = "LLM JSON parse failed";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(fields: JsonObject, key: string): string | undefined {
  const value = fields[key];
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

/**
 * First non-empty of name / module_name / design_name, or undefined.
 */
export function declaredName(fields: JsonObject): string | undefined {
  for (const key of NAME_FIELDS) {
    const value = readString(fields, key);
    if (value) return value.trim();
  }
  return undefined;
}

export function toModuleSpec(fields: JsonObject): ModuleSpec {
  const name = declaredName(fields) ?? AUTO_MODULE_NAME;
  const inlineCode = INLINE_CODE_FIELDS.map((key) => readString(fields, key)).find(
    (value) => value !== undefined,
  );

  const spec: ModuleSpec = {
    name,
    fields: { ...fields, name },
  };

  const description = readString(fields, "description");
  if (description !== undefined) spec.description = description;
  if (fields.ports !== undefined) spec.ports = fields.ports;
  if (fields.functionality !== undefined) spec.functionality = fields.functionality;
  const rtlOutputFile = readString(fields, "rtl_output_file");
  if (rtlOutputFile !== undefined) spec.rtlOutputFile = rtlOutputFile.trim();
  if (inlineCode !== undefined) spec.inlineCode = inlineCode;

  return spec;
}

function flat(fields: JsonObject, flattenedBy?: FlattenRule): NormalizedSpec {
  if (flattenedBy) {
    log.info({ rule: flattenedBy }, "Auto-flattening degenerate hierarchy");
    emit(TelemetryEvents.SpecFlattened, { rule: flattenedBy });
    return { kind: "flat", module: toModuleSpec(fields), flattenedBy };
  }
  return { kind: "flat", module: toModuleSpec(fields) };
}

function withoutHierarchy(root: JsonObject): JsonObject {
  const { hierarchy: _hierarchy, ...rest } = root;
  return rest;
}

/**
 * Apply the flatten rules to a parsed metadata object.
 */
export function normalizeParsedSpec(root: JsonObject): NormalizedSpec {
  const hierarchy: JsonValue | undefined = root.hierarchy;
  if (!isJsonObject(hierarchy)) {
    return flat(root);
  }

  const rawModules = hierarchy.modules;
  const modules = Array.isArray(rawModules) ? rawModules.filter(isJsonObject) : [];
  const rawTop = hierarchy.top_module;
  const top = isJsonObject(rawTop) && Object.keys(rawTop).length > 0 ? rawTop : undefined;

  // Rule A: nothing but a top module
  if (modules.length === 0 && top) {
    return flat(top, "top_only");
  }

  // Rule B: a lone submodule with no distinct top, or a top module that
  // repeats the first submodule. A different top wrapping one submodule is a
  // real hierarchy.
  const topName = top ? declaredName(top) : undefined;
  const firstName = modules.length > 0 ? declaredName(modules[0]) : undefined;
  const loneModule = modules.length === 1 && !top;
  const redundantTop = topName !== undefined && topName === firstName;
  if (loneModule || redundantTop) {
    return flat(modules[0], "single_or_redundant");
  }

  if (modules.length === 0) {
    log.warn("Hierarchy has neither modules nor a top module; treating root as a flat module");
    return flat(withoutHierarchy(root));
  }

  const subModules = top ? modules : modules.slice(0, -1);
  const topModule = top ?? modules[modules.length - 1];
  if (!top) {
    log.warn({ promoted: declaredName(topModule) ?? AUTO_MODULE_NAME }, "Hierarchy has no top_module; promoting last module");
  }

  return {
    kind: "hierarchical",
    hierarchy: {
      designName: declaredName(root) ?? AUTO_MODULE_NAME,
      modules: subModules.map(toModuleSpec),
      topModule: toModuleSpec(topModule),
      root: withoutHierarchy(root),
    },
  };
}

/**
 * Parse the metadata segment into a NormalizedSpec.
 *
 * Unparseable text is not an error: it becomes a `parse_failure` variant
 * carrying the raw text.
 */
export function normalizeSpec(metadataText: string): NormalizedSpec {
  let parsed: unknown;
  try {
    parsed = JSON.parse(metadataText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log.warn({ reason, metadata_chars: metadataText.length }, "Metadata JSON parse failed");
    emit(TelemetryEvents.SpecParseFailed, { reason: "invalid_json" });
    return { kind: "parse_failure", rawText: metadataText, reason };
  }

  if (!isJsonObject(parsed)) {
    const reason = `Expected a JSON object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`;
    log.warn({ reason }, "Metadata is not a JSON object");
    emit(TelemetryEvents.SpecParseFailed, { reason: "not_an_object" });
    return { kind: "parse_failure", rawText: metadataText, reason };
  }

  return normalizeParsedSpec(parsed);
}

/**
 * Name used for the `<name>_spec.json` artifact.
 */
export function specModuleName(spec: NormalizedSpec): string {
  switch (spec.kind) {
    case "flat":
      return spec.module.name;
    case "hierarchical":
      return spec.hierarchy.designName;
    case "parse_failure":
      return AUTO_MODULE_NAME;
  }
}

export function specArtifactName(spec: NormalizedSpec): string {
  return `${specModuleName(spec)}_spec.json`;
}

/**
 * JSON form persisted next to the generated files.
 */
export function serializeNormalizedSpec(spec: NormalizedSpec): JsonObject {
  switch (spec.kind) {
    case "flat":
      return spec.module.fields;
    case "hierarchical": {
      const { hierarchy } = spec;
      return {
        ...hierarchy.root,
        hierarchy: {
          modules: hierarchy.modules.map((module) => module.fields),
          top_module: hierarchy.topModule.fields,
        },
      };
    }
    case "parse_failure":
      return { description: PARSE_FAILURE_DESCRIPTION, raw: spec.rawText };
  }
}
