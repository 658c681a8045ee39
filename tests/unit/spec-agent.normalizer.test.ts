import { describe, it, expect, afterEach } from "vitest";
import {
  normalizeSpec,
  serializeNormalizedSpec,
  specArtifactName,
  toModuleSpec,
} from "../../src/spec-agent/normalizer.js";
import type { NormalizedSpec } from "../../src/spec-agent/types.js";
import { setTestSink, TelemetryEvents } from "../../src/utils/telemetry.js";

function moduleNames(spec: NormalizedSpec): { modules: string[]; top: string } {
  if (spec.kind !== "hierarchical") {
    throw new Error(`expected hierarchical spec, got ${spec.kind}`);
  }
  return {
    modules: spec.hierarchy.modules.map((module) => module.name),
    top: spec.hierarchy.topModule.name,
  };
}

describe("normalizeSpec", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("parses a plain module object as flat", () => {
    expect(normalizeSpec('{"name":"alu"}')).toEqual({
      kind: "flat",
      module: { name: "alu", fields: { name: "alu" } },
    });
  });

  it("flattens a hierarchy with only a top module (rule A)", () => {
    const spec = normalizeSpec('{"hierarchy":{"modules":[],"top_module":{"name":"x"}}}');

    expect(spec.kind).toBe("flat");
    if (spec.kind === "flat") {
      expect(spec.module.name).toBe("x");
      expect(spec.flattenedBy).toBe("top_only");
    }
  });

  it("flattens a top module that repeats the only submodule (rule B)", () => {
    const spec = normalizeSpec('{"hierarchy":{"modules":[{"name":"x"}],"top_module":{"name":"x"}}}');

    expect(spec.kind).toBe("flat");
    if (spec.kind === "flat") {
      expect(spec.module.name).toBe("x");
      expect(spec.flattenedBy).toBe("single_or_redundant");
    }
  });

  it("flattens a lone submodule without a top module", () => {
    const spec = normalizeSpec('{"hierarchy":{"modules":[{"module_name":"m"}]}}');

    expect(spec).toEqual({
      kind: "flat",
      module: { name: "m", fields: { module_name: "m", name: "m" } },
      flattenedBy: "single_or_redundant",
    });
  });

  it("keeps a distinct top module over one submodule as a hierarchy", () => {
    const spec = normalizeSpec('{"hierarchy":{"modules":[{"name":"x"}],"top_module":{"name":"y"}}}');

    expect(moduleNames(spec)).toEqual({ modules: ["x"], top: "y" });
  });

  it("compares module_name and design_name when matching the top module (rule B)", () => {
    const spec = normalizeSpec(
      '{"hierarchy":{"modules":[{"design_name":"fifo"},{"name":"ctrl"}],"top_module":{"module_name":"fifo"}}}'
    );

    expect(spec).toEqual({
      kind: "flat",
      module: { name: "fifo", fields: { design_name: "fifo", name: "fifo" } },
      flattenedBy: "single_or_redundant",
    });
  });

  it("keeps a top module named by design_name that differs from its submodule", () => {
    const spec = normalizeSpec('{"hierarchy":{"modules":[{"module_name":"uart"}],"top_module":{"design_name":"soc"}}}');

    expect(moduleNames(spec)).toEqual({ modules: ["uart"], top: "soc" });
  });

  it("promotes the last module when top_module is missing", () => {
    const spec = normalizeSpec('{"design_name":"soc","hierarchy":{"modules":[{"name":"a"},{"name":"b"}]}}');

    expect(moduleNames(spec)).toEqual({ modules: ["a"], top: "b" });
  });

  it("treats an empty hierarchy object as a flat root", () => {
    expect(normalizeSpec('{"name":"solo","hierarchy":{}}')).toEqual({
      kind: "flat",
      module: { name: "solo", fields: { name: "solo" } },
    });
  });

  it("reports invalid JSON as a parse failure carrying the text", () => {
    const spec = normalizeSpec("not json at all");

    expect(spec.kind).toBe("parse_failure");
    if (spec.kind === "parse_failure") {
      expect(spec.rawText).toBe("not json at all");
    }
  });

  it("reports a JSON array as a parse failure", () => {
    expect(normalizeSpec("[1,2]")).toEqual({
      kind: "parse_failure",
      rawText: "[1,2]",
      reason: "Expected a JSON object, got array",
    });
  });

  it("emits a flatten event with the rule", () => {
    const events: string[] = [];
    setTestSink((name, data) => events.push(`${name}:${String(data.rule)}`));

    normalizeSpec('{"hierarchy":{"modules":[],"top_module":{"name":"x"}}}');

    expect(events).toEqual([`${TelemetryEvents.SpecFlattened}:top_only`]);
  });

  it("returns structurally identical results for identical text", () => {
    const text = '{"design_name":"soc","hierarchy":{"modules":[{"name":"a"}],"top_module":{"name":"soc"}}}';
    expect(normalizeSpec(text)).toEqual(normalizeSpec(text));
  });
});

describe("toModuleSpec", () => {
  it("takes the first present of name, module_name and design_name", () => {
    expect(toModuleSpec({ module_name: "mod", design_name: "des" }).name).toBe("mod");
    expect(toModuleSpec({ design_name: "des" }).name).toBe("des");
    expect(toModuleSpec({ description: "nameless" }).name).toBe("auto_module");
  });

  it("reads inline code from inline_code before rtl_code", () => {
    expect(toModuleSpec({ name: "a", rtl_code: "module a; endmodule" }).inlineCode).toBe("module a; endmodule");
    expect(toModuleSpec({ name: "a", inline_code: "inline", rtl_code: "rtl" }).inlineCode).toBe("inline");
  });

  it("trims rtl_output_file", () => {
    expect(toModuleSpec({ name: "a", rtl_output_file: " rtl/a.v " }).rtlOutputFile).toBe("rtl/a.v");
  });
});

describe("serializeNormalizedSpec", () => {
  it("writes a flat module as its own fields", () => {
    const spec = normalizeSpec('{"name":"alu","ports":[]}');

    expect(serializeNormalizedSpec(spec)).toEqual({ name: "alu", ports: [] });
    expect(specArtifactName(spec)).toBe("alu_spec.json");
  });

  it("writes a hierarchy back under the root fields", () => {
    const spec = normalizeSpec('{"design_name":"soc","hierarchy":{"modules":[{"name":"x"}],"top_module":{"name":"y"}}}');

    expect(serializeNormalizedSpec(spec)).toEqual({
      design_name: "soc",
      hierarchy: { modules: [{ name: "x" }], top_module: { name: "y" } },
    });
    expect(specArtifactName(spec)).toBe("soc_spec.json");
  });

  it("writes the placeholder for a parse failure", () => {
    const spec = normalizeSpec("oops");

    expect(serializeNormalizedSpec(spec)).toEqual({ description: "LLM JSON parse failed", raw: "oops" });
    expect(specArtifactName(spec)).toBe("auto_module_spec.json");
  });
});
