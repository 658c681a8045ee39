import { describe, it, expect } from "vitest";
import { mergeArtifactPath, normalizeArtifactsMap, storagePath } from "../../src/adapters/registry/normalize.js";
import { InMemoryArtifactRegistry } from "../../src/adapters/registry/memory.js";

describe("normalizeArtifactsMap", () => {
  it("returns an empty map for missing or non-object values", () => {
    expect(normalizeArtifactsMap(null)).toEqual({});
    expect(normalizeArtifactsMap(undefined)).toEqual({});
    expect(normalizeArtifactsMap("a.v")).toEqual({});
    expect(normalizeArtifactsMap(["a.v"])).toEqual({});
  });

  it("wraps scalars, drops nulls and empty entries", () => {
    expect(
      normalizeArtifactsMap({
        spec_agent_output: ["a.v", "", null, "b.v"],
        spec_agent_log: "run.log",
        stale: null,
        count: 3,
      })
    ).toEqual({
      spec_agent_output: ["a.v", "b.v"],
      spec_agent_log: ["run.log"],
      count: ["3"],
    });
  });
});

describe("mergeArtifactPath", () => {
  it("appends a new path without mutating the input", () => {
    const original = { spec_agent_output: ["a.v"] };

    expect(mergeArtifactPath(original, "spec_agent_output", "b.v")).toEqual({ spec_agent_output: ["a.v", "b.v"] });
    expect(original).toEqual({ spec_agent_output: ["a.v"] });
  });

  it("returns the same map for a duplicate path", () => {
    const original = { spec_agent_output: ["a.v"] };
    expect(mergeArtifactPath(original, "spec_agent_output", "a.v")).toBe(original);
  });
});

describe("storagePath", () => {
  it("falls back to anonymous and keeps only the file name", () => {
    expect(storagePath({ localPath: "/tmp/wf/alu.v", workflowId: "wf", agentLabel: "spec_agent" })).toBe(
      "anonymous/workflows/wf/spec_agent/alu.v"
    );
    expect(storagePath({ localPath: "alu.v", userId: "u1", workflowId: "wf", agentLabel: "spec_agent" })).toBe(
      "u1/workflows/wf/spec_agent/alu.v"
    );
  });
});

describe("InMemoryArtifactRegistry", () => {
  it("de-duplicates per key and resets per workflow", async () => {
    const registry = new InMemoryArtifactRegistry();

    await registry.append("wf-1", "spec_agent_output", "a.v");
    await registry.append("wf-1", "spec_agent_output", "a.v");
    await registry.append("wf-1", "spec_agent_report", "a.v");
    await registry.append("wf-2", "spec_agent_output", "z.v");

    expect(registry.artifacts("wf-1")).toEqual({ spec_agent_output: ["a.v"], spec_agent_report: ["a.v"] });

    await registry.reset("wf-1");

    expect(registry.artifacts("wf-1")).toEqual({});
    expect(registry.artifacts("wf-2")).toEqual({ spec_agent_output: ["z.v"] });
  });
});
