/**
 * Supabase artifact registry tests
 *
 * The Supabase client is replaced by an in-process table stand-in that
 * supports the query chains the registry uses.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, vi } from "vitest";

const fake = vi.hoisted(() => {
  const rows = new Map<string, Record<string, unknown>>();
  const uploads: Array<{ bucket: string; path: string; options: unknown }> = [];
  const state: { readError: { message: string } | null; writeError: { message: string } | null } = {
    readError: null,
    writeError: null,
  };
  const updates = vi.fn();

  function table(name: string) {
    return {
      select: (_columns: string) => ({
        eq: (_column: string, id: string) => ({
          maybeSingle: async () => ({ data: rows.get(`${name}:${id}`) ?? null, error: state.readError }),
        }),
      }),
      update: (values: Record<string, unknown>) => ({
        eq: async (_column: string, id: string) => {
          updates(name, id, values);
          if (state.writeError) {
            return { error: state.writeError };
          }
          rows.set(`${name}:${id}`, { ...rows.get(`${name}:${id}`), ...values });
          return { error: null };
        },
      }),
    };
  }

  const client = {
    from: table,
    storage: {
      from: (bucket: string) => ({
        upload: async (objectPath: string, _body: unknown, options: unknown) => {
          uploads.push({ bucket, path: objectPath, options });
          return { data: { path: objectPath }, error: null };
        },
      }),
    },
  };

  return { rows, uploads, state, updates, client };
});

vi.mock("@supabase/supabase-js", () => ({
  createClient: vi.fn(() => fake.client),
}));

import { SupabaseArtifactRegistry } from "../../src/adapters/registry/supabase.js";

const CONFIG = {
  url: "https://registry.test",
  serviceRoleKey: "test-secret",
  table: "workflows",
  bucket: "artifacts",
};

describe("SupabaseArtifactRegistry", () => {
  beforeEach(() => {
    fake.rows.clear();
    fake.uploads.length = 0;
    fake.state.readError = null;
    fake.state.writeError = null;
    fake.updates.mockClear();
  });

  it("merges a new path into the existing artifacts column", async () => {
    fake.rows.set("workflows:wf-1", { artifacts: { spec_agent_output: ["a.v"] } });
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await registry.append("wf-1", "spec_agent_output", "b.v");
    await registry.append("wf-1", "spec_agent_log", "run.log");

    expect(fake.rows.get("workflows:wf-1")).toEqual({
      artifacts: { spec_agent_output: ["a.v", "b.v"], spec_agent_log: ["run.log"] },
    });
  });

  it("does not write when the path is already recorded", async () => {
    fake.rows.set("workflows:wf-1", { artifacts: { spec_agent_output: ["a.v"] } });
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await registry.append("wf-1", "spec_agent_output", "a.v");

    expect(fake.updates).not.toHaveBeenCalled();
  });

  it("repairs a malformed column before merging", async () => {
    fake.rows.set("workflows:wf-1", { artifacts: { spec_agent_output: "a.v", stale: null } });
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await registry.append("wf-1", "spec_agent_output", "b.v");

    expect(fake.updates).toHaveBeenCalledWith("workflows", "wf-1", {
      artifacts: { spec_agent_output: ["a.v", "b.v"] },
    });
  });

  it("starts from an empty map when the row has no artifacts", async () => {
    fake.rows.set("workflows:wf-2", { artifacts: null });
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await registry.append("wf-2", "spec_agent_report", "spec.json");

    expect(fake.updates).toHaveBeenCalledWith("workflows", "wf-2", {
      artifacts: { spec_agent_report: ["spec.json"] },
    });
  });

  it("throws when the read fails", async () => {
    fake.state.readError = { message: "connection refused" };
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await expect(registry.append("wf-1", "spec_agent_output", "a.v")).rejects.toThrow(
      "Failed to read artifacts for wf-1: connection refused"
    );
  });

  it("throws without writing when the workflow row does not exist", async () => {
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await expect(registry.append("wf-missing", "spec_agent_output", "a.v")).rejects.toThrow(
      "Failed to record artifact for wf-missing: no row in workflows"
    );
    expect(fake.updates).not.toHaveBeenCalled();
  });

  it("throws when the write fails", async () => {
    fake.rows.set("workflows:wf-1", { artifacts: {} });
    fake.state.writeError = { message: "permission denied" };
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await expect(registry.append("wf-1", "spec_agent_output", "a.v")).rejects.toThrow(
      "Failed to record artifact for wf-1: permission denied"
    );
  });

  it("resets the artifacts column to an empty object", async () => {
    fake.rows.set("workflows:wf-1", { artifacts: { spec_agent_output: ["a.v"] } });
    const registry = new SupabaseArtifactRegistry(CONFIG);

    await registry.reset("wf-1");

    expect(fake.rows.get("workflows:wf-1")).toEqual({ artifacts: {} });
  });

  it("uploads to the bucket under the user and agent label", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "supabase-upload-"));
    try {
      const localPath = path.join(dir, "alu.v");
      await writeFile(localPath, "module alu; endmodule");
      const registry = new SupabaseArtifactRegistry(CONFIG);

      const stored = await registry.upload({ localPath, workflowId: "wf-1", agentLabel: "spec_agent" });

      expect(stored).toBe("anonymous/workflows/wf-1/spec_agent/alu.v");
      expect(fake.uploads).toEqual([
        {
          bucket: "artifacts",
          path: "anonymous/workflows/wf-1/spec_agent/alu.v",
          options: { cacheControl: "3600", upsert: true },
        },
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
