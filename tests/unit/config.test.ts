import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getConfig, _resetConfigCache } from "../../src/config/index.js";

const KEYS = [
  "PORT",
  "LLM_PROVIDER",
  "WORKFLOWS_ROOT",
  "IVERILOG_PATH",
  "REGISTRY_TABLE",
  "REGISTRY_BUCKET",
  "REGISTRY_UPLOAD_ENABLED",
  "SPEC_AGENT_DEDUPE_PORTS",
  "SUPABASE_URL",
  "OPENAI_BASE_URL",
] as const;

describe("config", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    _resetConfigCache();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    _resetConfigCache();
  });

  it("applies defaults", () => {
    const config = getConfig();

    expect(config.server.port).toBe(3101);
    expect(config.llm.provider).toBe("openai");
    expect(config.workflows.rootDir).toBe("backend/workflows");
    expect(config.syntaxCheck).toEqual({ iverilogPath: "/usr/bin/iverilog", outputFile: "design.out" });
    expect(config.registry.table).toBe("workflows");
    expect(config.registry.bucket).toBe("artifacts");
    expect(config.registry.uploadEnabled).toBe(false);
    expect(config.specAgent.dedupePorts).toBe(false);
  });

  it("coerces numbers and boolean strings", () => {
    process.env.PORT = "8080";
    process.env.SPEC_AGENT_DEDUPE_PORTS = "true";
    process.env.REGISTRY_UPLOAD_ENABLED = "0";

    const config = getConfig();

    expect(config.server.port).toBe(8080);
    expect(config.specAgent.dedupePorts).toBe(true);
    expect(config.registry.uploadEnabled).toBe(false);
  });

  it("treats an invalid URL as unset under test", () => {
    process.env.SUPABASE_URL = "not a url";

    expect(getConfig().registry.supabaseUrl).toBeUndefined();
  });

  it("rejects an unknown provider", () => {
    process.env.LLM_PROVIDER = "mystery";

    expect(() => getConfig()).toThrow(/Invalid configuration:\n {2}- llm\.provider:/);
  });

  it("caches until reset", () => {
    process.env.PORT = "4000";
    expect(getConfig().server.port).toBe(4000);

    process.env.PORT = "5000";
    expect(getConfig().server.port).toBe(4000);

    _resetConfigCache();
    expect(getConfig().server.port).toBe(5000);
  });
});
