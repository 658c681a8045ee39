/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Values are parsed once on first access and cached; tests reset the cache
 * with `_resetConfigCache()` after stubbing the environment.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional URL string that treats empty/undefined as undefined
 * In test mode, invalid URLs are treated as undefined (lenient)
 * In production mode, invalid URLs fail validation (strict)
 */
const optionalUrl = z
  .union([z.string(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") {
      return undefined;
    }
    try {
      new URL(val);
      return val;
    } catch {
      const isTestEnv = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);
      if (isTestEnv) {
        return undefined;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid url`,
      });
      return z.NEVER;
    }
  });

/**
 * Optional non-empty string (empty env values count as unset)
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val));

const Environment = z.enum(["development", "test", "production"]);

/**
 * Generation provider enum
 */
const LLMProvider = z.enum(["openai", "anthropic", "fixtures"]);
export type LLMProviderName = z.infer<typeof LLMProvider>;

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3101),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),

  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: optionalString,
    openaiApiKey: optionalString,
    // Gateway endpoints (e.g. an OpenAI-compatible proxy) go here
    openaiBaseUrl: optionalUrl,
    anthropicApiKey: optionalString,
    maxTokens: z.coerce.number().int().positive().default(4096),
  }),

  workflows: z.object({
    rootDir: z.string().default("backend/workflows"),
  }),

  syntaxCheck: z.object({
    iverilogPath: z.string().default("/usr/bin/iverilog"),
    outputFile: z.string().default("design.out"),
  }),

  registry: z.object({
    supabaseUrl: optionalUrl,
    supabaseServiceRoleKey: optionalString,
    table: z.string().default("workflows"),
    bucket: z.string().default("artifacts"),
    uploadEnabled: booleanString.default(false),
  }),

  specAgent: z.object({
    dedupePorts: booleanString.default(false),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiBaseUrl: env.OPENAI_BASE_URL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      maxTokens: env.LLM_MAX_TOKENS,
    },
    workflows: {
      rootDir: env.WORKFLOWS_ROOT,
    },
    syntaxCheck: {
      iverilogPath: env.IVERILOG_PATH,
      outputFile: env.SYNTAX_CHECK_OUTPUT_FILE,
    },
    registry: {
      supabaseUrl: env.SUPABASE_URL,
      supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
      table: env.REGISTRY_TABLE,
      bucket: env.REGISTRY_BUCKET,
      uploadEnabled: env.REGISTRY_UPLOAD_ENABLED,
    },
    specAgent: {
      dedupePorts: env.SPEC_AGENT_DEDUPE_PORTS,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }

  return result.data;
}

/**
 * Lazily-parsed configuration
 *
 * ```
 * import { config } from './config/index.js';
 * const root = config.workflows.rootDir;
 * ```
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
