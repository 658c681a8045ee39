/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: API keys for the generation backend and the Supabase service
 * role key must never reach log output. Update this list when adding new
 * secret-bearing fields.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.serviceRoleKey",
  "*.service_role_key",
  "*.openaiApiKey",
  "*.anthropicApiKey",
  "*.supabaseServiceRoleKey",

  "*.headers.authorization",
  '*.headers["x-api-key"]',
  "*.headers.apikey",
  "*.headers.cookie",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
