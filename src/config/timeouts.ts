import { env } from "node:process";

const MIN_TIMEOUT_MS = 5_000; // 5s
const MAX_TIMEOUT_MS = 5 * 60_000; // 5m

function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Upper bound for one generation call (the backend owns retries, we do not) */
export const GENERATION_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("GENERATION_TIMEOUT_MS", 120_000),
);

/** Upper bound for one syntax-checker subprocess */
export const SYNTAX_CHECK_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("SYNTAX_CHECK_TIMEOUT_MS", 30_000),
);

export const ROUTE_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ROUTE_TIMEOUT_MS", 180_000),
);
