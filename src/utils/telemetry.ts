import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * so the Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TestSink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only usable when NODE_ENV=test or VITEST is set
 */
let testSink: TestSink | null = null;

export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  SpecAgentStarted: "spec_agent.started",
  SpecAgentCompleted: "spec_agent.completed",
  SpecAgentNoSpec: "spec_agent.no_spec",
  GenerationSucceeded: "spec_agent.generation.succeeded",
  GenerationFailed: "spec_agent.generation.failed",

  CodeBlocksExtracted: "spec_agent.extract.completed",
  CodeBlockKeyCollision: "spec_agent.extract.key_collision",
  SpecParseFailed: "spec_agent.normalize.parse_failed",
  SpecFlattened: "spec_agent.normalize.flattened",
  ArtifactsResolved: "spec_agent.resolve.completed",
  ArtifactWriteFailed: "spec_agent.emit.write_failed",

  SyntaxCheckCompleted: "spec_agent.syntax_check.completed",
  SyntaxCheckUnavailable: "spec_agent.syntax_check.unavailable",

  RegistryAppendFailed: "spec_agent.registry.append_failed",
  RegistryResetFailed: "spec_agent.registry.reset_failed",
  RegistryUploadFailed: "spec_agent.registry.upload_failed",
} as const;

export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "rtl_spec_agent.",
    globalTags: {
      service: env.DD_SERVICE || "rtl-spec-agent-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(value);
  }

  return undefined;
}

function sanitizeTelemetryData(data: object): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 *
 * @param event Event name (use TelemetryEvents)
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) {
    return;
  }

  try {
    switch (event) {
      case TelemetryEvents.SpecAgentCompleted: {
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("run.duration_ms", eventData.duration_ms, {
            spec_kind: tag(eventData.spec_kind, "unknown"),
          });
        }
        if (typeof eventData.artifact_count === "number") {
          datadogClient.gauge("run.artifacts", eventData.artifact_count);
        }
        datadogClient.increment("run.completed", 1, {
          spec_kind: tag(eventData.spec_kind, "unknown"),
          validation: tag(eventData.validation_status, "unknown"),
        });
        break;
      }

      case TelemetryEvents.GenerationSucceeded: {
        if (typeof eventData.latency_ms === "number") {
          datadogClient.histogram("generation.latency_ms", eventData.latency_ms, {
            provider: tag(eventData.provider, "unknown"),
          });
        }
        break;
      }

      case TelemetryEvents.GenerationFailed: {
        datadogClient.increment("generation.failed", 1, {
          provider: tag(eventData.provider, "unknown"),
          error_name: tag(eventData.error_name, "unknown"),
        });
        break;
      }

      case TelemetryEvents.SpecParseFailed: {
        datadogClient.increment("normalize.parse_failed", 1);
        break;
      }

      case TelemetryEvents.SpecFlattened: {
        datadogClient.increment("normalize.flattened", 1, {
          rule: tag(eventData.rule, "unknown"),
        });
        break;
      }

      case TelemetryEvents.ArtifactWriteFailed: {
        datadogClient.increment("emit.write_failed", 1);
        break;
      }

      case TelemetryEvents.SyntaxCheckCompleted: {
        datadogClient.increment("syntax_check.completed", 1, {
          status: tag(eventData.status, "unknown"),
        });
        break;
      }

      case TelemetryEvents.SyntaxCheckUnavailable: {
        datadogClient.increment("syntax_check.unavailable", 1);
        break;
      }

      case TelemetryEvents.RegistryAppendFailed:
      case TelemetryEvents.RegistryResetFailed:
      case TelemetryEvents.RegistryUploadFailed: {
        datadogClient.increment("registry.failed", 1, {
          operation: tag(eventData.operation, "unknown"),
        });
        break;
      }

      // Lifecycle and debug-level events are not sent to Datadog
      default:
        if (!VALID_EVENT_NAMES.has(event)) {
          log.warn({ event }, "Unknown telemetry event (not in frozen enum)");
        }
    }
  } catch (error) {
    // Never let telemetry break the application
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) {
    return;
  }
  return new Promise((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}
