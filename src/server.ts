// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import specAgentRoute from "./routes/v1.spec-agent.js";
import { getGenerationClient } from "./adapters/llm/router.js";
import { IverilogSyntaxChecker } from "./adapters/syntax-check/iverilog.js";
import { createArtifactRegistry } from "./adapters/registry/index.js";
import type { SpecAgentDeps } from "./spec-agent/types.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";
import { genReqId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { toErrorV1, getStatusCodeForErrorCode } from "./utils/errors.js";
import { ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { config } from "./config/index.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { log, flushMetrics } from "./utils/telemetry.js";

export interface BuildOptions {
  /** Collaborators for the spec agent; built from config when omitted */
  deps?: SpecAgentDeps;
  logger?: boolean;
}

/**
 * Wire the production collaborators from configuration.
 * Missing provider API keys fail here, before the server listens.
 */
export function createSpecAgentDeps(): SpecAgentDeps {
  return {
    generator: getGenerationClient(),
    syntaxChecker: new IverilogSyntaxChecker(),
    registry: createArtifactRegistry(),
  };
}

export async function build(options: BuildOptions = {}) {
  const deps = options.deps ?? createSpecAgentDeps();

  const app = Fastify({
    logger: options.logger === false ? false : createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId,
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    // Log errors with context (redaction handled by logger)
    if (statusCode >= 500) {
      request.log.error({
        error,
        request_id: errorV1.request_id,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      request.log.warn({
        request_id: errorV1.request_id,
        code: errorV1.code,
        method: request.method,
        url: request.url,
      }, `[${errorV1.code}] ${errorV1.message}`);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    provider: deps.generator.name,
    model: deps.generator.model,
    syntax_checker: deps.syntaxChecker.name,
    registry: deps.registry.name,
  }));

  await app.register(specAgentRoute, { deps });

  app.addHook("onClose", async () => {
    await flushMetrics();
  });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const { port } = config.server;

  build()
    .then(async (app) => {
      app.log.info({
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        node_env: config.server.nodeEnv,
        provider: config.llm.provider,
        model: config.llm.model ?? 'default',
        workflows_root: config.workflows.rootDir,
        iverilog_path: config.syntaxCheck.iverilogPath,
        registry_upload: config.registry.uploadEnabled,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
        route_timeout_ms: ROUTE_TIMEOUT_MS,
      }, 'RTL spec agent service starting');

      await app.listen({ port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      log.fatal({ err }, 'Failed to start server');
      process.exit(1);
    });
}
