import type { FastifyInstance } from "fastify";
import { SpecAgentInput, WorkflowParams } from "../schemas/spec-agent.js";
import { runSpecAgent } from "../spec-agent/pipeline.js";
import type { SpecAgentDeps } from "../spec-agent/types.js";
import { buildErrorV1, sanitizeErrorMessage } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

export interface SpecAgentRouteOptions {
  deps: SpecAgentDeps;
}

/**
 * POST /v1/workflows/:workflowId/spec-agent
 *
 * Runs the spec agent for one workflow and returns the result record.
 * Generation failures map to 502; every other outcome is a 200.
 */
export default async function route(app: FastifyInstance, opts: SpecAgentRouteOptions) {
  app.post("/v1/workflows/:workflowId/spec-agent", async (req, reply) => {
    const requestId = getRequestId(req);
    const params = WorkflowParams.safeParse(req.params);
    const body = SpecAgentInput.safeParse(req.body);

    if (!params.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid workflow id", { validation_errors: params.error.flatten() }, requestId)
      );
    }
    if (!body.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid input", { validation_errors: body.error.flatten() }, requestId)
      );
    }

    const result = await runSpecAgent(
      {
        workflowId: params.data.workflowId,
        spec: body.data.spec,
        userId: body.data.user_id,
        resetArtifacts: body.data.reset_artifacts,
        requestId,
      },
      opts.deps
    );

    if (result.outcome === "generation_failed") {
      reply.code(502);
      return reply.send(
        buildErrorV1(
          "UPSTREAM_ERROR",
          sanitizeErrorMessage(result.status),
          { workflow_id: result.workflow_id, provider: opts.deps.generator.name },
          requestId
        )
      );
    }

    return reply.send(result);
  });
}
