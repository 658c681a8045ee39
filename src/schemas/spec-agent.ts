import { z } from "zod";

export const WorkflowParams = z.object({
  workflowId: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_-]+$/, "workflowId may only contain letters, digits, '_' and '-'"),
});

/**
 * An empty `spec` is accepted and answered with a `no_spec` result.
 */
export const SpecAgentInput = z.object({
  spec: z.string().max(20_000),
  user_id: z.string().min(1).max(128).optional(),
  reset_artifacts: z.boolean().optional(),
});

export type WorkflowParamsT = z.infer<typeof WorkflowParams>;
export type SpecAgentInputT = z.infer<typeof SpecAgentInput>;
