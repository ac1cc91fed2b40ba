/**
 * Source validation.
 *
 * Zod schemas for the already-parsed mappings the external loader hands
 * in. Unknown keys are stripped; required fields must be present.
 */

import { z } from "zod";

export const ParameterSchemaSchema = z
  .object({
    type: z.string(),
    unit: z.string(),
    min: z.number().finite(),
    max: z.number().finite(),
    brakeable: z.boolean(),
  })
  .refine((p) => p.min <= p.max, { message: "min must not exceed max" });

export const ActionSchemaSchema = z.object({
  description: z.string(),
  parameters: z.record(z.string(), ParameterSchemaSchema),
});

export const ActionSourceSchema = z.object({
  actions: z.record(z.string(), ActionSchemaSchema),
});

export const StateScalingSchema = z.object({
  speed: z.number().min(0).max(1),
  force: z.number().min(0).max(1),
});

export const StatePolicySchema = z.object({
  description: z.string(),
  scaling: StateScalingSchema,
  restrictions: z.array(z.string()),
});

export const PolicySourceSchema = z.object({
  states: z.record(z.string(), StatePolicySchema),
});

export type ParsedActionSource = z.infer<typeof ActionSourceSchema>;
export type ParsedPolicySource = z.infer<typeof PolicySourceSchema>;

/**
 * Render zod issues as `path: message` lines.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
