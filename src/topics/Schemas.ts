import { z } from 'zod';
import { JsonValue } from '../core/Types';

// On-disk shapes of a topic folder: meta.json, nodes.json, workflow.json.

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const ParameterSetSchema = z.record(z.string(), z.union([ScalarSchema, z.array(ScalarSchema)]));

export const InlineLimitSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
});

export const TopicMetaSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  defaults: ParameterSetSchema.nullish(),
  /** Absent means every inline key is accepted. */
  inline_allowed: z.array(ScalarSchema).nullish(),
  inline_limits: z.record(z.string(), InlineLimitSchema).nullish(),
});

export const NodeRuleSchema = z.object({
  type: z.string(),
  node_ids: z.array(z.string()),
  key: z.string(),
  param: ScalarSchema.nullish(),
});

export const NodesFileSchema = z.object({
  nodes: z.array(NodeRuleSchema).default([]),
  defaults: ParameterSetSchema.nullish(),
});

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

// `inputs` stays optional here; nodes that rules target are checked separately.
export const WorkflowFileSchema = z.record(
  z.string(),
  z.object({
    class_type: z.string(),
    inputs: z.record(z.string(), JsonValueSchema).optional(),
    _meta: z.record(z.string(), JsonValueSchema).optional(),
  }),
);

export type TopicMeta = z.infer<typeof TopicMetaSchema>;
export type NodesFile = z.infer<typeof NodesFileSchema>;
export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;
export type InlineLimit = z.infer<typeof InlineLimitSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
