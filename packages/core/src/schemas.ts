// Wire schemas for structured model output, and the mapping between the
// snake_case JSON the model speaks and the camelCase types used in code.

import { z } from "zod";
import type { ToolParameter, ToolSchema } from "./types/tool";
import type { DynamicPlan, DynamicPlanTracer, PlanStep, RecommendedTool } from "./types/plan";
import { type Result, ok, err } from "./types/errors";

export const ToolParameterSchema = z.object({
  name: z.string(),
  type: z.string(),
  description: z.string(),
  required: z.boolean(),
});

export const ToolSchemaSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()),
  parameters: z.array(ToolParameterSchema),
});

export const PlanStepSchema = z.object({
  description: z.string(),
  suggested_tool: z.string(),
  sub_query: z.string(),
  explanation: z.string(),
  retry: z.number().int(),
});

export const RecommendedToolSchema = z.object({
  name: z.string(),
  description: z.string(),
  reason: z.string(),
  parameters: z.array(ToolParameterSchema),
});

export const DynamicPlanSchema = z.object({
  description: z.string(),
  steps: z.array(PlanStepSchema).default([]),
  recommendation_tools: z.array(RecommendedToolSchema).default([]),
  recommendation_score: z.number(),
});

export const DynamicPlanContainerSchema = z.object({
  plans: z.array(DynamicPlanSchema),
});

export type ToolSchemaWire = z.output<typeof ToolSchemaSchema>;
export type DynamicPlanWire = z.output<typeof DynamicPlanSchema>;

/**
 * A named target shape for structured output: the JSON Schema sent to the
 * model plus the decoder applied to what comes back.
 */
export interface StructuredShape<T> {
  readonly name: string;
  readonly jsonSchema: Record<string, unknown>;
  decode(value: unknown): Result<T, Error>;
}

export function defineShape<S extends z.ZodType, T>(
  name: string,
  schema: S,
  map: (value: z.output<S>) => T,
): StructuredShape<T> {
  return {
    name,
    jsonSchema: { ...z.toJSONSchema(schema) },
    decode(value) {
      const parsed = schema.safeParse(value);
      return parsed.success ? ok(map(parsed.data)) : err(parsed.error);
    },
  };
}

const MAX_TAGS = 3;

export function toToolSchema(wire: ToolSchemaWire): ToolSchema {
  return {
    name: wire.name,
    description: wire.description,
    tags: wire.tags.slice(0, MAX_TAGS),
    parameters: wire.parameters.map(toToolParameter),
  };
}

function toToolParameter(wire: z.output<typeof ToolParameterSchema>): ToolParameter {
  return {
    name: wire.name,
    type: wire.type,
    description: wire.description,
    required: wire.required,
  };
}

function toPlanStep(wire: z.output<typeof PlanStepSchema>): PlanStep {
  return {
    description: wire.description,
    suggestedTool: wire.suggested_tool,
    subQuery: wire.sub_query,
    explanation: wire.explanation,
    retry: wire.retry,
  };
}

function toRecommendedTool(wire: z.output<typeof RecommendedToolSchema>): RecommendedTool {
  return {
    name: wire.name,
    description: wire.description,
    reason: wire.reason,
    parameters: wire.parameters.map(toToolParameter),
  };
}

export function toDynamicPlan(wire: DynamicPlanWire): DynamicPlan {
  return {
    description: wire.description,
    steps: wire.steps.map(toPlanStep),
    recommendationTools: wire.recommendation_tools.map(toRecommendedTool),
    recommendationScore: wire.recommendation_score,
  };
}

export const TOOL_SCHEMA_SHAPE = defineShape("ToolSchema", ToolSchemaSchema, toToolSchema);

export const DYNAMIC_PLAN_CONTAINER_SHAPE = defineShape(
  "DynamicPlanContainer",
  DynamicPlanContainerSchema,
  (wire): readonly DynamicPlan[] => wire.plans.map(toDynamicPlan),
);

// ── Outbound (HTTP responses) ───────────────────────────────────────

export type DynamicPlanTracerWire = DynamicPlanWire & {
  readonly id: string;
  readonly n_execution: number;
  readonly parent_id: string | null;
};

export function toTracerWire(tracer: DynamicPlanTracer): DynamicPlanTracerWire {
  return {
    id: tracer.id,
    description: tracer.description,
    steps: tracer.steps.map((step) => ({
      description: step.description,
      suggested_tool: step.suggestedTool,
      sub_query: step.subQuery,
      explanation: step.explanation,
      retry: step.retry,
    })),
    recommendation_tools: tracer.recommendationTools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      reason: tool.reason,
      parameters: tool.parameters.map((p) => ({ ...p })),
    })),
    recommendation_score: tracer.recommendationScore,
    n_execution: tracer.nExecution,
    parent_id: tracer.parentId ?? null,
  };
}
