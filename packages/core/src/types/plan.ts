// Plan types -- what the model proposes for a query

import type { ToolParameter } from "./tool";

export interface PlanStep {
  readonly description: string;
  /** Name of a tool the caller knows about. Not checked against the registry. */
  readonly suggestedTool: string;
  /** The part of the original query this step answers. */
  readonly subQuery: string;
  readonly explanation: string;
  /** 0-3, only above 0 for steps doing network or disk I/O. */
  readonly retry: number;
}

/** A tool the model wishes existed. */
export interface RecommendedTool {
  readonly name: string;
  readonly description: string;
  readonly reason: string;
  readonly parameters: readonly ToolParameter[];
}

/**
 * A proposed way to satisfy a query. Exactly one of `steps` and
 * `recommendationTools` is expected to be non-empty.
 */
export interface DynamicPlan {
  readonly description: string;
  readonly steps: readonly PlanStep[];
  readonly recommendationTools: readonly RecommendedTool[];
  /** In [0, 1], higher is better. */
  readonly recommendationScore: number;
}

export interface DynamicPlanContainer {
  readonly plans: readonly DynamicPlan[];
}

export interface DynamicPlanTracer extends DynamicPlan {
  /** generateId(description) */
  readonly id: string;
  /** Incremented by callers that track replays. */
  nExecution: number;
  /** Back-reference to the plan this one was derived from. */
  readonly parentId?: string;
}

/** Post-validation applied to plans returned by the model. */
export type PlanExclusivityMode = "normalize" | "reject" | "off";
