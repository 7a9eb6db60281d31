// PlanGenerator: query + registered tool schemas → ranked dynamic plans

import type { DynamicPlan, DynamicPlanTracer, PlanExclusivityMode } from "./types/plan";
import type { RegisteredTool, ToolSchema } from "./types/tool";
import type { Logger } from "./types/logger";
import { silentLogger } from "./types/logger";
import { PlanGenerationError, RefusalError } from "./types/errors";
import type { LlmGateway } from "./llm-gateway";
import { DEFAULT_MODELS } from "./llm-gateway";
import { DYNAMIC_PLAN_CONTAINER_SHAPE } from "./schemas";
import { DYNAMIC_PLAN_INSTRUCTION } from "./prompts";
import { renderToolBlock } from "./tool-block";
import { enforceExclusivity, pruneByScoreGap } from "./plan-validation";
import { generateId } from "./id";

export const NO_AGENTS_DESCRIPTION = "No agents available";
export const DEFAULT_PLAN_MAX_TOKENS = 1000;

/** The part of the gateway the generator needs. */
export type PlanRequester = Pick<LlmGateway, "requestStructuredOutput">;

export interface PlanGeneratorOptions {
  readonly gateway: PlanRequester;
  readonly logger?: Logger;
  readonly model?: string;
  readonly maxTokens?: number;
  /** Default "normalize". */
  readonly exclusivity?: PlanExclusivityMode;
  /** Keep only the top plan when it leads the runner-up by more than this. Off when unset. */
  readonly scoreGap?: number;
}

/** `<Query>` block followed by one `<Tool>` block per schema. */
export function buildPlanPrompt(query: string, schemas: Iterable<ToolSchema>): string {
  const blocks = Array.from(schemas, renderToolBlock);
  return (`<Query>\n${query}\n</Query>\n` + blocks.join("\n")).trim();
}

export function toTracer(plan: DynamicPlan, parentId?: string): DynamicPlanTracer {
  const tracer: DynamicPlanTracer = { ...plan, id: generateId(plan.description), nExecution: 0 };
  return parentId === undefined ? tracer : { ...tracer, parentId };
}

export class PlanGenerator {
  private readonly gateway: PlanRequester;
  private readonly logger: Logger;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly exclusivity: PlanExclusivityMode;
  private readonly scoreGap: number | undefined;

  constructor(options: PlanGeneratorOptions) {
    this.gateway = options.gateway;
    this.logger = (options.logger ?? silentLogger).child({ component: "PlanGenerator" });
    this.model = options.model ?? DEFAULT_MODELS.plan;
    this.maxTokens = options.maxTokens ?? DEFAULT_PLAN_MAX_TOKENS;
    this.exclusivity = options.exclusivity ?? "normalize";
    this.scoreGap = options.scoreGap;
  }

  /**
   * Ask the model for plans over `tools`. With no tools, returns the single
   * "No agents available" plan without a remote call.
   *
   * Refusals propagate as RefusalError; every other failure is wrapped in
   * PlanGenerationError.
   */
  async generatePlan(query: string, tools: ReadonlyMap<string, RegisteredTool>): Promise<DynamicPlanTracer[]> {
    if (tools.size === 0) {
      return [
        toTracer({
          description: NO_AGENTS_DESCRIPTION,
          steps: [],
          recommendationTools: [],
          recommendationScore: 0,
        }),
      ];
    }

    const prompt = buildPlanPrompt(query, Array.from(tools.values(), (t) => t.schema));

    let plans: readonly DynamicPlan[];
    try {
      plans = await this.gateway.requestStructuredOutput(
        [
          { role: "system", content: DYNAMIC_PLAN_INSTRUCTION },
          { role: "user", content: prompt },
        ],
        DYNAMIC_PLAN_CONTAINER_SHAPE,
        { model: this.model, maxTokens: this.maxTokens, maxAttempts: 1 },
      );
    } catch (error) {
      if (error instanceof RefusalError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new PlanGenerationError(`Plan generation failed: ${reason}`, error);
    }

    let validated = enforceExclusivity(plans, this.exclusivity, this.logger);
    if (this.scoreGap !== undefined) {
      validated = pruneByScoreGap(validated, this.scoreGap);
    }

    this.logger.info("Plans generated", { tools: tools.size, plans: validated.length });
    return validated.map((plan) => toTracer(plan));
  }

  /** Record one more execution of `tracer`. */
  markExecuted(tracer: DynamicPlanTracer): DynamicPlanTracer {
    tracer.nExecution += 1;
    return tracer;
  }

  /** A follow-up plan linked back to `parent`. */
  derivePlan(parent: DynamicPlanTracer, plan: DynamicPlan): DynamicPlanTracer {
    return toTracer(plan, parent.id);
  }
}
