// Local checks on plans returned by the model

import type { DynamicPlan, PlanExclusivityMode, PlanStep } from "./types/plan";
import type { Logger } from "./types/logger";
import { PlanGenerationError } from "./types/errors";

export const MAX_STEP_RETRY = 3;

function clampRetry(step: PlanStep): PlanStep {
  const retry = Math.min(MAX_STEP_RETRY, Math.max(0, step.retry));
  return retry === step.retry ? step : { ...step, retry };
}

function isMixed(plan: DynamicPlan): boolean {
  return plan.steps.length > 0 && plan.recommendationTools.length > 0;
}

/**
 * Steps and recommended tools are meant to be mutually exclusive.
 * - "normalize": keep the steps, drop the recommendations, clamp retry to 0..3
 * - "reject": throw PlanGenerationError on the first violation
 * - "off": return the plans untouched
 */
export function enforceExclusivity(
  plans: readonly DynamicPlan[],
  mode: PlanExclusivityMode,
  logger: Logger,
): readonly DynamicPlan[] {
  if (mode === "off") return plans;

  if (mode === "reject") {
    for (const plan of plans) {
      if (isMixed(plan)) {
        throw new PlanGenerationError(`Plan "${plan.description}" has both steps and recommended tools`);
      }
      const bad = plan.steps.find((s) => s.retry < 0 || s.retry > MAX_STEP_RETRY);
      if (bad) {
        throw new PlanGenerationError(`Step "${bad.description}" has retry ${bad.retry}, expected 0-${MAX_STEP_RETRY}`);
      }
    }
    return plans;
  }

  return plans.map((plan) => {
    const steps = plan.steps.map(clampRetry);
    if (!isMixed(plan)) return { ...plan, steps };

    logger.warn("Dropping recommended tools from a plan that has steps", {
      plan: plan.description,
      dropped: plan.recommendationTools.length,
    });
    return { ...plan, steps, recommendationTools: [] };
  });
}

/**
 * When the best plan outscores the runner-up by more than `gap`, keep only
 * the best one. Otherwise the plans come back in their original order.
 */
export function pruneByScoreGap(plans: readonly DynamicPlan[], gap: number): readonly DynamicPlan[] {
  if (plans.length < 2) return plans;

  const ranked = [...plans].sort((a, b) => b.recommendationScore - a.recommendationScore);
  const [best, runnerUp] = ranked;
  return best.recommendationScore - runnerUp.recommendationScore > gap ? [best] : plans;
}
