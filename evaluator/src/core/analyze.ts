import {
  AnalyticsPolicy,
  analyticsPolicy as defaultAnalytics,
  defaultPolicy,
  EvaluationPolicy,
} from "../config/policy";
import { buildHighlights, dealScore, projectReturns } from "./compute";
import { DealAnalysis, DealInput } from "./dto";
import { computeDealResult, deepFreeze } from "./evaluate";
import { strategyMetrics } from "./strategy";

/**
 * Evaluate a deal and attach the supplementary analytics shown in reports:
 * strategy metrics, deal score, five-year projection and highlights
 */
export function analyzeDeal(
  input: DealInput,
  policy: EvaluationPolicy = defaultPolicy,
  analytics: AnalyticsPolicy = defaultAnalytics
): DealAnalysis {
  const result = computeDealResult(input, policy);
  const strategy = strategyMetrics(result, analytics);

  return deepFreeze({
    ...result,
    strategy,
    score: dealScore(result, strategy),
    projection: projectReturns(result, analytics),
    highlights: buildHighlights(result, analytics),
  });
}
