import { defaultPolicy, EvaluationPolicy } from "../config/policy";
import { DealInput, DealResult } from "./dto";
import { computeCosts, computeIncome, computeRatios } from "./finance";
import { rateRisk } from "./risk";
import { validateDeal } from "./validate";
import { decideVerdict } from "./verdict";

/**
 * Freeze an object graph in place so results cannot change after computation
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Evaluate a property deal: stamp duty, purchase costs, financing, income,
 * ratios, verdict and risk. Pure and synchronous.
 * @throws ValidationError / MissingFieldError before any arithmetic
 */
export function evaluate(
  input: DealInput,
  policy: EvaluationPolicy = defaultPolicy
): DealResult {
  return deepFreeze(computeDealResult(input, policy));
}

/**
 * Unfrozen result, for callers that build on it before freezing
 */
export function computeDealResult(
  input: DealInput,
  policy: EvaluationPolicy
): DealResult {
  const deal = validateDeal(input, policy);
  const thresholds = policy.verdict[deal.dealType];

  const costs = computeCosts(deal, policy.stampDuty);
  const income = computeIncome(deal, costs.loanAmount, policy.costs);
  const ratios = computeRatios(deal.valuationBasis, costs, income);

  return {
    dealType: deal.dealType,
    purchasePrice: deal.purchasePrice,
    valuationBasis: deal.valuationBasis,
    costs,
    income,
    ratios,
    verdict: decideVerdict(ratios, income.monthlyCashflow, thresholds),
    risk: rateRisk(deal, costs, income, ratios, thresholds, policy.risk),
  };
}
