import { AnalyticsPolicy } from "../config/policy";
import { BrrMetrics, DealResult, FlipMetrics, StrategyMetrics } from "./dto";

/**
 * Buy-refurbish-refinance: equity created by the works and the cash that
 * stays in the deal after refinancing at the post-works valuation
 */
export function brrMetrics(
  result: DealResult,
  policy: AnalyticsPolicy
): BrrMetrics {
  const arv = result.valuationBasis;
  const totalInvestment =
    result.purchasePrice +
    result.costs.refurbCost +
    result.costs.stampDuty +
    result.costs.totalFees;
  const equityCreated = arv - totalInvestment;
  const refinanceAmount = arv * policy.refinanceLtv;

  return {
    kind: "BRR",
    totalInvestment,
    equityCreated,
    refinanceAmount,
    moneyLeftIn: totalInvestment - refinanceAmount,
    roi: (equityCreated / totalInvestment) * 100,
  };
}

/**
 * Buy-renovate-resell: profit after holding and selling costs
 */
export function flipMetrics(
  result: DealResult,
  policy: AnalyticsPolicy
): FlipMetrics {
  const arv = result.valuationBasis;
  const holdingCosts = result.income.monthlyMortgage * policy.flipHoldingMonths;
  const sellingCosts = policy.flipFixedSellingCosts + arv * policy.flipAgentFeeRate;
  const totalCosts =
    result.purchasePrice +
    result.costs.refurbCost +
    result.costs.stampDuty +
    result.costs.totalFees +
    holdingCosts +
    sellingCosts;
  const profit = arv - totalCosts;

  return {
    kind: "FLIP",
    holdingCosts,
    sellingCosts,
    totalCosts,
    profit,
    roi: (profit / totalCosts) * 100,
  };
}

export function strategyMetrics(
  result: DealResult,
  policy: AnalyticsPolicy
): StrategyMetrics | undefined {
  switch (result.dealType) {
    case "BRR":
      return brrMetrics(result, policy);
    case "FLIP":
      return flipMetrics(result, policy);
    default:
      return undefined;
  }
}
