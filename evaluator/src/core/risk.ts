import { RiskPolicy, VerdictThresholds } from "../config/policy";
import {
  CostBreakdown,
  IncomeBreakdown,
  NormalizedDeal,
  Ratios,
  RiskLevel,
  RiskRating,
} from "./dto";

const SEVERITY: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

/**
 * Most severe of the given levels; one HIGH category makes the deal HIGH
 */
export function maxSeverity(levels: RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>(
    (worst, level) => (SEVERITY[level] > SEVERITY[worst] ? level : worst),
    "LOW"
  );
}

export function marketRisk(
  deal: NormalizedDeal,
  ratios: Ratios,
  thresholds: VerdictThresholds,
  policy: RiskPolicy
): RiskLevel {
  if (deal.afterRepairValue !== undefined) {
    // Exit depends on the market valuing the finished property
    const uplift =
      deal.afterRepairValue / (deal.purchasePrice + deal.refurbCost);
    if (uplift < policy.minArvUplift) return "HIGH";
    if (uplift < policy.comfortableArvUplift) return "MEDIUM";
    return "LOW";
  }

  if (ratios.grossYield < thresholds.minViableYieldPct) return "HIGH";
  if (ratios.grossYield < thresholds.highYieldPct) return "MEDIUM";
  return "LOW";
}

export function tenantDemandRisk(
  deal: NormalizedDeal,
  income: IncomeBreakdown,
  ratios: Ratios,
  policy: RiskPolicy
): RiskLevel {
  if (income.annualRent === 0) {
    return deal.dealType === "FLIP" ? "LOW" : "HIGH";
  }

  let level: RiskLevel = "LOW";
  if (ratios.breakEvenOccupancy > policy.highBreakEvenOccupancy) {
    level = "HIGH";
  } else if (ratios.breakEvenOccupancy > policy.elevatedBreakEvenOccupancy) {
    level = "MEDIUM";
  }

  // Room-by-room lets turn over far more often than a single tenancy
  return deal.dealType === "HMO" ? maxSeverity([level, "MEDIUM"]) : level;
}

export function refurbRisk(deal: NormalizedDeal, policy: RiskPolicy): RiskLevel {
  if (deal.dealType !== "BRR" && deal.dealType !== "FLIP") return "LOW";
  if (deal.refurbCost === 0) return "LOW";
  if (deal.refurbCost / deal.purchasePrice > policy.heavyRefurbFraction) {
    return "HIGH";
  }
  return "MEDIUM";
}

export function financeRisk(
  deal: NormalizedDeal,
  costs: CostBreakdown,
  ratios: Ratios,
  policy: RiskPolicy
): RiskLevel {
  const ratePct = deal.interestRate * 100;
  const letDeal = deal.monthlyRent > 0;

  if (
    costs.loanToValue > policy.maxLoanToValue ||
    ratePct > policy.stressRatePct ||
    (letDeal && ratios.interestCoverRatio < policy.minInterestCover)
  ) {
    return "HIGH";
  }

  if (
    costs.loanToValue > policy.elevatedLoanToValue ||
    ratePct >= policy.elevatedRatePct ||
    (letDeal && ratios.interestCoverRatio < policy.comfortableInterestCover)
  ) {
    return "MEDIUM";
  }

  return "LOW";
}

export function rateRisk(
  deal: NormalizedDeal,
  costs: CostBreakdown,
  income: IncomeBreakdown,
  ratios: Ratios,
  thresholds: VerdictThresholds,
  policy: RiskPolicy
): RiskRating {
  const market = marketRisk(deal, ratios, thresholds, policy);
  const tenantDemand = tenantDemandRisk(deal, income, ratios, policy);
  const refurb = refurbRisk(deal, policy);
  const finance = financeRisk(deal, costs, ratios, policy);

  return {
    market,
    tenantDemand,
    refurb,
    finance,
    overall: maxSeverity([market, tenantDemand, refurb, finance]),
  };
}
