import { AnalyticsPolicy } from "../config/policy";
import {
  DealResult,
  DealScore,
  Highlights,
  Money,
  ProjectionYear,
  ScoreLabel,
  StrategyMetrics,
  Verdict,
} from "./dto";

type Band = readonly [threshold: number, points: number];

/**
 * First band whose threshold the value reaches, else the fallback
 */
function bandPoints(value: number, bands: readonly Band[], fallback: number): number {
  for (const [threshold, points] of bands) {
    if (value >= threshold) return points;
  }
  return fallback;
}

const HMO_YIELD_BANDS: readonly Band[] = [[12, 25], [10, 20], [8, 15], [6, 10]];
const YIELD_BANDS: readonly Band[] = [[8, 25], [6, 20], [5, 15], [4, 10]];
const CASHFLOW_BANDS: readonly Band[] = [
  [300, 25],
  [200, 20],
  [100, 15],
  [50, 10],
  [0, 5],
];
const CASH_ON_CASH_BANDS: readonly Band[] = [[12, 25], [8, 20], [6, 15], [4, 10]];
const STRATEGY_ROI_BANDS: readonly Band[] = [[25, 15], [20, 12], [15, 8], [10, 4]];
const NET_YIELD_BANDS: readonly Band[] = [[5, 15], [4, 12], [3, 8], [2, 4]];
const RISK_POINTS = { LOW: 10, MEDIUM: 5, HIGH: -5 } as const;

/**
 * Compute a 0-100 deal score from the evaluated metrics
 * Starts neutral at 50 and adds or removes points per factor
 */
export function scoreFromResult(
  result: DealResult,
  strategy?: StrategyMetrics
): number {
  let score = 50;

  score += bandPoints(
    result.ratios.grossYield,
    result.dealType === "HMO" ? HMO_YIELD_BANDS : YIELD_BANDS,
    -10
  );
  score += bandPoints(result.income.monthlyCashflow, CASHFLOW_BANDS, -15);
  score += bandPoints(result.ratios.cashOnCash, CASH_ON_CASH_BANDS, -10);

  // Strategy contribution: resale/refinance ROI, or net yield for let deals
  score += strategy
    ? bandPoints(strategy.roi, STRATEGY_ROI_BANDS, 0)
    : bandPoints(result.ratios.netYield, NET_YIELD_BANDS, 0);

  score += RISK_POINTS[result.risk.overall];

  return Math.max(0, Math.min(100, score));
}

export function scoreLabel(score: number): ScoreLabel {
  if (score >= 80) return "Excellent";
  if (score >= 65) return "Good";
  if (score >= 50) return "Fair";
  if (score >= 35) return "Weak";
  return "Poor";
}

export function dealScore(
  result: DealResult,
  strategy?: StrategyMetrics
): DealScore {
  const value = scoreFromResult(result, strategy);
  return { value, label: scoreLabel(value) };
}

/**
 * Year-by-year cashflow and equity with rent and capital growth.
 * Expenses scale with rent, so each year keeps the year-0 net margin;
 * the loan is interest-only and does not amortize.
 */
export function projectReturns(
  result: DealResult,
  policy: AnalyticsPolicy
): ProjectionYear[] {
  const { annualRent, netAnnualIncome } = result.income;
  const netMargin = annualRent > 0 ? netAnnualIncome / annualRent : 0;

  const years: ProjectionYear[] = [];
  let rent = annualRent;
  let value = result.purchasePrice;
  let cumulative = 0;

  for (let year = 1; year <= policy.projectionYears; year++) {
    rent *= 1 + policy.rentGrowthRate;
    value *= 1 + policy.capitalGrowthRate;

    const annualNet = rent * netMargin;
    cumulative += annualNet;
    const equity = value - result.costs.loanAmount;

    years.push({
      year,
      annualRent: Math.round(rent),
      annualNet: Math.round(annualNet),
      cumulativeCashflow: Math.round(cumulative),
      propertyValue: Math.round(value),
      equity: Math.round(equity),
      totalReturn: Math.round(cumulative + equity - result.costs.depositAmount),
    });
  }

  return years;
}

function formatPounds(amount: Money): string {
  return `£${Math.round(amount).toLocaleString("en-GB")}`;
}

const PROCEED_STEPS = [
  "Verify rental comparables in the area",
  "Get RICS survey (£400-600)",
  "Confirm mortgage availability",
  "Instruct solicitor for preliminary checks",
  "Arrange property viewing",
];

const REVIEW_STEPS = [
  "Review comparable sales in area",
  "Investigate why yield/cashflow is below target",
  "Consider negotiating purchase price",
  "Explore alternative strategies (HMO, BRR)",
  "Get professional opinion on achievable rent",
];

const AVOID_STEPS = [
  "Walk away unless the price or rent changes materially",
  "Continue searching for better opportunities",
  "Adjust search criteria if needed",
  "Consider different areas with higher yields",
];

const NEXT_STEPS: Record<Verdict, readonly string[]> = {
  PROCEED: PROCEED_STEPS,
  REVIEW: REVIEW_STEPS,
  AVOID: AVOID_STEPS,
};

/**
 * Strengths and weaknesses against the investment targets, plus next steps
 */
export function buildHighlights(
  result: DealResult,
  policy: AnalyticsPolicy
): Highlights {
  const { targets } = policy;
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  const grossYield = result.ratios.grossYield.toFixed(2);
  if (result.ratios.grossYield >= targets.grossYieldPct) {
    strengths.push(
      `Strong gross yield of ${grossYield}% exceeds ${targets.grossYieldPct}% target`
    );
  } else {
    weaknesses.push(
      `Gross yield of ${grossYield}% is below ${targets.grossYieldPct}% target`
    );
  }

  const cashflow = formatPounds(result.income.monthlyCashflow);
  if (result.income.monthlyCashflow >= targets.monthlyCashflow) {
    strengths.push(
      `Healthy monthly cashflow of ${cashflow} provides good buffer`
    );
  } else {
    weaknesses.push(
      `Monthly cashflow of ${cashflow} is below ${formatPounds(targets.monthlyCashflow)} target`
    );
  }

  const coc = result.ratios.cashOnCash.toFixed(2);
  if (result.ratios.cashOnCash >= targets.cashOnCashPct) {
    strengths.push(`Cash-on-cash return of ${coc}% meets investment criteria`);
  } else {
    weaknesses.push(
      `Cash-on-cash return of ${coc}% is below ${targets.cashOnCashPct}% target`
    );
  }

  return {
    strengths,
    weaknesses,
    nextSteps: [...NEXT_STEPS[result.verdict]],
  };
}
