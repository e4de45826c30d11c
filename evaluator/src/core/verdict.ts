import { VerdictThresholds } from "../config/policy";
import { Money, Ratios, Verdict } from "./dto";

/**
 * Classify a deal from its ratios. Downside conditions are checked first and
 * win over any strong metric.
 */
export function decideVerdict(
  ratios: Ratios,
  monthlyCashflow: Money,
  thresholds: VerdictThresholds
): Verdict {
  if (monthlyCashflow < 0 || ratios.grossYield < thresholds.minViableYieldPct) {
    return "AVOID";
  }

  if (
    ratios.grossYield >= thresholds.highYieldPct &&
    monthlyCashflow > 0 &&
    ratios.cashOnCash >= thresholds.minCashOnCashPct
  ) {
    return "PROCEED";
  }

  return "REVIEW";
}
