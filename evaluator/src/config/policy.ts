/**
 * Evaluation policy: tax bands, cost assumptions, verdict thresholds and
 * risk rules. Every number the evaluator compares against lives here.
 */

import { DealType, FeeSchedule, Money } from "../core/dto";

export interface StampDutyBand {
  upTo: Money;                    // upper bound of the band, Infinity for the top band
  rate: number;                   // marginal rate, fraction
}

export interface StampDutyPolicy {
  bands: StampDutyBand[];
  surchargeRate: number;          // flat rate on the whole price for additional properties
}

export interface InputBounds {
  depositPercent: { min: number; max: number; default: number };
  interestRatePercent: { max: number; default: number };
}

export interface CostAssumptions {
  defaultFees: FeeSchedule;
  managementRate: number;         // of annual rent
  voidWeeks: number;              // per 52-week year
  maintenanceRate: number;        // of annual rent
  annualInsurance: Money;
}

export interface VerdictThresholds {
  highYieldPct: number;           // PROCEED needs gross yield at or above
  minCashOnCashPct: number;       // PROCEED needs cash-on-cash at or above
  minViableYieldPct: number;      // AVOID below
}

export interface RiskPolicy {
  maxLoanToValue: number;         // finance HIGH above
  elevatedLoanToValue: number;    // finance MEDIUM above
  stressRatePct: number;          // finance HIGH above
  elevatedRatePct: number;        // finance MEDIUM at or above
  minInterestCover: number;       // finance HIGH below
  comfortableInterestCover: number; // finance MEDIUM below
  highBreakEvenOccupancy: number; // tenant demand HIGH above
  elevatedBreakEvenOccupancy: number; // tenant demand MEDIUM above
  heavyRefurbFraction: number;    // refurb HIGH above (refurb / price)
  minArvUplift: number;           // market HIGH below (ARV / (price + refurb))
  comfortableArvUplift: number;   // market MEDIUM below
}

export interface EvaluationPolicy {
  stampDuty: StampDutyPolicy;
  bounds: InputBounds;
  costs: CostAssumptions;
  verdict: Record<DealType, VerdictThresholds>;
  risk: RiskPolicy;
}

const standardThresholds: VerdictThresholds = {
  highYieldPct: 6,
  minCashOnCashPct: 4,
  minViableYieldPct: 4,
};

// England & NI residential SDLT from April 2025; the 5% higher-rates
// surcharge for additional dwellings applies from 31 October 2024.
export const defaultPolicy: EvaluationPolicy = {
  stampDuty: {
    bands: [
      { upTo: 125_000, rate: 0 },
      { upTo: 250_000, rate: 0.02 },
      { upTo: 925_000, rate: 0.05 },
      { upTo: 1_500_000, rate: 0.1 },
      { upTo: Infinity, rate: 0.12 },
    ],
    surchargeRate: 0.05,
  },
  bounds: {
    depositPercent: { min: 20, max: 40, default: 25 },
    interestRatePercent: { max: 20, default: 4.0 },
  },
  costs: {
    defaultFees: { legal: 1500, valuation: 500, arrangement: 1995 },
    managementRate: 0.1,
    voidWeeks: 2,
    maintenanceRate: 0.08,
    annualInsurance: 480,
  },
  verdict: {
    BTL: standardThresholds,
    BRR: standardThresholds,
    FLIP: standardThresholds,
    HMO: { highYieldPct: 10, minCashOnCashPct: 4, minViableYieldPct: 8 },
  },
  risk: {
    maxLoanToValue: 0.8,
    elevatedLoanToValue: 0.75,
    stressRatePct: 6,
    elevatedRatePct: 5,
    minInterestCover: 1.25,
    comfortableInterestCover: 1.45,
    highBreakEvenOccupancy: 0.9,
    elevatedBreakEvenOccupancy: 0.8,
    heavyRefurbFraction: 0.25,
    minArvUplift: 1.1,
    comfortableArvUplift: 1.25,
  },
};

export interface PolicyOverrides {
  surchargeRate?: number;
  annualInsurance?: Money;
}

/**
 * Build a policy from the defaults with deployment-level overrides applied
 */
export function createPolicy(
  overrides: PolicyOverrides = {},
  base: EvaluationPolicy = defaultPolicy
): EvaluationPolicy {
  if (
    overrides.surchargeRate !== undefined &&
    (overrides.surchargeRate < 0 || overrides.surchargeRate > 0.2)
  ) {
    throw new Error(
      `Surcharge rate ${overrides.surchargeRate} is outside valid range (0-0.2)`
    );
  }

  if (overrides.annualInsurance !== undefined && overrides.annualInsurance < 0) {
    throw new Error(
      `Annual insurance ${overrides.annualInsurance} must not be negative`
    );
  }

  return {
    ...base,
    stampDuty: {
      ...base.stampDuty,
      surchargeRate: overrides.surchargeRate ?? base.stampDuty.surchargeRate,
    },
    costs: {
      ...base.costs,
      annualInsurance: overrides.annualInsurance ?? base.costs.annualInsurance,
    },
  };
}

export interface AnalyticsPolicy {
  refinanceLtv: number;           // BRR refinance at this share of ARV
  flipHoldingMonths: number;
  flipAgentFeeRate: number;       // of ARV
  flipFixedSellingCosts: Money;
  rentGrowthRate: number;         // projection, per year
  capitalGrowthRate: number;      // projection, per year
  projectionYears: number;
  targets: {
    grossYieldPct: number;
    monthlyCashflow: Money;
    cashOnCashPct: number;
  };
}

export const analyticsPolicy: AnalyticsPolicy = {
  refinanceLtv: 0.75,
  flipHoldingMonths: 6,
  flipAgentFeeRate: 0.015,
  flipFixedSellingCosts: 1000,
  rentGrowthRate: 0.03,
  capitalGrowthRate: 0.04,
  projectionYears: 5,
  targets: {
    grossYieldPct: 6,
    monthlyCashflow: 200,
    cashOnCashPct: 8,
  },
};
