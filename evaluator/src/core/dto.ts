export type Money = number;
export type Pct = number; // percent, e.g. 6.16 = 6.16%

export type DealType = "BTL" | "BRR" | "HMO" | "FLIP";
export type Verdict = "PROCEED" | "REVIEW" | "AVOID";
export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";
export type RiskCategory = "market" | "tenantDemand" | "refurb" | "finance";

export interface FeeOverrides {
  legal?: Money;
  valuation?: Money;
  arrangement?: Money;
}

export interface FeeSchedule {
  legal: Money;
  valuation: Money;
  arrangement: Money;
}

interface CommonDealInput {
  purchasePrice: Money;
  depositPercent?: Pct;           // 20..40, default 25
  interestRatePercent?: Pct;      // > 0, default 4.0
  isSecondProperty: boolean;      // SDLT surcharge
  fees?: FeeOverrides;
}

export interface BtlDealInput extends CommonDealInput {
  dealType: "BTL";
  monthlyRent: Money;
}

export interface HmoDealInput extends CommonDealInput {
  dealType: "HMO";
  roomCount?: number;             // required, checked at evaluation
  roomRate?: Money;               // monthly rent per room, required
  monthlyRent?: Money;            // ignored: income basis is rooms
}

export interface BrrDealInput extends CommonDealInput {
  dealType: "BRR";
  monthlyRent: Money;
  refurbCost?: Money;
  afterRepairValue?: Money;       // required, checked at evaluation
}

export interface FlipDealInput extends CommonDealInput {
  dealType: "FLIP";
  monthlyRent: Money;             // rent during the holding period, may be 0
  refurbCost?: Money;
  afterRepairValue?: Money;       // required, checked at evaluation
}

export type DealInput =
  | BtlDealInput
  | HmoDealInput
  | BrrDealInput
  | FlipDealInput;

/**
 * Input after validation: fractions instead of percents, defaults applied,
 * income basis and valuation basis resolved for the deal type.
 */
export interface NormalizedDeal {
  dealType: DealType;
  purchasePrice: Money;
  depositFraction: number;        // 0.20..0.40
  interestRate: number;           // annual, fraction
  isSecondProperty: boolean;
  fees: FeeSchedule;
  monthlyRent: Money;             // income basis
  refurbCost: Money;
  afterRepairValue?: Money;
  valuationBasis: Money;          // ARV for BRR/FLIP, price otherwise
}

export interface CostBreakdown {
  readonly stampDuty: Money;               // bands + surcharge
  readonly stampDutySurcharge: Money;
  readonly fees: FeeSchedule;
  readonly totalFees: Money;
  readonly totalPurchaseCosts: Money;      // price + SDLT + fees
  readonly depositAmount: Money;
  readonly loanAmount: Money;
  readonly loanToValue: number;            // fraction
  readonly refurbCost: Money;
  readonly totalCashInvested: Money;       // deposit + SDLT + fees + refurb
}

export interface OperatingExpenses {
  readonly management: Money;
  readonly voidAllowance: Money;
  readonly maintenance: Money;
  readonly insurance: Money;
  readonly total: Money;
}

export interface IncomeBreakdown {
  readonly monthlyRent: Money;
  readonly annualRent: Money;
  readonly monthlyMortgage: Money;         // interest-only
  readonly annualMortgage: Money;
  readonly expenses: OperatingExpenses;
  readonly netAnnualIncome: Money;
  readonly monthlyCashflow: Money;
}

export interface Ratios {
  readonly grossYield: Pct;
  readonly netYield: Pct;
  readonly cashOnCash: Pct;
  readonly interestCoverRatio: number;     // annual rent / annual mortgage
  readonly breakEvenOccupancy: number;     // fraction of rent needed to cover costs
}

export interface RiskRating {
  readonly market: RiskLevel;
  readonly tenantDemand: RiskLevel;
  readonly refurb: RiskLevel;
  readonly finance: RiskLevel;
  readonly overall: RiskLevel;
}

export interface DealResult {
  readonly dealType: DealType;
  readonly purchasePrice: Money;
  readonly valuationBasis: Money;
  readonly costs: CostBreakdown;
  readonly income: IncomeBreakdown;
  readonly ratios: Ratios;
  readonly verdict: Verdict;
  readonly risk: RiskRating;
}

export interface BrrMetrics {
  readonly kind: "BRR";
  readonly totalInvestment: Money;
  readonly equityCreated: Money;
  readonly refinanceAmount: Money;
  readonly moneyLeftIn: Money;
  readonly roi: Pct;
}

export interface FlipMetrics {
  readonly kind: "FLIP";
  readonly holdingCosts: Money;
  readonly sellingCosts: Money;
  readonly totalCosts: Money;
  readonly profit: Money;
  readonly roi: Pct;
}

export type StrategyMetrics = BrrMetrics | FlipMetrics;

export type ScoreLabel = "Excellent" | "Good" | "Fair" | "Weak" | "Poor";

export interface DealScore {
  readonly value: number;                  // 0..100
  readonly label: ScoreLabel;
}

export interface ProjectionYear {
  readonly year: number;
  readonly annualRent: Money;
  readonly annualNet: Money;
  readonly cumulativeCashflow: Money;
  readonly propertyValue: Money;
  readonly equity: Money;
  readonly totalReturn: Money;
}

export interface Highlights {
  readonly strengths: readonly string[];
  readonly weaknesses: readonly string[];
  readonly nextSteps: readonly string[];
}

export interface DealAnalysis extends DealResult {
  readonly strategy?: StrategyMetrics;
  readonly score: DealScore;
  readonly projection: readonly ProjectionYear[];
  readonly highlights: Highlights;
}
