import { CostAssumptions, StampDutyPolicy } from "../config/policy";
import {
  CostBreakdown,
  IncomeBreakdown,
  Money,
  NormalizedDeal,
  OperatingExpenses,
  Ratios,
} from "./dto";
import { ValidationError } from "./errors";
import { calculateStampDuty } from "./stamp-duty";

/**
 * Interest-only monthly payment, the usual basis for BTL mortgage products
 * @param loan Loan amount
 * @param annualRate Annual rate as a fraction (0.04 = 4%)
 */
export function interestOnlyPayment(loan: Money, annualRate: number): Money {
  return (loan * annualRate) / 12;
}

/**
 * Purchase costs, financing split and cash the investor has to put in
 */
export function computeCosts(
  deal: NormalizedDeal,
  stampDutyPolicy: StampDutyPolicy
): CostBreakdown {
  const stampDuty = calculateStampDuty(
    deal.purchasePrice,
    deal.isSecondProperty,
    stampDutyPolicy
  );

  const totalFees =
    deal.fees.legal + deal.fees.valuation + deal.fees.arrangement;
  const totalPurchaseCosts = deal.purchasePrice + stampDuty.total + totalFees;

  const depositAmount = deal.purchasePrice * deal.depositFraction;
  const loanAmount = deal.purchasePrice - depositAmount;

  const totalCashInvested =
    depositAmount + stampDuty.total + totalFees + deal.refurbCost;

  return {
    stampDuty: stampDuty.total,
    stampDutySurcharge: stampDuty.surcharge,
    fees: { ...deal.fees },
    totalFees,
    totalPurchaseCosts,
    depositAmount,
    loanAmount,
    loanToValue: loanAmount / deal.purchasePrice,
    refurbCost: deal.refurbCost,
    totalCashInvested,
  };
}

/**
 * Running costs of a let property, excluding finance
 */
export function operatingExpenses(
  annualRent: Money,
  costs: CostAssumptions
): OperatingExpenses {
  const management = annualRent * costs.managementRate;
  const voidAllowance = (annualRent * costs.voidWeeks) / 52;
  const maintenance = annualRent * costs.maintenanceRate;
  const insurance = costs.annualInsurance;

  return {
    management,
    voidAllowance,
    maintenance,
    insurance,
    total: management + voidAllowance + maintenance + insurance,
  };
}

export function computeIncome(
  deal: NormalizedDeal,
  loanAmount: Money,
  costs: CostAssumptions
): IncomeBreakdown {
  const annualRent = deal.monthlyRent * 12;
  const monthlyMortgage = interestOnlyPayment(loanAmount, deal.interestRate);
  const annualMortgage = monthlyMortgage * 12;
  const expenses = operatingExpenses(annualRent, costs);

  const netAnnualIncome = annualRent - expenses.total - annualMortgage;

  return {
    monthlyRent: deal.monthlyRent,
    annualRent,
    monthlyMortgage,
    annualMortgage,
    expenses,
    netAnnualIncome,
    monthlyCashflow: netAnnualIncome / 12,
  };
}

/**
 * Share of the full rent that has to be collected to cover running costs
 * and finance; voids are what the ratio measures, so they are left out
 */
function calculateBreakEvenOccupancy(income: IncomeBreakdown): number {
  if (income.annualRent === 0) return 1;
  const fixed =
    income.expenses.total - income.expenses.voidAllowance + income.annualMortgage;
  return Math.min(1, fixed / income.annualRent);
}

/**
 * Yields use the valuation basis (ARV for BRR/FLIP, price otherwise)
 * @throws ValidationError when a denominator is zero
 */
export function computeRatios(
  valuationBasis: Money,
  costs: CostBreakdown,
  income: IncomeBreakdown
): Ratios {
  if (valuationBasis <= 0) {
    throw new ValidationError(
      "purchasePrice",
      "Valuation basis must be greater than zero to compute yields"
    );
  }
  if (costs.totalCashInvested <= 0) {
    throw new ValidationError(
      "depositPercent",
      "Total cash invested must be greater than zero to compute cash-on-cash return"
    );
  }

  const grossYield = (income.annualRent / valuationBasis) * 100;
  const netYield =
    ((income.annualRent - income.expenses.total) / valuationBasis) * 100;
  const cashOnCash = (income.netAnnualIncome / costs.totalCashInvested) * 100;
  const interestCoverRatio =
    income.annualMortgage > 0 ? income.annualRent / income.annualMortgage : 0;

  return {
    grossYield,
    netYield,
    cashOnCash,
    interestCoverRatio,
    breakEvenOccupancy: calculateBreakEvenOccupancy(income),
  };
}
