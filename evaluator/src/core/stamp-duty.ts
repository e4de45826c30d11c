import { StampDutyPolicy } from "../config/policy";
import { Money } from "./dto";

export interface StampDutyBreakdown {
  banded: Money;
  surcharge: Money;
  total: Money;
}

/**
 * Marginal SDLT: each slice of the price is taxed at its own band's rate.
 * Bands must be ordered by ascending upper bound.
 */
export function bandedStampDuty(
  price: Money,
  bands: StampDutyPolicy["bands"]
): Money {
  let tax = 0;
  let lower = 0;

  for (const band of bands) {
    if (price <= lower) break;
    const portion = Math.min(price, band.upTo) - lower;
    tax += portion * band.rate;
    lower = band.upTo;
  }

  return tax;
}

/**
 * Calculate stamp duty, adding the additional-property surcharge on the
 * whole price when the purchase is a second property
 */
export function calculateStampDuty(
  price: Money,
  isSecondProperty: boolean,
  policy: StampDutyPolicy
): StampDutyBreakdown {
  const banded = bandedStampDuty(price, policy.bands);
  const surcharge = isSecondProperty ? price * policy.surchargeRate : 0;

  return {
    banded,
    surcharge,
    total: banded + surcharge,
  };
}
