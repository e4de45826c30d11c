import { EvaluationPolicy } from "../config/policy";
import { DealInput, DealType, FeeSchedule, NormalizedDeal } from "./dto";
import { MissingFieldError, ValidationError } from "./errors";

const DEAL_TYPES: readonly DealType[] = ["BTL", "BRR", "HMO", "FLIP"];

export function isDealType(value: unknown): value is DealType {
  return typeof value === "string" && DEAL_TYPES.some((t) => t === value);
}

function requireFinite(field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(field, `${field} must be a finite number`);
  }
  return value;
}

function requireNonNegative(field: string, value: unknown): number {
  const num = requireFinite(field, value);
  if (num < 0) {
    throw new ValidationError(field, `${field} must not be negative`);
  }
  return num;
}

function requirePositive(field: string, value: unknown): number {
  const num = requireFinite(field, value);
  if (num <= 0) {
    throw new ValidationError(field, `${field} must be greater than zero`);
  }
  return num;
}

function requirePresent<T>(
  field: string,
  value: T | undefined | null,
  dealType: DealType
): T {
  if (value === undefined || value === null) {
    throw new MissingFieldError(field, dealType);
  }
  return value;
}

function resolveFees(
  input: DealInput,
  defaults: FeeSchedule
): FeeSchedule {
  const fees = input.fees ?? {};
  return {
    legal:
      fees.legal === undefined
        ? defaults.legal
        : requireNonNegative("fees.legal", fees.legal),
    valuation:
      fees.valuation === undefined
        ? defaults.valuation
        : requireNonNegative("fees.valuation", fees.valuation),
    arrangement:
      fees.arrangement === undefined
        ? defaults.arrangement
        : requireNonNegative("fees.arrangement", fees.arrangement),
  };
}

/**
 * Validate a deal and convert it to the normalized form the evaluator works on.
 * Percent inputs become fractions only after their bounds have been checked.
 * @throws ValidationError for malformed or out-of-range values
 * @throws MissingFieldError when a field the deal type needs is absent
 */
export function validateDeal(
  input: DealInput,
  policy: EvaluationPolicy
): NormalizedDeal {
  if (!isDealType(input.dealType)) {
    throw new ValidationError(
      "dealType",
      `Deal type ${String(input.dealType)} is not valid (BTL, BRR, HMO, FLIP)`
    );
  }
  const dealType = input.dealType;

  const purchasePrice = requirePositive("purchasePrice", input.purchasePrice);

  const { depositPercent: depositBounds, interestRatePercent: rateBounds } =
    policy.bounds;

  const depositPercent = requireFinite(
    "depositPercent",
    input.depositPercent ?? depositBounds.default
  );
  if (depositPercent < depositBounds.min || depositPercent > depositBounds.max) {
    throw new ValidationError(
      "depositPercent",
      `Deposit percentage ${depositPercent} is outside valid range (${depositBounds.min}-${depositBounds.max})`
    );
  }

  const interestRatePercent = requireFinite(
    "interestRatePercent",
    input.interestRatePercent ?? rateBounds.default
  );
  if (interestRatePercent <= 0 || interestRatePercent > rateBounds.max) {
    throw new ValidationError(
      "interestRatePercent",
      `Interest rate ${interestRatePercent} is outside valid range (0-${rateBounds.max}]`
    );
  }

  if (typeof input.isSecondProperty !== "boolean") {
    throw new ValidationError(
      "isSecondProperty",
      "isSecondProperty must be a boolean"
    );
  }

  const fees = resolveFees(input, policy.costs.defaultFees);

  let monthlyRent: number;
  let refurbCost = 0;
  let afterRepairValue: number | undefined;
  let valuationBasis = purchasePrice;

  switch (input.dealType) {
    case "BTL":
      monthlyRent = requireNonNegative("monthlyRent", input.monthlyRent);
      break;

    case "HMO": {
      const roomCount = requireNonNegative(
        "roomCount",
        requirePresent("roomCount", input.roomCount, dealType)
      );
      if (!Number.isInteger(roomCount) || roomCount < 1) {
        throw new ValidationError(
          "roomCount",
          "roomCount must be a whole number of at least 1"
        );
      }
      const roomRate = requireNonNegative(
        "roomRate",
        requirePresent("roomRate", input.roomRate, dealType)
      );
      monthlyRent = roomCount * roomRate;
      break;
    }

    case "BRR":
    case "FLIP": {
      monthlyRent = requireNonNegative("monthlyRent", input.monthlyRent);
      refurbCost =
        input.refurbCost === undefined
          ? 0
          : requireNonNegative("refurbCost", input.refurbCost);
      afterRepairValue = requireNonNegative(
        "afterRepairValue",
        requirePresent("afterRepairValue", input.afterRepairValue, dealType)
      );
      if (afterRepairValue === 0) {
        throw new ValidationError(
          "afterRepairValue",
          "afterRepairValue must be greater than zero to compute yields"
        );
      }
      valuationBasis = afterRepairValue;
      break;
    }

    default:
      throw new ValidationError("dealType", "Unsupported deal type");
  }

  return {
    dealType,
    purchasePrice,
    depositFraction: depositPercent / 100,
    interestRate: interestRatePercent / 100,
    isSecondProperty: input.isSecondProperty,
    fees,
    monthlyRent,
    refurbCost,
    afterRepairValue,
    valuationBasis,
  };
}
