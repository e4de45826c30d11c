import { describe, expect, it } from "vitest";
import { defaultPolicy } from "../src/config/policy";
import { DealInput } from "../src/core/dto";
import { MissingFieldError, ValidationError, isEvaluationError } from "../src/core/errors";
import { evaluate } from "../src/core/evaluate";
import { isDealType, validateDeal } from "../src/core/validate";

const base: DealInput = {
  dealType: "BTL",
  purchasePrice: 185000,
  monthlyRent: 950,
  isSecondProperty: true,
};

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("validateDeal", () => {
  it("should normalize percents to fractions and apply defaults", () => {
    const deal = validateDeal(base, defaultPolicy);

    expect(deal.depositFraction).toBe(0.25);
    expect(deal.interestRate).toBeCloseTo(0.04, 10);
    expect(deal.fees).toEqual({ legal: 1500, valuation: 500, arrangement: 1995 });
    expect(deal.refurbCost).toBe(0);
    expect(deal.valuationBasis).toBe(185000);
  });

  describe("deposit bounds", () => {
    it.each([20, 40])("should accept a %s%% deposit", (depositPercent) => {
      expect(() => evaluate({ ...base, depositPercent })).not.toThrow();
    });

    it.each([19.9, 40.1])("should reject a %s%% deposit", (depositPercent) => {
      const error = captureError(() => evaluate({ ...base, depositPercent }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        field: "depositPercent",
        message: `Deposit percentage ${depositPercent} is outside valid range (20-40)`,
      });
    });
  });

  describe("interest rate", () => {
    it("should reject zero", () => {
      expect(() => evaluate({ ...base, interestRatePercent: 0 })).toThrow(
        ValidationError
      );
    });

    it("should reject rates above the maximum", () => {
      expect(() => evaluate({ ...base, interestRatePercent: 25 })).toThrow(
        "Interest rate 25 is outside valid range (0-20]"
      );
    });

    it("should accept the maximum", () => {
      expect(evaluate({ ...base, interestRatePercent: 20 }).verdict).toBe("AVOID");
    });
  });

  describe("numeric fields", () => {
    it("should reject a zero purchase price", () => {
      const error = captureError(() => evaluate({ ...base, purchasePrice: 0 }));
      expect(error).toMatchObject({ field: "purchasePrice" });
    });

    it("should reject non-finite values", () => {
      expect(() => evaluate({ ...base, purchasePrice: Number.NaN })).toThrow(
        "purchasePrice must be a finite number"
      );
      expect(() =>
        evaluate({ ...base, monthlyRent: Number.POSITIVE_INFINITY })
      ).toThrow("monthlyRent must be a finite number");
    });

    it("should reject negative rent", () => {
      expect(() => evaluate({ ...base, monthlyRent: -1 })).toThrow(
        "monthlyRent must not be negative"
      );
    });

    it("should reject negative fee overrides", () => {
      const error = captureError(() =>
        evaluate({ ...base, fees: { valuation: -50 } })
      );
      expect(error).toMatchObject({ field: "fees.valuation" });
    });

    it("should accept zero rent for a buy-to-let", () => {
      const result = evaluate({ ...base, monthlyRent: 0 });
      expect(result.verdict).toBe("AVOID");
      expect(result.risk.tenantDemand).toBe("HIGH");
    });
  });

  describe("deal type requirements", () => {
    it("should raise MissingFieldError for a BRR without ARV", () => {
      const error = captureError(() =>
        evaluate({
          dealType: "BRR",
          purchasePrice: 150000,
          monthlyRent: 1000,
          refurbCost: 30000,
          isSecondProperty: true,
        })
      );

      expect(error).toBeInstanceOf(MissingFieldError);
      expect(error).toMatchObject({
        field: "afterRepairValue",
        dealType: "BRR",
        message: "afterRepairValue is required for BRR deals",
      });
    });

    it("should raise MissingFieldError for an HMO without rooms", () => {
      const error = captureError(() =>
        evaluate({
          dealType: "HMO",
          purchasePrice: 200000,
          roomRate: 500,
          isSecondProperty: false,
        })
      );
      expect(error).toBeInstanceOf(MissingFieldError);
      expect(error).toMatchObject({ field: "roomCount" });
    });

    it("should reject fractional room counts", () => {
      expect(() =>
        evaluate({
          dealType: "HMO",
          purchasePrice: 200000,
          roomCount: 2.5,
          roomRate: 500,
          isSecondProperty: false,
        })
      ).toThrow("roomCount must be a whole number of at least 1");
    });

    it("should reject a zero ARV", () => {
      expect(() =>
        evaluate({
          dealType: "FLIP",
          purchasePrice: 100000,
          monthlyRent: 0,
          afterRepairValue: 0,
          isSecondProperty: true,
        })
      ).toThrow(ValidationError);
    });

    it("should reject an unknown deal type", () => {
      const input: DealInput = JSON.parse(
        '{"dealType":"LAND","purchasePrice":100000,"monthlyRent":0,"isSecondProperty":false}'
      );
      const error = captureError(() => evaluate(input));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "dealType" });
    });

    it("should reject a missing second-property flag", () => {
      const input: DealInput = JSON.parse(
        '{"dealType":"BTL","purchasePrice":100000,"monthlyRent":500}'
      );
      expect(() => evaluate(input)).toThrow("isSecondProperty must be a boolean");
    });
  });

  describe("helpers", () => {
    it("should recognise deal types", () => {
      expect(isDealType("FLIP")).toBe(true);
      expect(isDealType("flip")).toBe(false);
      expect(isDealType(undefined)).toBe(false);
    });

    it("should identify evaluation errors", () => {
      expect(isEvaluationError(new ValidationError("x", "bad"))).toBe(true);
      expect(isEvaluationError(new MissingFieldError("x", "BRR"))).toBe(true);
      expect(isEvaluationError(new Error("other"))).toBe(false);
    });
  });
});
