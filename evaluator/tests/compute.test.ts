import { describe, expect, it } from "vitest";
import { analyticsPolicy } from "../src/config/policy";
import {
  buildHighlights,
  dealScore,
  projectReturns,
  scoreFromResult,
  scoreLabel,
} from "../src/core/compute";
import { DealInput, ScoreLabel } from "../src/core/dto";
import { evaluate } from "../src/core/evaluate";

const strongBtl: DealInput = {
  dealType: "BTL",
  purchasePrice: 185000,
  monthlyRent: 950,
  depositPercent: 25,
  interestRatePercent: 4.0,
  isSecondProperty: true,
};

const weakBtl: DealInput = {
  dealType: "BTL",
  purchasePrice: 400000,
  monthlyRent: 800,
  depositPercent: 25,
  interestRatePercent: 6.0,
  isSecondProperty: false,
};

describe("Deal Analytics", () => {
  describe("scoreFromResult", () => {
    it("should cap a strong deal at 100", () => {
      expect(scoreFromResult(evaluate(strongBtl))).toBe(100);
    });

    it("should penalise every weak factor", () => {
      // 50 - 10 yield - 15 cashflow - 10 cash-on-cash + 0 net yield - 5 risk
      expect(scoreFromResult(evaluate(weakBtl))).toBe(10);
    });

    it("should stay within 0-100", () => {
      const rents = [0, 200, 800, 1500, 4000];
      for (const monthlyRent of rents) {
        const score = scoreFromResult(evaluate({ ...weakBtl, monthlyRent }));
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
      }
    });
  });

  describe("scoreLabel", () => {
    it.each<[number, ScoreLabel]>([
      [100, "Excellent"],
      [80, "Excellent"],
      [79, "Good"],
      [65, "Good"],
      [50, "Fair"],
      [35, "Weak"],
      [34, "Poor"],
      [0, "Poor"],
    ])("should label %i as %s", (score, label) => {
      expect(scoreLabel(score)).toBe(label);
    });

    it("should pair the score with its label", () => {
      expect(dealScore(evaluate(weakBtl))).toEqual({ value: 10, label: "Poor" });
    });
  });

  describe("projectReturns", () => {
    const years = projectReturns(evaluate(strongBtl), analyticsPolicy);

    it("should project five years", () => {
      expect(years.map((y) => y.year)).toEqual([1, 2, 3, 4, 5]);
    });

    it("should grow rent and value from the first year", () => {
      expect(years[0]).toEqual({
        year: 1,
        annualRent: 11742,
        annualNet: 2966,
        cumulativeCashflow: 2966,
        propertyValue: 192400,
        equity: 53650,
        totalReturn: 10366,
      });
    });

    it("should compound growth over the horizon", () => {
      const last = years[years.length - 1];
      expect(last?.annualRent).toBe(13216);
      expect(last?.propertyValue).toBe(225081);
    });

    it("should accumulate cashflow year on year", () => {
      for (let i = 1; i < years.length; i++) {
        const current = years[i];
        const previous = years[i - 1];
        if (!current || !previous) throw new Error("missing projection year");
        expect(current.cumulativeCashflow).toBeGreaterThan(previous.cumulativeCashflow);
      }
    });

    it("should project no income for an unlet property", () => {
      const unlet = projectReturns(
        evaluate({ ...strongBtl, monthlyRent: 0 }),
        analyticsPolicy
      );
      expect(unlet.every((y) => y.annualNet === 0)).toBe(true);
    });
  });

  describe("buildHighlights", () => {
    it("should list strengths and weaknesses against targets", () => {
      const highlights = buildHighlights(evaluate(strongBtl), analyticsPolicy);

      expect(highlights.strengths).toEqual([
        "Strong gross yield of 6.16% exceeds 6% target",
        "Healthy monthly cashflow of £240 provides good buffer",
      ]);
      expect(highlights.weaknesses).toEqual([
        "Cash-on-cash return of 4.74% is below 8% target",
      ]);
      expect(highlights.nextSteps[0]).toBe("Verify rental comparables in the area");
    });

    it("should describe a weak deal", () => {
      const highlights = buildHighlights(evaluate(weakBtl), analyticsPolicy);

      expect(highlights.strengths).toEqual([]);
      expect(highlights.weaknesses).toEqual([
        "Gross yield of 2.40% is below 6% target",
        "Monthly cashflow of £-915 is below £200 target",
        "Cash-on-cash return of -9.63% is below 8% target",
      ]);
    });

    it("should give each verdict its own next steps", () => {
      const proceed = evaluate(strongBtl);
      // 5.51% gross yield with £161.81 monthly cashflow
      const review = evaluate({ ...strongBtl, monthlyRent: 850 });
      const avoid = evaluate(weakBtl);

      expect([proceed.verdict, review.verdict, avoid.verdict]).toEqual([
        "PROCEED",
        "REVIEW",
        "AVOID",
      ]);
      expect(buildHighlights(proceed, analyticsPolicy).nextSteps[0]).toBe(
        "Verify rental comparables in the area"
      );
      expect(buildHighlights(review, analyticsPolicy).nextSteps[0]).toBe(
        "Review comparable sales in area"
      );
      expect(buildHighlights(avoid, analyticsPolicy).nextSteps).toEqual([
        "Walk away unless the price or rent changes materially",
        "Continue searching for better opportunities",
        "Adjust search criteria if needed",
        "Consider different areas with higher yields",
      ]);
    });
  });
});
