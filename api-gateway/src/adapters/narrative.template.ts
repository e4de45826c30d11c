import { RiskCategory, Verdict } from "@dealcheck/evaluator";
import { AreaContext, Narrative, NarrativeRequest } from "../core/dto";
import { NarrativePort } from "../core/ports";

const VERDICT_TEXT: Record<Verdict, (score: number) => string> = {
  PROCEED: (score) =>
    `This property represents a strong investment opportunity with a deal score of ${score}/100. The fundamentals support a PROCEED recommendation.`,
  REVIEW: (score) =>
    `This deal requires further investigation with a score of ${score}/100. Consider negotiating the price or exploring alternative strategies.`,
  AVOID: (score) =>
    `This deal scores ${score}/100 and falls below investment criteria. Better opportunities likely exist elsewhere.`,
};

const RISK_CATEGORIES: readonly RiskCategory[] = [
  "market",
  "tenantDemand",
  "refurb",
  "finance",
];

const RISK_LABELS: Record<RiskCategory, string> = {
  market: "market",
  tenantDemand: "tenant demand",
  refurb: "refurbishment",
  finance: "finance",
};

function bullets(items: readonly string[], empty: string): string {
  return (items.length > 0 ? items : [empty]).map((item) => `• ${item}`).join("\n");
}

function pounds(amount: number): string {
  return `£${Math.round(amount).toLocaleString("en-GB")}`;
}

export function describeArea(area: AreaContext): string {
  const parts: string[] = [];

  if (area.soldPrices && area.soldPrices.averagePrice !== null) {
    parts.push(
      `Average sold price in ${area.soldPrices.postcode} is ${pounds(area.soldPrices.averagePrice)} across ${area.soldPrices.count} recent sales.`
    );
  }
  if (area.priceTrend && area.priceTrend.changePercent !== null) {
    parts.push(
      `Prices are ${area.priceTrend.direction} (${area.priceTrend.changePercent}% over six months).`
    );
  }
  if (area.transport && area.transport.nearestStop !== null) {
    parts.push(
      `${area.transport.rating} transport links (${area.transport.score}/10), nearest stop ${area.transport.nearestStop} at ${area.transport.nearestDistance}m.`
    );
  }
  if (area.crime) {
    const month = area.crime.month ? ` in ${area.crime.month}` : "";
    parts.push(
      `${area.crime.level} street crime (${area.crime.total} reports${month}).`
    );
  }

  if (parts.length > 0) return parts.join(" ");
  return area.postcode
    ? `No area data available for ${area.postcode}.`
    : "Area assessment unavailable.";
}

/**
 * Verdict-keyed report text assembled from the analysis
 */
export class TemplateNarrativeAdapter implements NarrativePort {
  async generate({ analysis, area }: NarrativeRequest): Promise<Narrative> {
    const highRisks = RISK_CATEGORIES
      .filter((category) => analysis.risk[category] === "HIGH")
      .map((category) => `High ${RISK_LABELS[category]} risk`);

    return {
      verdict: VERDICT_TEXT[analysis.verdict](analysis.score.value),
      strengths: bullets(
        analysis.highlights.strengths,
        "No metric meets its investment target"
      ),
      risks: bullets(
        [...analysis.highlights.weaknesses, ...highRisks],
        "No major risks identified"
      ),
      area: describeArea(area),
      nextSteps: analysis.highlights.nextSteps
        .map((step, i) => `${i + 1}. ${step}`)
        .join("\n"),
    };
  }
}
