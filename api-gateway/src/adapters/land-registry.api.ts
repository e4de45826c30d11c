import { z } from "zod";
import { isValidPostcode, normalizePostcode } from "../core/area";
import { SoldPrice } from "../core/dto";
import { UpstreamError } from "../core/errors";
import { SoldPricesPort } from "../core/ports";

export type FetchFn = typeof fetch;

export interface LandRegistryOptions {
  endpoint: string;
  timeoutMs: number;
  mockMode?: boolean;
  fetchFn?: FetchFn;
  now?: () => Date;
}

const bindingValue = z.object({ value: z.string() });

const sparqlResponseSchema = z.object({
  results: z.object({
    bindings: z.array(
      z.object({
        price: bindingValue,
        date: bindingValue,
        street: bindingValue.optional(),
        town: bindingValue.optional(),
      })
    ),
  }),
});

const PREFIXES = `
PREFIX xsd: <http://www.w3.org/2001/XMLSchema#>
PREFIX ppd: <http://landregistry.data.gov.uk/def/ppi/>
PREFIX lrcommon: <http://landregistry.data.gov.uk/def/common/>`;

/**
 * Build the price-paid SPARQL query for one postcode
 */
export function buildSalesQuery(
  postcode: string,
  options: { limit: number; start?: string; end?: string }
): string {
  if (!isValidPostcode(postcode)) {
    throw new Error(`Invalid UK postcode: ${postcode}`);
  }
  const filters = [
    options.start ? `FILTER (?date >= "${options.start}"^^xsd:date)` : "",
    options.end ? `FILTER (?date < "${options.end}"^^xsd:date)` : "",
  ].filter(Boolean);

  return `${PREFIXES}
SELECT ?price ?date ?street ?town
WHERE {
  ?transaction ppd:pricePaid ?price ;
               ppd:transactionDate ?date ;
               ppd:propertyAddress ?property .
  ?property lrcommon:postcode "${normalizePostcode(postcode)}"^^xsd:string .
  OPTIONAL { ?property lrcommon:street ?street }
  OPTIONAL { ?property lrcommon:town ?town }
  ${filters.join("\n  ")}
}
ORDER BY DESC(?date)
LIMIT ${options.limit}`;
}

/**
 * HM Land Registry price paid data over the public SPARQL endpoint
 */
export class LandRegistryAPI implements SoldPricesPort {
  private fetchFn: FetchFn;
  private now: () => Date;

  constructor(private options: LandRegistryOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async recentSales(postcode: string, limit: number): Promise<SoldPrice[]> {
    if (this.options.mockMode) {
      return this.getMockSales(postcode).slice(0, limit);
    }
    return this.query(buildSalesQuery(postcode, { limit }));
  }

  async salesBetween(
    postcode: string,
    start: string,
    end: string
  ): Promise<SoldPrice[]> {
    if (this.options.mockMode) {
      return this.getMockSales(postcode).filter(
        (sale) => sale.date >= start && sale.date < end
      );
    }
    return this.query(buildSalesQuery(postcode, { limit: 500, start, end }));
  }

  private async query(query: string): Promise<SoldPrice[]> {
    let response: Response;
    try {
      response = await this.fetchFn(this.options.endpoint, {
        method: "POST",
        headers: {
          Accept: "application/sparql-results+json",
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ query }).toString(),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError(
        "land-registry",
        `Land Registry request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw new UpstreamError(
        "land-registry",
        `Land Registry responded with ${response.status}`,
        response.status
      );
    }

    const parsed = sparqlResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("land-registry", "Unexpected Land Registry response");
    }

    return parsed.data.results.bindings.map((binding) => ({
      price: Math.round(Number(binding.price.value)),
      date: binding.date.value.slice(0, 10),
      street: binding.street?.value ?? "N/A",
      town: binding.town?.value ?? "N/A",
    }));
  }

  /**
   * Deterministic monthly sales over the last year, newest first
   */
  private getMockSales(postcode: string): SoldPrice[] {
    const hash = [...normalizePostcode(postcode)].reduce(
      (sum, ch) => (sum * 31 + ch.charCodeAt(0)) % 100_000,
      7
    );
    const base = 150_000 + (hash % 200) * 1_000;
    const today = this.now();

    return Array.from({ length: 12 }, (_, i) => {
      const date = new Date(
        Date.UTC(today.getUTCFullYear(), today.getUTCMonth() - i, 15)
      );
      return {
        price: base - i * 1_000,
        date: date.toISOString().slice(0, 10),
        street: "HIGH STREET",
        town: "MOCKTON",
      };
    });
  }
}
