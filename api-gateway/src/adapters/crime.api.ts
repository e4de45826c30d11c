import { z } from "zod";
import { StreetCrime } from "../core/dto";
import { UpstreamError } from "../core/errors";
import { CrimePort } from "../core/ports";
import { FetchFn } from "./land-registry.api";

export interface PoliceOptions {
  baseUrl: string;
  timeoutMs: number;
  mockMode?: boolean;
  fetchFn?: FetchFn;
}

const streetCrimeSchema = z.array(
  z.object({
    category: z.string(),
    month: z.string(),
  })
);

const MOCK_CATEGORIES = [
  "anti-social-behaviour",
  "violent-crime",
  "burglary",
  "vehicle-crime",
  "shoplifting",
];

/**
 * data.police.uk street-level crimes within a mile of a point
 */
export class PoliceCrimeAPI implements CrimePort {
  private fetchFn: FetchFn;

  constructor(private options: PoliceOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async streetCrimes(lat: number, lon: number): Promise<StreetCrime[]> {
    if (this.options.mockMode) {
      return this.getMockCrimes(lat, lon);
    }

    const params = new URLSearchParams({ lat: String(lat), lng: String(lon) });

    let response: Response;
    try {
      response = await this.fetchFn(
        `${this.options.baseUrl}/crimes-street/all-crime?${params.toString()}`,
        { signal: AbortSignal.timeout(this.options.timeoutMs) }
      );
    } catch (error) {
      throw new UpstreamError(
        "police",
        `Police API request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw new UpstreamError(
        "police",
        `Police API responded with ${response.status}`,
        response.status
      );
    }

    const parsed = streetCrimeSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("police", "Unexpected Police API response");
    }

    return parsed.data.map(({ category, month }) => ({ category, month }));
  }

  private getMockCrimes(lat: number, lon: number): StreetCrime[] {
    const count = Math.abs(Math.floor(lat * 100) + Math.floor(lon * 100)) % 180;
    return Array.from({ length: count }, (_, i) => ({
      category: MOCK_CATEGORIES[i % MOCK_CATEGORIES.length] ?? "other-crime",
      month: "2024-01",
    }));
  }
}
