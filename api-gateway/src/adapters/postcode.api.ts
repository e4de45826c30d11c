import { z } from "zod";
import { isLondonPostcode } from "../core/area";
import { Coordinates } from "../core/dto";
import { UpstreamError } from "../core/errors";
import { GeocoderPort } from "../core/ports";
import { FetchFn } from "./land-registry.api";

export interface PostcodesIoOptions {
  baseUrl: string;
  timeoutMs: number;
  mockMode?: boolean;
  fetchFn?: FetchFn;
}

const lookupSchema = z.object({
  result: z.object({
    latitude: z.number().nullable(),
    longitude: z.number().nullable(),
  }),
});

/**
 * Postcode centroids from postcodes.io
 */
export class PostcodesIoAPI implements GeocoderPort {
  private fetchFn: FetchFn;

  constructor(private options: PostcodesIoOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async locate(postcode: string): Promise<Coordinates | null> {
    if (this.options.mockMode) {
      return this.getMockCoordinates(postcode);
    }

    const compact = postcode.replace(/\s+/g, "");
    let response: Response;
    try {
      response = await this.fetchFn(
        `${this.options.baseUrl}/postcodes/${encodeURIComponent(compact)}`,
        { signal: AbortSignal.timeout(this.options.timeoutMs) }
      );
    } catch (error) {
      throw new UpstreamError(
        "postcodes",
        `Postcode lookup failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new UpstreamError(
        "postcodes",
        `Postcode lookup responded with ${response.status}`,
        response.status
      );
    }

    const parsed = lookupSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("postcodes", "Unexpected postcode lookup response");
    }

    const { latitude, longitude } = parsed.data.result;
    if (latitude === null || longitude === null) return null;
    return { lat: latitude, lon: longitude };
  }

  private getMockCoordinates(postcode: string): Coordinates {
    // Central London or central Manchester
    return isLondonPostcode(postcode)
      ? { lat: 51.5072, lon: -0.1276 }
      : { lat: 53.4808, lon: -2.2426 };
  }
}
