import { z } from "zod";
import { TransportStop } from "../core/dto";
import { UpstreamError } from "../core/errors";
import { TransportPort } from "../core/ports";
import { FetchFn } from "./land-registry.api";

export interface TflOptions {
  baseUrl: string;
  timeoutMs: number;
  appKey?: string;
  mockMode?: boolean;
  fetchFn?: FetchFn;
}

const STOP_TYPES = [
  "NaptanMetroStation",
  "NaptanRailStation",
  "NaptanPublicBusCoachTram",
].join(",");

const stopPointSchema = z.object({
  id: z.string().default(""),
  commonName: z.string().default("Unknown"),
  distance: z.number().default(9999),
  modes: z.array(z.string()).default([]),
  lines: z.array(z.object({ name: z.string().optional() })).default([]),
  lat: z.number().default(0),
  lon: z.number().default(0),
});

const stopPointResponseSchema = z.object({
  stopPoints: z.array(stopPointSchema).default([]),
});

/**
 * Transport for London StopPoint search around a coordinate
 */
export class TflStopPointAPI implements TransportPort {
  private fetchFn: FetchFn;

  constructor(private options: TflOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async nearbyStops(
    lat: number,
    lon: number,
    radiusMeters: number
  ): Promise<TransportStop[]> {
    if (this.options.mockMode) {
      return this.getMockStops(lat, lon);
    }

    const params = new URLSearchParams({
      lat: String(lat),
      lon: String(lon),
      stopTypes: STOP_TYPES,
      radius: String(radiusMeters),
      returnLines: "true",
    });
    if (this.options.appKey) {
      params.set("app_key", this.options.appKey);
    }

    let response: Response;
    try {
      response = await this.fetchFn(
        `${this.options.baseUrl}/StopPoint?${params.toString()}`,
        { signal: AbortSignal.timeout(this.options.timeoutMs) }
      );
    } catch (error) {
      throw new UpstreamError(
        "tfl",
        `TfL request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw new UpstreamError(
        "tfl",
        `TfL responded with ${response.status}`,
        response.status
      );
    }

    const parsed = stopPointResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("tfl", "Unexpected TfL response");
    }

    return parsed.data.stopPoints
      .map((stop) => ({
        id: stop.id,
        name: stop.commonName,
        distance: stop.distance,
        modes: stop.modes,
        lines: stop.lines.flatMap((line) => (line.name ? [line.name] : [])),
        lat: stop.lat,
        lon: stop.lon,
      }))
      .sort((a, b) => a.distance - b.distance);
  }

  private getMockStops(lat: number, lon: number): TransportStop[] {
    // Greater London gets tube and rail, elsewhere a single bus stop
    const inLondon = lat >= 51.28 && lat <= 51.7 && lon >= -0.51 && lon <= 0.33;
    const offset = Math.abs(Math.floor(lat * 1000) % 400);

    if (!inLondon) {
      return [
        {
          id: "mock-bus",
          name: "Mock Bus Stop",
          distance: 800 + offset,
          modes: ["bus"],
          lines: ["1"],
          lat,
          lon,
        },
      ];
    }

    return [
      {
        id: "mock-tube",
        name: "Mock Underground Station",
        distance: 200 + offset,
        modes: ["tube"],
        lines: ["Central"],
        lat,
        lon,
      },
      {
        id: "mock-rail",
        name: "Mock Rail Station",
        distance: 900 + offset,
        modes: ["national-rail", "overground"],
        lines: ["Mock Line"],
        lat,
        lon,
      },
    ];
  }
}
