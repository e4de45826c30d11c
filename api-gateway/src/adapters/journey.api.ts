import { z } from "zod";
import { Journey } from "../core/dto";
import { UpstreamError } from "../core/errors";
import { JourneyPort } from "../core/ports";
import { FetchFn } from "./land-registry.api";

export interface TflJourneyOptions {
  baseUrl: string;
  timeoutMs: number;
  appKey?: string;
  mockMode?: boolean;
  fetchFn?: FetchFn;
}

const journeySchema = z.object({
  duration: z.number().optional(),
  startDateTime: z.string().optional(),
  arrivalDateTime: z.string().optional(),
  legs: z
    .array(z.object({ mode: z.object({ name: z.string().optional() }).optional() }))
    .default([]),
  fare: z.object({ totalCost: z.number().optional() }).optional(),
});

const journeyResponseSchema = z.object({
  journeys: z.array(journeySchema).default([]),
});

type PlannedJourney = z.infer<typeof journeySchema>;

// 300 is TfL asking which of several matching places was meant
const NO_JOURNEY_STATUSES = [300, 404];

/**
 * Transport for London Journey Planner
 */
export class TflJourneyAPI implements JourneyPort {
  private fetchFn: FetchFn;

  constructor(private options: TflJourneyOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fastestJourney(from: string, to: string): Promise<Journey | null> {
    if (this.options.mockMode) {
      return this.getMockJourney(from, to);
    }

    const params = new URLSearchParams();
    if (this.options.appKey) {
      params.set("app_key", this.options.appKey);
    }
    const query = params.toString();
    const url =
      `${this.options.baseUrl}/Journey/JourneyResults/` +
      `${encodeURIComponent(from)}/to/${encodeURIComponent(to)}` +
      (query ? `?${query}` : "");

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError(
        "tfl-journey",
        `TfL journey request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (NO_JOURNEY_STATUSES.includes(response.status)) return null;
    if (!response.ok) {
      throw new UpstreamError(
        "tfl-journey",
        `TfL journey planner responded with ${response.status}`,
        response.status
      );
    }

    const parsed = journeyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError("tfl-journey", "Unexpected TfL journey response");
    }

    return fastest(from, to, parsed.data.journeys);
  }

  private getMockJourney(from: string, to: string): Journey {
    return {
      from,
      to,
      durationMinutes: 15 + ((from.length + to.length) % 30),
      departureTime: null,
      arrivalTime: null,
      modes: ["walking", "tube"],
      legs: 3,
      fare: 280,
    };
  }
}

function fastest(
  from: string,
  to: string,
  journeys: PlannedJourney[]
): Journey | null {
  let best: { journey: PlannedJourney; duration: number } | undefined;
  for (const journey of journeys) {
    if (journey.duration === undefined) continue;
    if (!best || journey.duration < best.duration) {
      best = { journey, duration: journey.duration };
    }
  }
  if (!best) return null;

  const { journey, duration } = best;
  const modes = new Set(
    journey.legs.flatMap((leg) => (leg.mode?.name ? [leg.mode.name] : []))
  );

  return {
    from,
    to,
    durationMinutes: duration,
    departureTime: journey.startDateTime ?? null,
    arrivalTime: journey.arrivalDateTime ?? null,
    modes: [...modes],
    legs: journey.legs.length,
    fare: journey.fare?.totalCost ?? null,
  };
}
