/**
 * API Gateway Orchestration Logic
 *
 * Runs the evaluator, gathers area context from the outbound sources in
 * parallel and asks the narrative writer for the report text. Area data is
 * informational: it never feeds back into the verdict.
 */

import {
  analyzeDeal,
  DealAnalysis,
  DealInput,
  EvaluationPolicy,
} from "@dealcheck/evaluator";
import { cached, Logger } from "@dealcheck/shared-utils";
import {
  computePriceTrend,
  extractPostcode,
  isLondonPostcode,
  normalizePostcode,
  scoreRail,
  scoreTransport,
  summarizeCrime,
  summarizeSoldPrices,
  trendWindow,
} from "./area";
import {
  AnalyzeRequest,
  AnalyzeResponse,
  AreaContext,
  Coordinates,
  CrimeSummary,
  Journey,
  PriceTrend,
  RailConnectivity,
  SoldPricesSummary,
  TransportSummary,
  UkTransportSummary,
} from "./dto";
import { NotFoundError, UpstreamError } from "./errors";
import {
  CachePort,
  CrimePort,
  GeocoderPort,
  JourneyPort,
  NarrativePort,
  RailStationsPort,
  SoldPricesPort,
  TransportPort,
} from "./ports";

export interface AreaSources {
  soldPrices: SoldPricesPort;
  transport: TransportPort;
  crime: CrimePort;
  rail: RailStationsPort;
  geocoder: GeocoderPort;
  journeys: JourneyPort;
}

export interface OrchestrationOptions {
  policy: EvaluationPolicy;
  cacheTTL: {
    soldPrices: number;
    priceTrend: number;
    transport: number;
    crime: number;
    geocode: number;
  };
  timeoutMs: number;
  now?: () => Date;
}

const RECENT_SALES_LIMIT = 10;
const TRANSPORT_RADIUS_METERS = 2000;

/**
 * Reject with UpstreamError when the source does not answer in time
 */
export async function withTimeout<T>(
  source: string,
  work: Promise<T>,
  timeoutMs: number
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new UpstreamError(source, `${source} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function coordinateKey({ lat, lon }: Coordinates): string {
  return `${lat.toFixed(3)},${lon.toFixed(3)}`;
}

export class OrchestrationService {
  private now: () => Date;

  constructor(
    private sources: AreaSources,
    private narrative: NarrativePort,
    private cache: CachePort,
    private logger: Logger,
    private options: OrchestrationOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // ===== Deal Evaluation =====

  evaluateDeal(input: DealInput): DealAnalysis {
    const analysis = analyzeDeal(input, this.options.policy);
    this.logger.info(
      `Evaluated ${analysis.dealType} deal at ${analysis.purchasePrice}: ${analysis.verdict}`
    );
    return analysis;
  }

  async analyze(request: AnalyzeRequest): Promise<AnalyzeResponse> {
    const { postcode, address, lat, lon, ...deal } = request;

    const analysis = this.evaluateDeal(deal);

    const resolvedPostcode = postcode
      ? normalizePostcode(postcode)
      : address
        ? extractPostcode(address)
        : undefined;
    const coordinates =
      lat !== undefined && lon !== undefined ? { lat, lon } : undefined;

    const area = await this.gatherArea(resolvedPostcode, coordinates);
    const narrative = await this.narrative.generate({
      input: deal,
      analysis,
      area,
    });

    return { analysis, area, narrative };
  }

  /**
   * Query every applicable source in parallel; a failed source is logged
   * and left out of the context
   */
  async gatherArea(
    postcode?: string,
    coordinates?: Coordinates
  ): Promise<AreaContext> {
    const [soldPrices, priceTrend, transport, crime] = await Promise.all([
      postcode
        ? this.optional("sold-prices", () => this.getSoldPrices(postcode))
        : undefined,
      postcode
        ? this.optional("price-trend", () => this.getPriceTrend(postcode))
        : undefined,
      coordinates
        ? this.optional("transport", () => this.getTransport(coordinates))
        : undefined,
      coordinates
        ? this.optional("crime", () => this.getCrime(coordinates))
        : undefined,
    ]);

    return { postcode, soldPrices, priceTrend, transport, crime };
  }

  // ===== Area Data =====

  async getSoldPrices(postcode: string): Promise<SoldPricesSummary> {
    return cached(
      this.cache,
      `area:sold:${postcode}`,
      this.options.cacheTTL.soldPrices,
      async () => {
        const sales = await withTimeout(
          "land-registry",
          this.sources.soldPrices.recentSales(postcode, RECENT_SALES_LIMIT),
          this.options.timeoutMs
        );
        return summarizeSoldPrices(postcode, sales);
      }
    );
  }

  async getPriceTrend(postcode: string): Promise<PriceTrend> {
    const window = trendWindow(this.now());

    return cached(
      this.cache,
      `area:trend:${postcode}:${window.end}`,
      this.options.cacheTTL.priceTrend,
      async () => {
        const [recent, previous] = await withTimeout(
          "land-registry",
          Promise.all([
            this.sources.soldPrices.salesBetween(postcode, window.recentStart, window.end),
            this.sources.soldPrices.salesBetween(postcode, window.previousStart, window.recentStart),
          ]),
          this.options.timeoutMs
        );
        return computePriceTrend(postcode, recent, previous);
      }
    );
  }

  async getTransport(coordinates: Coordinates): Promise<TransportSummary> {
    return cached(
      this.cache,
      `area:transport:${coordinateKey(coordinates)}`,
      this.options.cacheTTL.transport,
      async () => {
        const stops = await withTimeout(
          "tfl",
          this.sources.transport.nearbyStops(
            coordinates.lat,
            coordinates.lon,
            TRANSPORT_RADIUS_METERS
          ),
          this.options.timeoutMs
        );
        return scoreTransport(stops);
      }
    );
  }

  async getCrime(coordinates: Coordinates): Promise<CrimeSummary> {
    return cached(
      this.cache,
      `area:crime:${coordinateKey(coordinates)}`,
      this.options.cacheTTL.crime,
      async () => {
        const crimes = await withTimeout(
          "police",
          this.sources.crime.streetCrimes(coordinates.lat, coordinates.lon),
          this.options.timeoutMs
        );
        return summarizeCrime(crimes);
      }
    );
  }

  // ===== UK Transport =====

  /**
   * Postcode centroid; NotFoundError for a postcode the lookup does not know
   */
  async locatePostcode(postcode: string): Promise<Coordinates> {
    return cached(
      this.cache,
      `area:geo:${postcode}`,
      this.options.cacheTTL.geocode,
      async () => {
        const coordinates = await withTimeout(
          "postcodes",
          this.sources.geocoder.locate(postcode),
          this.options.timeoutMs
        );
        if (!coordinates) {
          throw new NotFoundError(`Postcode not found: ${postcode}`);
        }
        return coordinates;
      }
    );
  }

  /**
   * Nearest major stations and a rail score; the postcode is geocoded
   * when no coordinates are given
   */
  async getRailConnectivity(
    postcode: string,
    coordinates?: Coordinates
  ): Promise<RailConnectivity> {
    const point = coordinates ?? (await this.locatePostcode(postcode));

    return cached(
      this.cache,
      `area:rail:${coordinateKey(point)}`,
      this.options.cacheTTL.transport,
      async () => {
        const rail = scoreRail(point, await this.sources.rail.stations());
        if (!rail) {
          throw new NotFoundError("No rail stations found");
        }
        return rail;
      }
    );
  }

  /**
   * TfL for London postcodes with coordinates, National Rail otherwise
   */
  async getUkTransport(
    postcode: string,
    coordinates?: Coordinates
  ): Promise<UkTransportSummary> {
    const isLondon = isLondonPostcode(postcode);

    if (isLondon && coordinates) {
      return {
        postcode,
        isLondon,
        network: "tfl",
        source: "Transport for London (TfL)",
        connectivity: await this.getTransport(coordinates),
      };
    }

    return {
      postcode,
      isLondon,
      network: "national-rail",
      source: isLondon ? "National Rail (London fallback)" : "National Rail (UK-wide)",
      connectivity: await this.getRailConnectivity(postcode, coordinates),
    };
  }

  /**
   * Fastest journey right now; not cached
   */
  async getJourney(from: string, to: string): Promise<Journey> {
    const journey = await withTimeout(
      "tfl-journey",
      this.sources.journeys.fastestJourney(from, to),
      this.options.timeoutMs
    );
    if (!journey) {
      throw new NotFoundError("Journey not found");
    }
    return journey;
  }

  // ===== Helpers =====

  private async optional<T>(
    name: string,
    load: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await load();
    } catch (error) {
      this.logger.warn(
        `Area source ${name} unavailable:`,
        error instanceof Error ? error.message : error
      );
      return undefined;
    }
  }
}
