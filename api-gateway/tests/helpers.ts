import { DealInput, defaultPolicy } from "@dealcheck/evaluator";
import { MemoryCache, SilentLogger } from "@dealcheck/shared-utils";
import { Server } from "http";
import { Express } from "express";
import { GatewayConfig } from "../src/config/env";
import {
  Coordinates,
  Journey,
  RailStation,
  SoldPrice,
  StreetCrime,
  TransportStop,
} from "../src/core/dto";
import { OrchestrationService } from "../src/core/orchestration";
import {
  CrimePort,
  GeocoderPort,
  JourneyPort,
  RailStationsPort,
  SoldPricesPort,
  TransportPort,
} from "../src/core/ports";
import { TemplateNarrativeAdapter } from "../src/adapters/narrative.template";

export const FIXED_NOW = new Date("2024-07-01T12:00:00Z");

export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    serviceName: "api-gateway",
    version: "1.0.0",
    port: 0,
    isDevelopment: false,
    logLevel: "error",
    corsOrigins: ["http://localhost:3000"],
    apiVersion: "v1",
    bodyLimit: "10kb",
    enableRateLimit: true,
    rateLimits: {
      analyze: { requests: 1000, windowMs: 60_000 },
      area: { requests: 1000, windowMs: 3_600_000 },
    },
    cacheTTL: { soldPrices: 60, priceTrend: 60, transport: 60, crime: 60, geocode: 60 },
    useMockAreaData: false,
    upstream: {
      landRegistryUrl: "http://land-registry.test/query",
      tflUrl: "http://tfl.test",
      policeUrl: "http://police.test/api",
      postcodesUrl: "http://postcodes.test",
      timeoutMs: 1000,
    },
    policy: {},
    ...overrides,
  };
}

export const STRONG_BTL: DealInput = {
  dealType: "BTL",
  purchasePrice: 185000,
  monthlyRent: 950,
  depositPercent: 25,
  interestRatePercent: 4.0,
  isSecondProperty: true,
};

export const WEAK_BTL: DealInput = {
  dealType: "BTL",
  purchasePrice: 400000,
  monthlyRent: 800,
  depositPercent: 25,
  interestRatePercent: 6.0,
  isSecondProperty: false,
};

// Newest first, as the price-paid endpoint returns them
export const SALES: SoldPrice[] = [
  { price: 230000, date: "2024-05-20", street: "MILL LANE", town: "TESTBURY" },
  { price: 220000, date: "2024-03-10", street: "MILL LANE", town: "TESTBURY" },
  { price: 210000, date: "2023-11-15", street: "MILL LANE", town: "TESTBURY" },
  { price: 200000, date: "2023-09-01", street: "MILL LANE", town: "TESTBURY" },
  { price: 300000, date: "2022-12-01", street: "MILL LANE", town: "TESTBURY" },
];

export const STOPS: TransportStop[] = [
  {
    id: "stop-b",
    name: "Station B",
    distance: 1200,
    modes: ["national-rail"],
    lines: ["Test Line"],
    lat: 51.5,
    lon: -0.12,
  },
  {
    id: "stop-a",
    name: "Station A",
    distance: 750.4,
    modes: ["tube"],
    lines: ["Central"],
    lat: 51.5,
    lon: -0.12,
  },
];

export const CRIMES: StreetCrime[] = [
  { category: "burglary", month: "2024-05" },
  { category: "anti-social-behaviour", month: "2024-05" },
  { category: "burglary", month: "2024-05" },
];

// Made-up stations on one meridian, 0.01 degrees of latitude apart is ~1.1km
export const STATIONS: RailStation[] = [
  { code: "TSC", name: "Test Central", city: "Testford", lat: 53.0, lon: -2.0 },
  { code: "TSP", name: "Test Parkway", city: "Testford", lat: 53.03, lon: -2.0 },
  { code: "SMJ", name: "Sample Junction", city: "Sampleton", lat: 53.2, lon: -2.0 },
  { code: "FRH", name: "Far Halt", city: "Farley", lat: 54.0, lon: -2.0 },
];

// 1.1km north of Test Central
export const TESTFORD: Coordinates = { lat: 53.01, lon: -2.0 };

export const JOURNEY: Journey = {
  from: "TB1 2AB",
  to: "Test Central",
  durationMinutes: 24,
  departureTime: "2024-07-01T08:00:00",
  arrivalTime: "2024-07-01T08:24:00",
  modes: ["walking", "bus"],
  legs: 2,
  fare: 175,
};

export class FakeSoldPrices implements SoldPricesPort {
  calls = 0;
  fail?: Error;

  constructor(private sales: SoldPrice[] = SALES) {}

  async recentSales(_postcode: string, limit: number): Promise<SoldPrice[]> {
    this.calls++;
    if (this.fail) throw this.fail;
    return this.sales.slice(0, limit);
  }

  async salesBetween(
    _postcode: string,
    start: string,
    end: string
  ): Promise<SoldPrice[]> {
    this.calls++;
    if (this.fail) throw this.fail;
    return this.sales.filter((s) => s.date >= start && s.date < end);
  }
}

export class FakeTransport implements TransportPort {
  calls = 0;
  fail?: Error;
  hang = false;

  constructor(private stops: TransportStop[] = STOPS) {}

  async nearbyStops(): Promise<TransportStop[]> {
    this.calls++;
    if (this.fail) throw this.fail;
    if (this.hang) return new Promise<TransportStop[]>(() => undefined);
    return this.stops;
  }
}

export class FakeCrime implements CrimePort {
  calls = 0;
  fail?: Error;

  constructor(private crimes: StreetCrime[] = CRIMES) {}

  async streetCrimes(): Promise<StreetCrime[]> {
    this.calls++;
    if (this.fail) throw this.fail;
    return this.crimes;
  }
}

export class FakeRail implements RailStationsPort {
  calls = 0;

  constructor(public list: RailStation[] = STATIONS) {}

  async stations(): Promise<RailStation[]> {
    this.calls++;
    return this.list;
  }
}

export class FakeGeocoder implements GeocoderPort {
  calls = 0;
  fail?: Error;

  constructor(public known: Record<string, Coordinates> = { "TB1 2AB": TESTFORD }) {}

  async locate(postcode: string): Promise<Coordinates | null> {
    this.calls++;
    if (this.fail) throw this.fail;
    return this.known[postcode] ?? null;
  }
}

export class FakeJourneys implements JourneyPort {
  calls = 0;
  result: Journey | null = JOURNEY;

  async fastestJourney(): Promise<Journey | null> {
    this.calls++;
    return this.result;
  }
}

export interface Harness {
  soldPrices: FakeSoldPrices;
  transport: FakeTransport;
  crime: FakeCrime;
  rail: FakeRail;
  geocoder: FakeGeocoder;
  journeys: FakeJourneys;
  cache: MemoryCache;
  orchestration: OrchestrationService;
}

export function createHarness(timeoutMs = 1000): Harness {
  const soldPrices = new FakeSoldPrices();
  const transport = new FakeTransport();
  const crime = new FakeCrime();
  const rail = new FakeRail();
  const geocoder = new FakeGeocoder();
  const journeys = new FakeJourneys();
  const cache = new MemoryCache();

  const orchestration = new OrchestrationService(
    { soldPrices, transport, crime, rail, geocoder, journeys },
    new TemplateNarrativeAdapter(),
    cache,
    new SilentLogger(),
    {
      policy: defaultPolicy,
      cacheTTL: { soldPrices: 60, priceTrend: 60, transport: 60, crime: 60, geocode: 60 },
      timeoutMs,
      now: () => FIXED_NOW,
    }
  );

  return { soldPrices, transport, crime, rail, geocoder, journeys, cache, orchestration };
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral localhost port
 */
export function startServer(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server is not listening on a TCP port"));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) =>
            server.close((error) => (error ? fail(error) : done()))
          ),
      });
    });
    server.on("error", reject);
  });
}
