/**
 * Port Interfaces for API Gateway
 *
 * How the gateway reaches area data sources, the narrative writer,
 * the cache and the rate limiter.
 */

import { CachePort } from "@dealcheck/shared-utils";
import {
  Coordinates,
  Journey,
  Narrative,
  NarrativeRequest,
  RailStation,
  SoldPrice,
  StreetCrime,
  TransportStop,
} from "./dto";

export type { CachePort };

// ===== Area Data Ports =====

export interface SoldPricesPort {
  /** Most recent sales first */
  recentSales(postcode: string, limit: number): Promise<SoldPrice[]>;
  /** Sales with start <= date < end (ISO dates) */
  salesBetween(postcode: string, start: string, end: string): Promise<SoldPrice[]>;
}

export interface TransportPort {
  /** Stops within the radius, nearest first */
  nearbyStops(lat: number, lon: number, radiusMeters: number): Promise<TransportStop[]>;
}

export interface RailStationsPort {
  /** Every station the gateway scores against */
  stations(): Promise<RailStation[]>;
}

export interface GeocoderPort {
  /** Null when the postcode is not known */
  locate(postcode: string): Promise<Coordinates | null>;
}

export interface JourneyPort {
  /** Fastest journey between two places, null when none is found */
  fastestJourney(from: string, to: string): Promise<Journey | null>;
}

export interface CrimePort {
  /** Street-level crimes around the point for the latest published month */
  streetCrimes(lat: number, lon: number): Promise<StreetCrime[]>;
}

// ===== Narrative Port =====

export interface NarrativePort {
  generate(request: NarrativeRequest): Promise<Narrative>;
}

// ===== Rate Limiting Port =====

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number; // epoch ms
}

export interface RateLimitPort {
  isAllowed(
    identifier: string,
    limit: number,
    windowMs: number
  ): Promise<RateLimitResult>;
}
