/**
 * Area context rules: postcode handling, price trend, transport and rail
 * connectivity and crime level. Pure functions over adapter output.
 */

import {
  ConnectivityRating,
  Coordinates,
  CrimeLevel,
  CrimeSummary,
  PriceTrend,
  RailConnectivity,
  RailRating,
  RailStation,
  SoldPrice,
  SoldPricesSummary,
  StreetCrime,
  TransportStop,
  TransportSummary,
  TrendDirection,
} from "./dto";

// ===== Postcodes =====

const POSTCODE_PATTERN = /^[A-Z]{1,2}[0-9][A-Z0-9]?\s?[0-9][A-Z]{2}$/i;
const POSTCODE_IN_TEXT = /\b[A-Z]{1,2}[0-9][A-Z0-9]?\s?[0-9][A-Z]{2}\b/gi;

export function isValidPostcode(value: string): boolean {
  return POSTCODE_PATTERN.test(value.trim());
}

/**
 * Upper case with a single space before the inward code, e.g. "sw1a1aa" -> "SW1A 1AA"
 */
export function normalizePostcode(value: string): string {
  const compact = value.replace(/\s+/g, "").toUpperCase();
  return `${compact.slice(0, -3)} ${compact.slice(-3)}`;
}

/**
 * Last postcode-shaped token in a free-text address
 */
export function extractPostcode(address: string): string | undefined {
  const matches = address.match(POSTCODE_IN_TEXT);
  const last = matches?.[matches.length - 1];
  return last ? normalizePostcode(last) : undefined;
}

// London postal areas; TfL data only covers these
const LONDON_AREAS = new Set(["E", "EC", "N", "NW", "SE", "SW", "W", "WC"]);

/**
 * Letters of the outward code, e.g. "SW1A 1AA" -> "SW", "EH1 1YZ" -> "EH"
 */
export function postcodeArea(postcode: string): string {
  return postcode.trim().toUpperCase().match(/^[A-Z]{1,2}/)?.[0] ?? "";
}

export function isLondonPostcode(postcode: string): boolean {
  return LONDON_AREAS.has(postcodeArea(postcode));
}

// ===== Sold Prices =====

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function summarizeSoldPrices(
  postcode: string,
  sales: SoldPrice[]
): SoldPricesSummary {
  const mean = average(sales.map((s) => s.price));
  return {
    postcode,
    sales,
    count: sales.length,
    averagePrice: mean === null ? null : Math.round(mean),
  };
}

// ===== Price Trend =====

const DAY_MS = 24 * 60 * 60 * 1000;
const TREND_THRESHOLD_PCT = 5;

export interface TrendWindow {
  previousStart: string;
  recentStart: string;
  end: string;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Last ~6 months against the ~6 months before; end is exclusive
 */
export function trendWindow(now: Date): TrendWindow {
  const t = now.getTime();
  return {
    previousStart: isoDate(new Date(t - 365 * DAY_MS)),
    recentStart: isoDate(new Date(t - 180 * DAY_MS)),
    end: isoDate(new Date(t + DAY_MS)),
  };
}

export function computePriceTrend(
  postcode: string,
  recent: SoldPrice[],
  previous: SoldPrice[]
): PriceTrend {
  const recentAverage = average(recent.map((s) => s.price));
  const previousAverage = average(previous.map((s) => s.price));

  if (recentAverage === null || previousAverage === null) {
    return {
      postcode,
      direction: "insufficient_data",
      changePercent: null,
      recentAverage: recentAverage === null ? null : Math.round(recentAverage),
      previousAverage:
        previousAverage === null ? null : Math.round(previousAverage),
      recentSales: recent.length,
      previousSales: previous.length,
    };
  }

  const change = ((recentAverage - previousAverage) / previousAverage) * 100;
  let direction: TrendDirection = "stable";
  if (change > TREND_THRESHOLD_PCT) direction = "rising";
  else if (change < -TREND_THRESHOLD_PCT) direction = "falling";

  return {
    postcode,
    direction,
    changePercent: Math.round(change * 10) / 10,
    recentAverage: Math.round(recentAverage),
    previousAverage: Math.round(previousAverage),
    recentSales: recent.length,
    previousSales: previous.length,
  };
}

// ===== Transport =====

const TUBE_MODES = ["tube"];
const RAIL_MODES = ["national-rail", "overground"];
const MODE_WINDOW = 5;

function distanceBand(distance: number): { score: number; rating: ConnectivityRating } {
  if (distance < 500) return { score: 10, rating: "Excellent" };
  if (distance < 1000) return { score: 8, rating: "Good" };
  if (distance < 2000) return { score: 6, rating: "Acceptable" };
  return { score: 3, rating: "Poor" };
}

/**
 * Connectivity score 0-10 from the nearest stop, with a bonus point when
 * tube and rail are both among the closest stops
 */
export function scoreTransport(stops: TransportStop[]): TransportSummary {
  const sorted = [...stops].sort((a, b) => a.distance - b.distance);
  const nearest = sorted[0];

  if (!nearest) {
    return {
      score: 0,
      rating: "Poor",
      nearestStop: null,
      nearestDistance: null,
      hasTube: false,
      hasRail: false,
      stops: [],
    };
  }

  const closest = sorted.slice(0, MODE_WINDOW);
  const modes = new Set(closest.flatMap((stop) => stop.modes));
  const hasTube = TUBE_MODES.some((m) => modes.has(m));
  const hasRail = RAIL_MODES.some((m) => modes.has(m));

  const band = distanceBand(nearest.distance);

  return {
    score: hasTube && hasRail ? Math.min(10, band.score + 1) : band.score,
    rating: band.rating,
    nearestStop: nearest.name,
    nearestDistance: Math.round(nearest.distance),
    hasTube,
    hasRail,
    stops: closest,
  };
}

// ===== National Rail =====

const EARTH_RADIUS_KM = 6371;
const WALK_MINUTES_PER_KM = 12; // ~5km/h
export const RAIL_STATION_LIMIT = 3;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in kilometres
 */
export function haversineKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.lat - from.lat);
  const dLon = toRadians(to.lon - from.lon);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.lat)) *
      Math.cos(toRadians(to.lat)) *
      Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

function railBand(km: number): { score: number; rating: RailRating } {
  if (km < 1) return { score: 10, rating: "Excellent" };
  if (km < 2) return { score: 9, rating: "Very Good" };
  if (km < 5) return { score: 7, rating: "Good" };
  if (km < 10) return { score: 6, rating: "Acceptable" };
  if (km < 15) return { score: 4, rating: "Poor" };
  return { score: 2, rating: "Very Poor" };
}

function roundKm(km: number): number {
  return Math.round(km * 10) / 10;
}

/**
 * Score rail access by the nearest station; null when there are no stations
 */
export function scoreRail(
  point: Coordinates,
  stations: RailStation[],
  limit = RAIL_STATION_LIMIT
): RailConnectivity | null {
  const ranked = stations
    .map((station) => ({ station, km: haversineKm(point, station) }))
    .sort((a, b) => a.km - b.km)
    .slice(0, limit);

  const nearest = ranked[0];
  if (!nearest) return null;

  const band = railBand(nearest.km);
  const walkMinutes = Math.round(nearest.km * WALK_MINUTES_PER_KM);
  const { name, city } = nearest.station;

  return {
    score: band.score,
    rating: band.rating,
    distanceKm: roundKm(nearest.km),
    walkMinutes,
    nearestStations: ranked.map(({ station, km }) => ({
      code: station.code,
      name: station.name,
      city: station.city,
      distanceKm: roundKm(km),
    })),
    summary:
      `${band.rating} rail connectivity. ` +
      `Nearest: ${name} (${nearest.km.toFixed(1)}km, ~${walkMinutes}min walk). ` +
      `Located in ${city} area.`,
  };
}

// ===== Crime =====

export function crimeLevel(total: number): CrimeLevel {
  if (total < 50) return "LOW";
  if (total < 150) return "MEDIUM";
  return "HIGH";
}

export function summarizeCrime(crimes: StreetCrime[]): CrimeSummary {
  const byCategory: Record<string, number> = {};
  let month: string | null = null;

  for (const crime of crimes) {
    byCategory[crime.category] = (byCategory[crime.category] ?? 0) + 1;
    if (month === null || crime.month > month) month = crime.month;
  }

  const topCategories = Object.entries(byCategory)
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count || a.category.localeCompare(b.category))
    .slice(0, 5);

  return {
    month,
    total: crimes.length,
    level: crimeLevel(crimes.length),
    byCategory,
    topCategories,
  };
}
