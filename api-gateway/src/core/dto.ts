/**
 * API Gateway DTOs and Type Definitions
 *
 * HTTP contracts exposed by the gateway. Deal types come from the evaluator;
 * everything here is area context or transport envelope.
 */

import { DealAnalysis, DealInput, RiskLevel } from "@dealcheck/evaluator";

// ===== Envelope =====

export interface APIResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  details?: unknown;
  timestamp: string;
}

export interface HealthCheckResponse {
  status: "healthy";
  service: string;
  version: string;
  timestamp: string;
}

// ===== Area Data =====

export interface SoldPrice {
  price: number;
  date: string; // YYYY-MM-DD
  street: string;
  town: string;
}

export interface SoldPricesSummary {
  postcode: string;
  sales: SoldPrice[];
  count: number;
  averagePrice: number | null;
}

export type TrendDirection = "rising" | "falling" | "stable" | "insufficient_data";

export interface PriceTrend {
  postcode: string;
  direction: TrendDirection;
  changePercent: number | null; // one decimal place
  recentAverage: number | null;
  previousAverage: number | null;
  recentSales: number;
  previousSales: number;
}

export interface TransportStop {
  id: string;
  name: string;
  distance: number; // metres
  modes: string[];
  lines: string[];
  lat: number;
  lon: number;
}

export type ConnectivityRating = "Excellent" | "Good" | "Acceptable" | "Poor";

export interface TransportSummary {
  score: number; // 0..10
  rating: ConnectivityRating;
  nearestStop: string | null;
  nearestDistance: number | null;
  hasTube: boolean;
  hasRail: boolean;
  stops: TransportStop[];
}

export interface RailStation {
  code: string; // CRS code
  name: string;
  city: string;
  lat: number;
  lon: number;
}

export interface NearbyStation {
  code: string;
  name: string;
  city: string;
  distanceKm: number; // one decimal place
}

export type RailRating =
  | "Excellent"
  | "Very Good"
  | "Good"
  | "Acceptable"
  | "Poor"
  | "Very Poor";

export interface RailConnectivity {
  score: number; // 0..10
  rating: RailRating;
  distanceKm: number;
  walkMinutes: number;
  nearestStations: NearbyStation[];
  summary: string;
}

export type UkTransportSummary = {
  postcode: string;
  isLondon: boolean;
} & (
  | {
      network: "tfl";
      source: "Transport for London (TfL)";
      connectivity: TransportSummary;
    }
  | {
      network: "national-rail";
      source: "National Rail (London fallback)" | "National Rail (UK-wide)";
      connectivity: RailConnectivity;
    }
);

export interface Journey {
  from: string;
  to: string;
  durationMinutes: number;
  departureTime: string | null;
  arrivalTime: string | null;
  modes: string[];
  legs: number;
  fare: number | null; // pence
}

export interface StreetCrime {
  category: string;
  month: string; // YYYY-MM
}

export type CrimeLevel = RiskLevel;

export interface CrimeSummary {
  month: string | null;
  total: number;
  level: CrimeLevel;
  byCategory: Record<string, number>;
  topCategories: Array<{ category: string; count: number }>;
}

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface AreaContext {
  postcode?: string;
  soldPrices?: SoldPricesSummary;
  priceTrend?: PriceTrend;
  transport?: TransportSummary;
  crime?: CrimeSummary;
}

// ===== Analysis =====

export interface LocationFields {
  postcode?: string;
  address?: string;
  lat?: number;
  lon?: number;
}

export type AnalyzeRequest = DealInput & LocationFields;

export interface Narrative {
  verdict: string;
  strengths: string;
  risks: string;
  area: string;
  nextSteps: string;
}

export interface NarrativeRequest {
  input: DealInput;
  analysis: DealAnalysis;
  area: AreaContext;
}

export interface AnalyzeResponse {
  analysis: DealAnalysis;
  area: AreaContext;
  narrative: Narrative;
}
