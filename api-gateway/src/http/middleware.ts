/**
 * Express Middleware for API Gateway
 *
 * Rate limiting, validation, request logging and error mapping.
 */

import { isEvaluationError, MissingFieldError } from "@dealcheck/evaluator";
import { Logger } from "@dealcheck/shared-utils";
import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { GatewayConfig } from "../config/env";
import { isValidPostcode, normalizePostcode } from "../core/area";
import { APIResponse } from "../core/dto";
import { NotFoundError, UpstreamError } from "../core/errors";
import { RateLimitPort } from "../core/ports";

declare global {
  namespace Express {
    interface Request {
      rateLimitInfo?: {
        remaining: number;
        resetTime: number;
        identifier: string;
      };
    }
  }
}

export type RateLimitBucket = keyof GatewayConfig["rateLimits"];

export interface HttpError {
  status: number;
  message: string;
  details?: unknown;
}

// ===== Response Helpers =====

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const response: APIResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(response);
}

export function sendError(
  res: Response,
  statusCode: number,
  message: string,
  details?: unknown
): void {
  const response: APIResponse<never> = {
    success: false,
    error: message,
    details,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(response);
}

function zodDetails(error: z.ZodError): { errors: Array<{ path: string; message: string }> } {
  return {
    errors: error.errors.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    })),
  };
}

/**
 * Status code (from body-parser and similar) carried on a thrown error
 */
function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

/**
 * Map anything thrown while serving a request to a response
 */
export function toHttpError(error: unknown, exposeInternals: boolean): HttpError {
  if (isEvaluationError(error)) {
    return {
      status: 400,
      message: error.message,
      details:
        error instanceof MissingFieldError
          ? { field: error.field, dealType: error.dealType }
          : { field: error.field },
    };
  }

  if (error instanceof z.ZodError) {
    return { status: 400, message: "Validation error", details: zodDetails(error) };
  }

  if (error instanceof NotFoundError) {
    return { status: 404, message: error.message };
  }

  if (error instanceof UpstreamError) {
    return {
      status: 502,
      message: `Area data unavailable: ${error.message}`,
      details: { source: error.source },
    };
  }

  const status = statusOf(error);
  if (status === 400) {
    return { status, message: "Malformed JSON body" };
  }
  if (status === 413) {
    return { status, message: "Request body too large" };
  }

  return {
    status: 500,
    message:
      exposeInternals && error instanceof Error
        ? error.message
        : "Internal server error",
  };
}

export class APIGatewayMiddleware {
  constructor(
    private rateLimit: RateLimitPort,
    private config: GatewayConfig,
    private logger: Logger
  ) {}

  // ===== Rate Limiting Middleware =====

  rateLimitMiddleware(bucket: RateLimitBucket) {
    return async (req: Request, res: Response, next: NextFunction) => {
      if (!this.config.enableRateLimit) {
        return next();
      }

      const rule = this.config.rateLimits[bucket];
      const identifier = `${bucket}:${req.ip ?? "unknown"}`;

      try {
        const result = await this.rateLimit.isAllowed(
          identifier,
          rule.requests,
          rule.windowMs
        );

        res.set({
          "X-RateLimit-Limit": rule.requests.toString(),
          "X-RateLimit-Remaining": result.remaining.toString(),
          "X-RateLimit-Reset": new Date(result.resetTime).toISOString(),
        });

        req.rateLimitInfo = {
          remaining: result.remaining,
          resetTime: result.resetTime,
          identifier,
        };

        if (!result.allowed) {
          return sendError(res, 429, "Rate limit exceeded");
        }

        next();
      } catch (error) {
        this.logger.error("Rate limiting check failed:", error);
        // Fail open - continue with request
        next();
      }
    };
  }

  // ===== Request Validation Middleware =====

  validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return (req: Request, res: Response, next: NextFunction) => {
      const result = schema.safeParse(req.body);
      if (!result.success) {
        return sendError(res, 400, "Validation error", zodDetails(result.error));
      }
      req.body = result.data;
      next();
    };
  }

  /**
   * Parsed query is left in res.locals.query
   */
  validateQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return (req: Request, res: Response, next: NextFunction) => {
      const result = schema.safeParse(req.query);
      if (!result.success) {
        return sendError(res, 400, "Validation error", zodDetails(result.error));
      }
      res.locals.query = result.data;
      next();
    };
  }

  // ===== Logging Middleware =====

  requestLogger() {
    return (req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();

      res.on("finish", () => {
        const logData = {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
          ip: req.ip,
          rateLimitRemaining: req.rateLimitInfo?.remaining,
        };

        if (res.statusCode >= 400) {
          this.logger.warn("HTTP request failed", logData);
        } else {
          this.logger.info("HTTP request", logData);
        }
      });

      next();
    };
  }

  // ===== Error Handling Middleware =====

  errorHandler() {
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const httpError = toHttpError(error, this.config.isDevelopment);

      if (httpError.status >= 500) {
        this.logger.error("Unhandled error:", {
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          method: req.method,
          url: req.originalUrl,
        });
      }

      sendError(res, httpError.status, httpError.message, httpError.details);
    };
  }

  notFoundHandler() {
    return (req: Request, res: Response) => {
      sendError(res, 404, `Route ${req.method} ${req.originalUrl} not found`);
    };
  }
}

// ===== Validation Schemas =====

const feesSchema = z.object({
  legal: z.number().optional(),
  valuation: z.number().optional(),
  arrangement: z.number().optional(),
});

const commonDealFields = {
  purchasePrice: z.number(),
  depositPercent: z.number().optional(),
  interestRatePercent: z.number().optional(),
  isSecondProperty: z.boolean(),
  fees: feesSchema.optional(),
};

const postcodeField = z
  .string()
  .trim()
  .refine(isValidPostcode, { message: "Invalid UK postcode format" })
  .transform(normalizePostcode);

/** Query-string coordinate; blank is missing, not zero */
const queryCoordinate = (min: number, max: number) =>
  z
    .string()
    .trim()
    .min(1, { message: "Required" })
    .pipe(z.coerce.number().min(min).max(max));

const dealInput = z.discriminatedUnion("dealType", [
  z.object({
    dealType: z.literal("BTL"),
    ...commonDealFields,
    monthlyRent: z.number(),
  }),
  z.object({
    dealType: z.literal("HMO"),
    ...commonDealFields,
    roomCount: z.number().optional(),
    roomRate: z.number().optional(),
    monthlyRent: z.number().optional(),
  }),
  z.object({
    dealType: z.literal("BRR"),
    ...commonDealFields,
    monthlyRent: z.number(),
    refurbCost: z.number().optional(),
    afterRepairValue: z.number().optional(),
  }),
  z.object({
    dealType: z.literal("FLIP"),
    ...commonDealFields,
    monthlyRent: z.number(),
    refurbCost: z.number().optional(),
    afterRepairValue: z.number().optional(),
  }),
]);

const locationFields = z.object({
  postcode: postcodeField.optional(),
  address: z.string().max(300).optional(),
  lat: z.number().min(-90).max(90).optional(),
  lon: z.number().min(-180).max(180).optional(),
});

export const schemas = {
  dealInput,

  analyzeRequest: z.intersection(dealInput, locationFields),

  postcodeQuery: z.object({
    postcode: postcodeField,
  }),

  coordinatesQuery: z.object({
    lat: queryCoordinate(-90, 90),
    lon: queryCoordinate(-180, 180),
  }),

  // Coordinates are optional but come as a pair
  postcodeLocationQuery: z
    .object({
      postcode: postcodeField,
      lat: queryCoordinate(-90, 90).optional(),
      lon: queryCoordinate(-180, 180).optional(),
    })
    .refine((q) => (q.lat === undefined) === (q.lon === undefined), {
      message: "lat and lon must be given together",
      path: ["lon"],
    }),

  journeyRequest: z.object({
    from: z.string().trim().min(1, { message: "Required" }).max(200),
    to: z.string().trim().min(1, { message: "Required" }).max(200),
  }),
};

export type PostcodeQuery = z.infer<typeof schemas.postcodeQuery>;
export type CoordinatesQuery = z.infer<typeof schemas.coordinatesQuery>;
export type PostcodeLocationQuery = z.infer<typeof schemas.postcodeLocationQuery>;
export type JourneyRequest = z.infer<typeof schemas.journeyRequest>;
