/**
 * API Gateway HTTP Routes
 *
 * Routes delegate to the orchestration service for business logic.
 */

import { DealInput } from "@dealcheck/evaluator";
import { Logger } from "@dealcheck/shared-utils";
import { Request, Response, Router } from "express";
import { AnalyzeRequest, Coordinates } from "../core/dto";
import { OrchestrationService } from "../core/orchestration";
import {
  APIGatewayMiddleware,
  CoordinatesQuery,
  JourneyRequest,
  PostcodeLocationQuery,
  PostcodeQuery,
  schemas,
  sendError,
  sendSuccess,
  toHttpError,
} from "./middleware";

export class APIRoutes {
  private router: Router;

  constructor(
    private orchestration: OrchestrationService,
    private middleware: APIGatewayMiddleware,
    private logger: Logger,
    private exposeInternals: boolean = false
  ) {
    this.router = Router();
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    // ===== Deal Routes =====

    this.router.post(
      "/evaluate",
      this.middleware.rateLimitMiddleware("analyze"),
      this.middleware.validateBody(schemas.dealInput),
      this.handleEvaluate.bind(this)
    );

    this.router.post(
      "/analyze",
      this.middleware.rateLimitMiddleware("analyze"),
      this.middleware.validateBody(schemas.analyzeRequest),
      this.handleAnalyze.bind(this)
    );

    // ===== Area Routes =====

    this.router.get(
      "/area/sold-prices",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateQuery(schemas.postcodeQuery),
      this.handleSoldPrices.bind(this)
    );

    this.router.get(
      "/area/price-trend",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateQuery(schemas.postcodeQuery),
      this.handlePriceTrend.bind(this)
    );

    this.router.get(
      "/area/transport",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateQuery(schemas.coordinatesQuery),
      this.handleTransport.bind(this)
    );

    this.router.get(
      "/area/crime",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateQuery(schemas.coordinatesQuery),
      this.handleCrime.bind(this)
    );

    this.router.get(
      "/area/national-rail",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateQuery(schemas.postcodeLocationQuery),
      this.handleNationalRail.bind(this)
    );

    this.router.get(
      "/area/uk-transport",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateQuery(schemas.postcodeLocationQuery),
      this.handleUkTransport.bind(this)
    );

    // ===== Transport Routes =====

    this.router.post(
      "/transport/journey",
      this.middleware.rateLimitMiddleware("area"),
      this.middleware.validateBody(schemas.journeyRequest),
      this.handleJourney.bind(this)
    );
  }

  // ===== Route Handlers =====

  private async handleEvaluate(req: Request, res: Response): Promise<void> {
    try {
      const input: DealInput = req.body;
      sendSuccess(res, this.orchestration.evaluateDeal(input));
    } catch (error) {
      this.handleError(res, error, "Deal evaluation failed");
    }
  }

  private async handleAnalyze(req: Request, res: Response): Promise<void> {
    try {
      const request: AnalyzeRequest = req.body;
      const result = await this.orchestration.analyze(request);
      sendSuccess(res, result);
    } catch (error) {
      this.handleError(res, error, "Deal analysis failed");
    }
  }

  private async handleSoldPrices(req: Request, res: Response): Promise<void> {
    try {
      const { postcode }: PostcodeQuery = res.locals.query;
      sendSuccess(res, await this.orchestration.getSoldPrices(postcode));
    } catch (error) {
      this.handleError(res, error, "Sold prices lookup failed");
    }
  }

  private async handlePriceTrend(req: Request, res: Response): Promise<void> {
    try {
      const { postcode }: PostcodeQuery = res.locals.query;
      sendSuccess(res, await this.orchestration.getPriceTrend(postcode));
    } catch (error) {
      this.handleError(res, error, "Price trend lookup failed");
    }
  }

  private async handleTransport(req: Request, res: Response): Promise<void> {
    try {
      const coordinates: CoordinatesQuery = res.locals.query;
      sendSuccess(res, await this.orchestration.getTransport(coordinates));
    } catch (error) {
      this.handleError(res, error, "Transport lookup failed");
    }
  }

  private async handleCrime(req: Request, res: Response): Promise<void> {
    try {
      const coordinates: CoordinatesQuery = res.locals.query;
      sendSuccess(res, await this.orchestration.getCrime(coordinates));
    } catch (error) {
      this.handleError(res, error, "Crime lookup failed");
    }
  }

  private async handleNationalRail(req: Request, res: Response): Promise<void> {
    try {
      const { postcode, ...point }: PostcodeLocationQuery = res.locals.query;
      sendSuccess(
        res,
        await this.orchestration.getRailConnectivity(postcode, coordinatesOf(point))
      );
    } catch (error) {
      this.handleError(res, error, "National Rail lookup failed");
    }
  }

  private async handleUkTransport(req: Request, res: Response): Promise<void> {
    try {
      const { postcode, ...point }: PostcodeLocationQuery = res.locals.query;
      sendSuccess(
        res,
        await this.orchestration.getUkTransport(postcode, coordinatesOf(point))
      );
    } catch (error) {
      this.handleError(res, error, "UK transport lookup failed");
    }
  }

  private async handleJourney(req: Request, res: Response): Promise<void> {
    try {
      const { from, to }: JourneyRequest = req.body;
      sendSuccess(res, await this.orchestration.getJourney(from, to));
    } catch (error) {
      this.handleError(res, error, "Journey lookup failed");
    }
  }

  // ===== Helper Methods =====

  private handleError(res: Response, error: unknown, context: string): void {
    const httpError = toHttpError(error, this.exposeInternals);

    if (httpError.status >= 500) {
      this.logger.error(`${context}:`, error);
    } else {
      this.logger.warn(`${context}: ${httpError.message}`);
    }

    sendError(res, httpError.status, httpError.message, httpError.details);
  }
}

function coordinatesOf(point: { lat?: number; lon?: number }): Coordinates | undefined {
  return point.lat !== undefined && point.lon !== undefined
    ? { lat: point.lat, lon: point.lon }
    : undefined;
}
