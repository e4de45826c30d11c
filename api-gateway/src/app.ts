/**
 * Express application assembly, shared by the server binary and the tests
 */

import { Logger } from "@dealcheck/shared-utils";
import cors from "cors";
import express, { Express } from "express";
import helmet from "helmet";
import { GatewayConfig } from "./config/env";
import { HealthCheckResponse } from "./core/dto";
import { OrchestrationService } from "./core/orchestration";
import { RateLimitPort } from "./core/ports";
import { APIGatewayMiddleware, sendSuccess } from "./http/middleware";
import { APIRoutes } from "./http/routes";

export interface AppDependencies {
  config: GatewayConfig;
  orchestration: OrchestrationService;
  rateLimiter: RateLimitPort;
  logger: Logger;
}

export function createApp({
  config,
  orchestration,
  rateLimiter,
  logger,
}: AppDependencies): Express {
  const middleware = new APIGatewayMiddleware(rateLimiter, config, logger);
  const routes = new APIRoutes(
    orchestration,
    middleware,
    logger,
    config.isDevelopment
  );

  const app = express();

  // Rate limits key on the client address behind one proxy hop
  app.set("trust proxy", 1);

  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    })
  );
  app.use(express.json({ limit: config.bodyLimit }));
  app.use(middleware.requestLogger());

  app.get("/health", (_req, res) => {
    const response: HealthCheckResponse = {
      status: "healthy",
      service: config.serviceName,
      version: config.version,
      timestamp: new Date().toISOString(),
    };
    res.json(response);
  });

  app.get("/", (_req, res) => {
    const base = `/api/${config.apiVersion}`;
    sendSuccess(res, {
      service: "Property Deal Analyzer API",
      version: config.version,
      health: "/health",
      endpoints: {
        evaluate: `POST ${base}/evaluate`,
        analyze: `POST ${base}/analyze`,
        soldPrices: `GET ${base}/area/sold-prices?postcode=`,
        priceTrend: `GET ${base}/area/price-trend?postcode=`,
        transport: `GET ${base}/area/transport?lat=&lon=`,
        crime: `GET ${base}/area/crime?lat=&lon=`,
        nationalRail: `GET ${base}/area/national-rail?postcode=`,
        ukTransport: `GET ${base}/area/uk-transport?postcode=`,
        journey: `POST ${base}/transport/journey`,
      },
      rateLimit: config.enableRateLimit ? "enabled" : "disabled",
    });
  });

  app.use(`/api/${config.apiVersion}`, routes.getRouter());

  app.use(middleware.notFoundHandler());
  app.use(middleware.errorHandler());

  return app;
}
