export * from "./app";
export * from "./config/env";
export * from "./core/area";
export * from "./core/dto";
export * from "./core/errors";
export * from "./core/orchestration";
export * from "./core/ports";
export * from "./http/middleware";
export * from "./http/routes";
export * from "./adapters/cache.redis";
export * from "./adapters/crime.api";
export * from "./adapters/land-registry.api";
export * from "./adapters/narrative.template";
export * from "./adapters/rate-limit.memory";
export * from "./adapters/transport.api";
export * from "./adapters/journey.api";
export * from "./adapters/postcode.api";
export * from "./adapters/rail-stations.file";
