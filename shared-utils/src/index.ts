// Re-export all shared utilities
export * from "./cache";
export * from "./config";
export * from "./logger";
