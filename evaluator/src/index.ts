export * from "./config/policy";
export * from "./core/analyze";
export * from "./core/compute";
export * from "./core/dto";
export * from "./core/errors";
export * from "./core/evaluate";
export * from "./core/finance";
export * from "./core/risk";
export * from "./core/stamp-duty";
export * from "./core/strategy";
export * from "./core/validate";
export * from "./core/verdict";
