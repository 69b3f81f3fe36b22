export * from "./signals";
export * from "./summary";
export * from "./schema";
export * from "./computeFromOhlc";
export * from "./remote/rateLimiter";
export * from "./remote/indicatorSpecs";
export * from "./remote/fetchOrchestrator";
export * from "./remote/formatRemote";
export * from "./remote/fetchFromRemote";
export * from "./batch/runBatch";
