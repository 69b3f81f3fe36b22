/**
 * Shared contracts for the technical-analysis workspace: record types, the
 * error taxonomy, structured logging, configuration and time helpers.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./config";
export * from "./utils/logger";
export * from "./interfaces";
