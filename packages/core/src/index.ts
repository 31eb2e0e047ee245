/**
 * Shared contracts, configuration and logging for every pricecast package.
 */
export * from "./types";
export * from "./config";
export * from "./env";
export * from "./exchange";
export * from "./time/constants";
export * from "./time/time";
export * from "./utils/logger";
