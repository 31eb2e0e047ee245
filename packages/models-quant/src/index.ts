/**
 * Forecasting models. The scalar Kalman filter here takes one noise
 * parameter, the variance of the whole series, for both process and
 * measurement noise.
 */
export * from "./errors";
export * from "./variance";
export * from "./kalman";
