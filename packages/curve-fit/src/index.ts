export * as Fit from "./fit.js";
export * from "./fit.js";
export { normalEquations, solveLinearSystem, solveLeastSquares } from "./linalg.js";
export type { Matrix } from "./linalg.js";
export { vandermonde } from "./polynomial.js";
export { loadConfig, parseConfig, resetConfigCache } from "./config/configManager.js";
export { AppConfigSchema, RationalFitOptionsSchema } from "./config/schema.js";
export type { AppConfig } from "./config/schema.js";
export { setLogLevel, getLogLevel, resetWarnings } from "./log.js";
