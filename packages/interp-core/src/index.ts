export * from "./constants.js";
export * from "./errors.js";
export * from "./utils.js";
export { findInsertionPoint } from "./search.js";
export { linearBetween, linear, batchLinear, logLinear, nearest, bilinear } from "./piecewise.js";
export { AkimaSpline, buildAkimaSpline, akima } from "./akima.js";
