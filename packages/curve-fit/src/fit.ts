// Fitting surface, exported as the `Fit` namespace
export { fitPolynomial, evaluatePolynomial } from "./polynomial.js";
export { fitRational, evaluateRational } from "./rational.js";
export { fitVector, evaluateVector } from "./vector.js";
export {
  computeErrorMetrics,
  computeVectorErrorMetrics,
  polynomialErrorMetrics,
  rationalErrorMetrics,
  formatErrorMetrics,
} from "./metrics.js";
