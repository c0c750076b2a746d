// Pivot magnitude below which a normal-equation matrix is treated as singular
export const PIVOT_TOL = 1e-10;

// |Q(x)| below this is a root of the denominator
export const EPS_DENOM = 1e-10;

// R² is defined as 1 when the reference data has no spread
export const EPS_SS_TOTAL = 1e-10;
export const EPS_RELATIVE = 1e-10;

// Akima derivative fallback
export const AKIMA_MIN_POINTS = 5;
export const AKIMA_WEIGHT_EPS = 1e-10;
export const AKIMA_LARGE_WEIGHT = 1e5;

// Rational-fit iteration defaults
export const RATIONAL_MAX_ITER = 100;
export const RATIONAL_TOL = 1e-6;
