// Coefficients of the rational approximations, P. J. Acklam (2003).
// Relative error less than 1.15e-9 over the whole domain.
const a = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2,
  -3.066479806614716e1, 2.506628277459239,
];
const b = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1,
  -1.328068155288572e1,
];
const c = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734,
  4.374664141464968, 2.938163982698783,
];
const d = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416];

const P_LOW = 0.02425;
const P_HIGH = 1 - P_LOW;

/** Lower tail */
function tail(p: number): number {
  const q = Math.sqrt(-2 * Math.log(p));
  return (
    (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
    ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
  );
}

/**
 * Percent point function (inverse of the cumulative distribution function)
 * of the standard normal distribution.
 */
export function ppf(p: number): number {
  if (Number.isNaN(p) || p < 0 || p > 1) return NaN;
  if (p === 0) return -Infinity;
  if (p === 1) return Infinity;

  if (p < P_LOW) return tail(p);
  if (p > P_HIGH) return -tail(1 - p);

  const q = p - 0.5;
  const r = q * q;

  return (
    ((((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q) /
    (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1)
  );
}

/**
 * The critical value of a two-sided interval at the given confidence level,
 * e.g. 1.96 for 0.95
 */
export function zValue(confidenceLevel: number): number {
  return ppf((1 + confidenceLevel) / 2);
}
