// Amounts are plain numbers; every value that leaves a computation step is
// rounded to the currency's minor unit.

export function minorUnit(decimals: number): number {
  return 1 / 10 ** decimals;
}

// Round-half-to-even. The scaled value is first trimmed to 6 fractional
// digits so binary noise (74.725 * 100 = 7472.499999…) lands on the tie.
export function roundHalfEven(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const scaled = Number((value * factor).toFixed(6));
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let units: number;
  if (diff > 0.5) units = floor + 1;
  else if (diff < 0.5) units = floor;
  else units = floor % 2 === 0 ? floor : floor + 1;

  const rounded = units / factor;
  return rounded === 0 ? 0 : rounded;
}

export function sumAmounts(values: readonly number[], decimals: number): number {
  let total = 0;
  for (const value of values) total += value;
  return roundHalfEven(total, decimals);
}

export function amountsEqual(a: number, b: number, decimals: number): boolean {
  return roundHalfEven(a - b, decimals) === 0;
}

// Slack for comparing already-rounded amounts against a tolerance.
const COMPARE_EPSILON = 1e-9;

export function exceedsTolerance(delta: number, tolerance: number): boolean {
  return Math.abs(delta) - tolerance > COMPARE_EPSILON;
}

export function signOf(value: number): -1 | 0 | 1 {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}
