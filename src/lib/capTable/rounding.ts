export const PERCENTAGE_PLACES = 4;

/**
 * Round half-up (away from zero) for reporting. Applied only when results
 * leave the engine; internal sums stay at full precision.
 */
export function roundPercentage(value: number, places: number = PERCENTAGE_PLACES): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** places;
  // toPrecision strips representation noise such as 1.005 * 100 = 100.49999...
  const shifted = Number((Math.abs(value) * factor).toPrecision(15));
  return (Math.sign(value) * Math.floor(shifted + 0.5)) / factor;
}
