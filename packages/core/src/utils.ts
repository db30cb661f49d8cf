/**
 * Utility functions for Telltale
 */

/**
 * Clamp a number into [min, max]; NaN collapses to min
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * One-decimal fixed notation, rounding exact binary ties half to even the way
 * printf's "%.1f" does. Only values with a .25/.75 fraction are exact ties;
 * everything else goes through toFixed unchanged.
 */
export function toFixedOneHalfEven(value: number): string {
  if (!Number.isFinite(value) || !Number.isInteger(value * 4) || Number.isInteger(value * 2)) {
    return value.toFixed(1);
  }
  const lower = Math.floor(value * 10);
  const tenths = lower % 2 === 0 ? lower : lower + 1;
  return (tenths / 10).toFixed(1);
}

/**
 * Monotonic time in nanoseconds, the clock athena ping timestamps are taken on
 */
export function monotonicNanos(): number {
  return Math.round(performance.now() * 1e6);
}

/**
 * Largest of a base value and any number of readings, skipping empty lists
 */
export function maxReading(base: number, ...readings: ReadonlyArray<readonly number[]>): number {
  let max = base;
  for (const list of readings) {
    for (const t of list) {
      if (t > max) max = t;
    }
  }
  return max;
}
