import type { BeatFraction, Seconds } from "@equatone/contracts";

/**
 * Round to nearest integer, ties to even (2.5 → 2, 3.5 → 4).
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Snap `t` to the nearest multiple of `quant` beats.
 * A non-positive grid leaves the time unchanged.
 */
export function quantizeTime(t: Seconds, quant: BeatFraction, beatSeconds: Seconds): Seconds {
  if (quant <= 0) {
    return t;
  }
  const grid = beatSeconds * quant;
  return roundHalfEven(t / grid) * grid;
}
