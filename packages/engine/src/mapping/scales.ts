/**
 * Scale Table
 *
 * Fixed set of named interval sets. Each name resolves to a scale type in
 * the tonal dictionary once, at module load. Key-named entries select only
 * the interval pattern; the root pitch always comes from
 * MappingConfig.baseMidi.
 *
 * Unknown names fall back to DEFAULT_SCALE without raising.
 */

import * as Tonal from "tonal";

export const DEFAULT_SCALE = "minor";

/**
 * Scale name → tonal scale type.
 * b_minor uses the melodic minor pattern (raised 6th and 7th).
 */
const SCALE_TYPES: Record<string, string> = {
  major: "major",
  minor: "minor",
  pentatonic: "major pentatonic",
  a_minor: "minor",
  b_minor: "melodic minor",
  c_minor: "minor",
  c_major: "major",
  d_minor: "minor",
  d_major: "major",
  e_minor: "minor",
  e_major: "major",
  f_minor: "minor",
  f_major: "major",
  g_minor: "minor",
  g_major: "major",
};

function resolveDegrees(scaleType: string): readonly number[] {
  const intervals = Tonal.ScaleType.get(scaleType).intervals;
  if (intervals.length === 0) {
    throw new Error(`Unknown scale type in table: ${scaleType}`);
  }
  return Object.freeze(intervals.map((interval) => Tonal.Interval.semitones(interval)));
}

const SCALE_DEGREES: ReadonlyMap<string, readonly number[]> = new Map(
  Object.entries(SCALE_TYPES).map(([name, type]) => [name, resolveDegrees(type)])
);

/**
 * Lower-case and turn hyphens into underscores ("A-minor" → "a_minor").
 */
export function normalizeScaleName(name: string): string {
  return name.toLowerCase().replace(/-/g, "_");
}

export function isKnownScale(name: string): boolean {
  return SCALE_DEGREES.has(normalizeScaleName(name));
}

/**
 * Semitone offsets of the named scale, or of the minor scale when the
 * name is not in the table.
 */
export function getScaleDegrees(name: string): readonly number[] {
  const degrees = SCALE_DEGREES.get(normalizeScaleName(name));
  if (degrees) return degrees;
  const fallback = SCALE_DEGREES.get(DEFAULT_SCALE);
  if (!fallback) {
    throw new Error(`Default scale "${DEFAULT_SCALE}" missing from table`);
  }
  return fallback;
}

export function listScales(): string[] {
  return Array.from(SCALE_DEGREES.keys());
}
