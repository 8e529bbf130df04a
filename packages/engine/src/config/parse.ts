/**
 * Lenient parsers for configuration values.
 *
 * Each returns null when the input cannot be read; callers choose the
 * default. None of them throw.
 */

import type { ActiveWindow, ClockInput, FractionInput, Seconds, WindowInput } from "@equatone/contracts";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Strict decimal read: empty, non-numeric or infinite input gives null.
 */
export function parseNumber(input: unknown): number | null {
  if (typeof input === "number") {
    return Number.isFinite(input) ? input : null;
  }
  if (typeof input !== "string" || input.trim() === "") {
    return null;
  }
  const value = Number(input.trim());
  return Number.isFinite(value) ? value : null;
}

/**
 * Integer read; fractional numbers are truncated toward zero.
 */
export function parseInteger(input: unknown): number | null {
  if (typeof input === "string" && !INTEGER_PATTERN.test(input.trim())) {
    return null;
  }
  const value = parseNumber(input);
  return value === null ? null : Math.trunc(value);
}

/**
 * "a/b" or a plain decimal. Division by zero gives null.
 */
export function parseFraction(input: FractionInput | undefined): number | null {
  if (typeof input === "string" && input.includes("/")) {
    const slash = input.indexOf("/");
    const numerator = parseNumber(input.slice(0, slash));
    const denominator = parseNumber(input.slice(slash + 1));
    if (numerator === null || denominator === null || denominator === 0) {
      return null;
    }
    return numerator / denominator;
  }
  return parseNumber(input);
}

/**
 * Plain seconds or "minutes:seconds" (minutes must be whole).
 */
export function parseClock(input: ClockInput): Seconds | null {
  if (typeof input === "string" && input.includes(":")) {
    const colon = input.indexOf(":");
    const minutesText = input.slice(0, colon).trim();
    if (!INTEGER_PATTERN.test(minutesText)) {
      return null;
    }
    const seconds = parseNumber(input.slice(colon + 1));
    return seconds === null ? null : Number(minutesText) * 60 + seconds;
  }
  return parseNumber(input);
}

/**
 * [start, end] or "start,end".
 */
export function parseWindow(input: WindowInput | null | undefined): ActiveWindow | null {
  if (input === null || input === undefined) {
    return null;
  }

  let parts: ClockInput[];
  if (typeof input === "string") {
    const comma = input.indexOf(",");
    if (comma < 0) return null;
    parts = [input.slice(0, comma), input.slice(comma + 1)];
  } else if (typeof input === "object" && input.length >= 2) {
    parts = [input[0], input[1]];
  } else {
    return null;
  }

  const start = parseClock(parts[0]);
  const end = parseClock(parts[1]);
  if (start === null || end === null) {
    return null;
  }
  return { start, end };
}
