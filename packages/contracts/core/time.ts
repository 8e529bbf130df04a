export type Seconds = number;     // wall-clock seconds from composition start
export type Bpm = number;
export type Ms = number;          // milliseconds (timers, poll intervals)
export type BeatFraction = number; // fraction of one beat, e.g. 1/8

/** Tolerance used when comparing simulated times against window edges. */
export const TIME_EPSILON: Seconds = 1e-9;

export function beatSeconds(tempo: Bpm): Seconds {
  return 60 / tempo;
}
