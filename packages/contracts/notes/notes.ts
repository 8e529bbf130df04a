/**
 * Note Event Types
 *
 * Output of the sequencer. Times are seconds from composition start;
 * pitches and velocities use MIDI ranges.
 */

import type { Bpm, Seconds } from "../core/time";
import type { Diagnostic } from "../diagnostics/diagnostics";

export type MidiNoteNumber = number; // 0..127
export type Velocity = number;       // 1..127

/**
 * A single emitted note. Invariants: 0 <= pitch <= 127,
 * 1 <= velocity <= 127, end > start.
 */
export interface NoteEvent {
  readonly pitch: MidiNoteNumber;
  readonly velocity: Velocity;
  readonly start: Seconds;
  readonly end: Seconds;
  /** Name of the equation that produced it */
  readonly track: string;
}

/**
 * Notes of one equation in emission order (non-decreasing start).
 */
export interface Track {
  name: string;
  instrument: string;
  notes: NoteEvent[];
}

/**
 * Everything a render target needs: tempo, tracks in equation order, and
 * the failures recovered while producing them.
 */
export interface Composition {
  tempo: Bpm;
  tracks: Track[];
  diagnostics: Diagnostic[];
}

export const MIDI_NOTE_MIN = 0;
export const MIDI_NOTE_MAX = 127;
export const VELOCITY_MIN = 1;
export const VELOCITY_MAX = 127;
