/**
 * Pipeline Interfaces
 *
 * Contracts for the components between configuration and rendered
 * artifacts: sequencers (one per equation) and render targets.
 */

import type { Seconds } from "../core/time";
import type { VariableState } from "../equation/equation";
import type { Diagnostic } from "../diagnostics/diagnostics";
import type { Composition, NoteEvent, Track } from "../notes/notes";

// ============================================================================
// Sequencers
// ============================================================================

/**
 * Lifecycle of one equation's simulation.
 */
export type SequencerPhase = "initialized" | "stepping" | "completed";

/**
 * Time-stepped state machine turning one equation into a Track.
 *
 * Sequencers are purely sequential and own their variable state, so
 * several may run side by side without synchronization.
 */
export interface IEquationSequencer {
  /** Equation name */
  readonly id: string;

  readonly phase: SequencerPhase;

  /** Local time of the next step */
  readonly time: Seconds;

  /** Current variable state, as a fresh copy the caller may modify */
  readonly state: VariableState;

  /** Recovered failures so far */
  readonly diagnostics: readonly Diagnostic[];

  /** Called once before the first step */
  init(): void;

  /**
   * Advance one step and return the notes it emitted,
   * or null once the window is exhausted.
   */
  step(): NoteEvent[] | null;

  /** Step to completion and return the whole Track */
  run(): Track;

  /** Return to the initial state */
  reset(): void;

  /** Called once when the sequencer is no longer needed */
  dispose(): void;
}

// ============================================================================
// Render Targets
// ============================================================================

/**
 * Consumes a Composition and produces one artifact. Targets do not touch
 * the file system; writing is left to the caller.
 */
export interface IRenderTarget {
  id: string;

  /** File extension without the dot, e.g. "mid" */
  extension: string;

  render(composition: Composition): Uint8Array | string;
}
