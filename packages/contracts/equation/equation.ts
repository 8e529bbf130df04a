/**
 * Equation Types
 *
 * The normalized, immutable description of one time-varying expression
 * and how its values are mapped to notes. Raw configuration input is
 * described in config/config.ts; the engine converts one into the other.
 */

import type { BeatFraction, Seconds } from "../core/time";

/**
 * Free variables an equation expression may read.
 */
export type VariableName = "x" | "y" | "z";

export const STATE_VARIABLES: readonly VariableName[] = ["x", "y", "z"];

/**
 * Variables available to update rules (state plus local time).
 */
export const UPDATE_VARIABLES: readonly string[] = ["x", "y", "z", "t"];

/**
 * Numeric state for x, y, z. Owned by exactly one sequencer during a
 * simulation and never shared across equations.
 */
export type VariableState = Record<VariableName, number>;

export type VelocityCurve = "linear" | "exponential";

/**
 * How normalized values become pitches, velocities and note timing.
 */
export interface MappingConfig {
  /** Root pitch; scale degree 0 of octave 0 */
  baseMidi: number;

  /** Named interval set, e.g. "major", "a_minor" */
  scale: string;

  /** Number of octaves the degree range spans */
  octaveRange: number;

  /** Voices per step, stacked upward in scale-degree order */
  polyphony: number;

  /** Grid as a fraction of a beat; 0 disables quantization */
  rhythmQuant: BeatFraction;

  velocityCurve: VelocityCurve;

  /** Timbre selector, passed through to render targets */
  instrument: string;
}

/**
 * Per-variable safety valve: once the value reaches `threshold` it is
 * snapped back to `resetTo`. At most one rule targets a given variable.
 */
export interface LimitRule {
  variable: VariableName;
  threshold: number;
  resetTo: number;
}

/**
 * Interval during which an equation is evaluated.
 */
export interface ActiveWindow {
  start: Seconds;
  end: Seconds;
}

export interface Equation {
  /** Unique within a run; also the name of the produced track */
  readonly name: string;

  readonly expr: string;

  /** Initial state; sequencers copy it */
  readonly vars: Readonly<VariableState>;

  /** Assignment rules of the form `var = f(x, y, z, t)`, in order */
  readonly updates: readonly string[];

  /** Beat fraction between evaluations */
  readonly evalRate: BeatFraction;

  /** Declared lifetime used by the scheduler */
  readonly duration: Seconds;

  readonly window: Readonly<ActiveWindow>;

  readonly mapping: Readonly<MappingConfig>;

  readonly limits: readonly LimitRule[];
}

export function isVariableName(name: string): name is VariableName {
  return name === "x" || name === "y" || name === "z";
}
