/**
 * Raw Configuration Types
 *
 * The shape of composition files and interactive input before
 * normalization. Keys follow the file format (snake_case); every field is
 * optional because missing values fall back to defaults.
 */

/** "a/b" or a plain decimal, as a string or number */
export type FractionInput = string | number;

/** Plain seconds or "mm:ss" */
export type ClockInput = string | number;

/** [start, end] or "start,end" with each side in ClockInput form */
export type WindowInput = readonly [ClockInput, ClockInput] | string;

export interface MappingInput {
  base_midi?: number | string;
  scale?: string;
  octave_range?: number | string;
  instrument?: string;
  polyphony?: number | string;
  /** Alias of polyphony */
  poly?: number | string;
  rhythm_quant?: FractionInput;
  velocity_curve?: string;
}

/** `{ x: [threshold, reset_to] }`; malformed entries are skipped */
export type LimitsInput = Record<string, unknown>;

export interface EquationConfig {
  name?: string;
  expr?: string;
  vars?: Record<string, number | string>;
  updates?: string[];
  eval_rate?: FractionInput;
  duration?: number | string;
  active_window?: WindowInput | null;
  /** Alias of active_window */
  activeWindow?: WindowInput | null;
  mapping?: MappingInput;
  limits?: LimitsInput;
}

export interface CompositionConfig {
  /** Beats per minute, default 120 */
  tempo?: number;
  equations?: EquationConfig[];
}
