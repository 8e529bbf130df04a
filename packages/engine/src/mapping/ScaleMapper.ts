/**
 * Scale Mapper
 *
 * Pure mapping from a normalized value in [0, 1] to pitches and a velocity.
 * The value selects a degree index across `octaveRange` octaves of the
 * scale; each extra polyphony voice takes the next degree up.
 */

import type { MappingConfig, MidiNoteNumber, Velocity } from "@equatone/contracts";
import { MIDI_NOTE_MAX, MIDI_NOTE_MIN, VELOCITY_MAX, VELOCITY_MIN } from "@equatone/contracts";

import { getScaleDegrees } from "./scales";

export interface ScaleMapping {
  /** One pitch per voice, lowest first */
  pitches: MidiNoteNumber[];
  velocity: Velocity;
  /** Degree selected for voice 0, in [0, totalSteps - 1] */
  degreeIndex: number;
  totalSteps: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Degrees covered by the mapping; a non-positive octave range collapses to
 * a single octave.
 */
export function totalSteps(degreeCount: number, octaveRange: number): number {
  const steps = degreeCount * octaveRange;
  return steps <= 0 ? degreeCount : steps;
}

export function mapScale(vScaled: number, mapping: MappingConfig): ScaleMapping {
  const degrees = getScaleDegrees(mapping.scale);
  const steps = totalSteps(degrees.length, mapping.octaveRange);
  const degreeIndex = clamp(Math.floor(vScaled * steps), 0, steps - 1);

  const pitches: MidiNoteNumber[] = [];
  for (let voice = 0; voice < mapping.polyphony; voice++) {
    const d = degreeIndex + voice;
    const scaleIdx = d % degrees.length;
    const octaveShift = Math.floor(d / degrees.length);
    const pitch = mapping.baseMidi + degrees[scaleIdx] + 12 * octaveShift;
    pitches.push(clamp(pitch, MIDI_NOTE_MIN, MIDI_NOTE_MAX));
  }

  return {
    pitches,
    velocity: velocityFor(vScaled, mapping.velocityCurve),
    degreeIndex,
    totalSteps: steps,
  };
}

export function velocityFor(vScaled: number, curve: MappingConfig["velocityCurve"]): Velocity {
  const shaped = curve === "exponential" ? vScaled * vScaled : vScaled;
  return clamp(Math.round(1 + shaped * 126), VELOCITY_MIN, VELOCITY_MAX);
}
