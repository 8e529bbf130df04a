import { Midi } from "@tonejs/midi";

import type { Composition, IRenderTarget } from "@equatone/contracts";
import { VELOCITY_MAX } from "@equatone/contracts";

/**
 * Configuration for the MIDI file renderer.
 */
export interface MidiFileRendererConfig {
  /**
   * Instrument name → General MIDI program.
   * @default { piano: 0 }
   */
  programs?: Record<string, number>;

  /**
   * Program for instruments not listed in `programs` (80 = square lead).
   * @default 80
   */
  defaultProgram?: number;
}

const DEFAULT_CONFIG: Required<MidiFileRendererConfig> = {
  programs: { piano: 0 },
  defaultProgram: 80,
};

/** General MIDI reserves channel 10 (index 9) for percussion */
const PERCUSSION_CHANNEL = 9;

const MIDI_CHANNELS = 16;

/**
 * Channel for the track at `index`, skipping the percussion channel.
 */
export function channelFor(index: number): number {
  const melodic = index % (MIDI_CHANNELS - 1);
  return melodic < PERCUSSION_CHANNEL ? melodic : melodic + 1;
}

/**
 * Standard MIDI file writer: one track per equation, tempo from the
 * composition, note times in seconds.
 */
export class MidiFileRenderer implements IRenderTarget {
  readonly id = "midi";
  readonly extension = "mid";

  private config: Required<MidiFileRendererConfig>;

  constructor(config: MidiFileRendererConfig = {}) {
    this.config = {
      programs: config.programs ?? DEFAULT_CONFIG.programs,
      defaultProgram: config.defaultProgram ?? DEFAULT_CONFIG.defaultProgram,
    };
  }

  programFor(instrument: string): number {
    return this.config.programs[instrument.toLowerCase()] ?? this.config.defaultProgram;
  }

  render(composition: Composition): Uint8Array {
    const midi = new Midi();
    midi.header.setTempo(composition.tempo);

    composition.tracks.forEach((track, index) => {
      const out = midi.addTrack();
      out.name = track.name;
      out.channel = channelFor(index);
      out.instrument.number = this.programFor(track.instrument);

      for (const note of track.notes) {
        out.addNote({
          midi: note.pitch,
          time: note.start,
          duration: note.end - note.start,
          velocity: note.velocity / VELOCITY_MAX,
        });
      }
    });

    return midi.toArray();
  }
}
