/**
 * UTAU Project Renderer
 *
 * Writes one track as a UTAU sequence (.ust): a monophonic vocal line
 * built from the highest voice of each step, with rests filling the gaps.
 *
 * Format notes:
 * - lengths are ticks at 480 per beat
 * - UTAU numbers C4 as 48, MIDI as 60
 * - every sung note carries the same flags
 */

import type { Composition, IRenderTarget, NoteEvent, Seconds, Track } from "@equatone/contracts";
import { beatSeconds } from "@equatone/contracts";

export const UST_TICKS_PER_BEAT = 480;

const UTAU_PITCH_OFFSET = 12;
const REST_LYRIC = "R";
const REST_NOTE_NUM = 60;

/**
 * Configuration for the UST renderer.
 */
export interface UstRendererConfig {
  /**
   * Whitespace-separated syllables sung in turn, cycling.
   * @default "a"
   */
  lyrics?: string;

  /** @default "Equatone" */
  projectName?: string;

  /**
   * Voicebank directory as UTAU expects it.
   * @default "%VOICE%default\\"
   */
  voiceDir?: string;

  /** @default "B50" */
  flags?: string;

  /**
   * Index of the track to sing.
   * @default 0
   */
  trackIndex?: number;
}

const DEFAULT_CONFIG: Required<UstRendererConfig> = {
  lyrics: "a",
  projectName: "Equatone",
  voiceDir: "%VOICE%default\\",
  flags: "B50",
  trackIndex: 0,
};

interface UstNote {
  length: number;
  lyric: string;
  noteNum: number;
}

export class UstRenderer implements IRenderTarget {
  readonly id = "ust";
  readonly extension = "ust";

  private config: Required<UstRendererConfig>;

  constructor(config: UstRendererConfig = {}) {
    this.config = {
      lyrics: config.lyrics ?? DEFAULT_CONFIG.lyrics,
      projectName: config.projectName ?? DEFAULT_CONFIG.projectName,
      voiceDir: config.voiceDir ?? DEFAULT_CONFIG.voiceDir,
      flags: config.flags ?? DEFAULT_CONFIG.flags,
      trackIndex: config.trackIndex ?? DEFAULT_CONFIG.trackIndex,
    };
  }

  render(composition: Composition): string {
    const beat = beatSeconds(composition.tempo);
    const track: Track | undefined = composition.tracks[this.config.trackIndex];
    const sung = track ? this.toUstNotes(melodyLine(track.notes), beat) : [];

    const rest: UstNote = { length: UST_TICKS_PER_BEAT, lyric: REST_LYRIC, noteNum: REST_NOTE_NUM };
    const sections = [rest, ...sung, rest];

    const lines = [
      "[#SETTING]",
      `Tempo=${composition.tempo}`,
      "Tracks=1",
      `ProjectName=${this.config.projectName}`,
      `VoiceDir=${this.config.voiceDir}`,
      `CacheDir=${this.config.voiceDir}cache\\`,
      "Mode2=True",
      "",
    ];

    sections.forEach((note, i) => {
      lines.push(`[#${String(i).padStart(4, "0")}]`);
      lines.push(`Length=${note.length}`);
      lines.push(`Lyric=${note.lyric}`);
      lines.push(`NoteNum=${note.noteNum}`);
      if (note.lyric !== REST_LYRIC) {
        lines.push(`Flags=${this.config.flags}`);
      }
      lines.push("");
    });

    return lines.join("\n");
  }

  private toUstNotes(melody: NoteEvent[], beat: Seconds): UstNote[] {
    const syllables = this.config.lyrics.split(/\s+/).filter((s) => s !== "");
    const lyrics = syllables.length > 0 ? syllables : [DEFAULT_CONFIG.lyrics];
    const toTicks = (t: Seconds): number => Math.round((t / beat) * UST_TICKS_PER_BEAT);

    const out: UstNote[] = [];
    let cursor = 0;
    let sungCount = 0;

    for (const note of melody) {
      const start = Math.max(cursor, toTicks(note.start));
      const end = toTicks(note.end);
      if (end <= start) continue;

      if (start > cursor) {
        out.push({ length: start - cursor, lyric: REST_LYRIC, noteNum: REST_NOTE_NUM });
      }
      out.push({
        length: end - start,
        lyric: lyrics[sungCount % lyrics.length],
        noteNum: note.pitch - UTAU_PITCH_OFFSET,
      });
      sungCount++;
      cursor = end;
    }

    return out;
  }
}

/**
 * Highest pitch per onset, in onset order.
 */
export function melodyLine(notes: readonly NoteEvent[]): NoteEvent[] {
  const byStart = new Map<Seconds, NoteEvent>();
  for (const note of notes) {
    const current = byStart.get(note.start);
    if (!current || note.pitch > current.pitch) {
      byStart.set(note.start, note);
    }
  }
  return Array.from(byStart.values()).sort((a, b) => a.start - b.start);
}
