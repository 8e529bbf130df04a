import { describe, it, expect } from "vitest";
import type { Composition, NoteEvent } from "@equatone/contracts";
import { UstRenderer, melodyLine } from "../../src/render/UstRenderer";

function note(pitch: number, start: number, end: number): NoteEvent {
  return { pitch, velocity: 100, start, end, track: "lead" };
}

function makeComposition(notes: NoteEvent[]): Composition {
  return {
    tempo: 120,
    tracks: [{ name: "lead", instrument: "piano", notes }],
    diagnostics: [],
  };
}

const SETTING = [
  "[#SETTING]",
  "Tempo=120",
  "Tracks=1",
  "ProjectName=Equatone",
  "VoiceDir=%VOICE%default\\",
  "CacheDir=%VOICE%default\\cache\\",
  "Mode2=True",
  "",
];

describe("melodyLine", () => {
  it("keeps the highest pitch of each onset", () => {
    const line = melodyLine([note(60, 0, 0.25), note(64, 0, 0.25), note(62, 0.5, 1)]);
    expect(line.map((n) => n.pitch)).toEqual([64, 62]);
  });
});

describe("UstRenderer", () => {
  it("writes the melody with rests between notes", () => {
    const renderer = new UstRenderer({ lyrics: "la li" });
    const output = renderer.render(
      makeComposition([note(60, 0, 0.25), note(64, 0, 0.25), note(62, 0.5, 1)])
    );

    expect(output.split("\n")).toEqual([
      ...SETTING,
      "[#0000]",
      "Length=480",
      "Lyric=R",
      "NoteNum=60",
      "",
      "[#0001]",
      "Length=240",
      "Lyric=la",
      "NoteNum=52",
      "Flags=B50",
      "",
      "[#0002]",
      "Length=240",
      "Lyric=R",
      "NoteNum=60",
      "",
      "[#0003]",
      "Length=480",
      "Lyric=li",
      "NoteNum=50",
      "Flags=B50",
      "",
      "[#0004]",
      "Length=480",
      "Lyric=R",
      "NoteNum=60",
      "",
    ]);
  });

  it("cycles lyrics and defaults to 'a'", () => {
    const output = new UstRenderer().render(
      makeComposition([note(60, 0, 0.5), note(62, 0.5, 1), note(64, 1, 1.5)])
    );
    const lyrics = output.split("\n").filter((line) => line.startsWith("Lyric="));
    expect(lyrics).toEqual(["Lyric=R", "Lyric=a", "Lyric=a", "Lyric=a", "Lyric=R"]);
  });

  it("trims a note that overlaps the previous one", () => {
    const output = new UstRenderer().render(makeComposition([note(60, 0, 0.5), note(62, 0.25, 1)]));
    const lengths = output.split("\n").filter((line) => line.startsWith("Length="));
    expect(lengths).toEqual(["Length=480", "Length=480", "Length=480", "Length=480"]);
  });

  it("writes only the framing rests for an empty composition", () => {
    const output = new UstRenderer().render({ tempo: 90, tracks: [], diagnostics: [] });
    const lines = output.split("\n");

    expect(lines[1]).toBe("Tempo=90");
    expect(lines.filter((line) => line.startsWith("[#0"))).toEqual(["[#0000]", "[#0001]"]);
  });
});
