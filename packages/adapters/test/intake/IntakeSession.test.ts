import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { EquationScheduler } from "@equatone/engine";
import type { LifetimeTimer } from "@equatone/engine";
import { ConfigStore } from "../../src/config/ConfigStore";
import type { IntakePrompter } from "../../src/intake/IntakePrompter";
import {
  IntakeSession,
  readDuration,
  readLimit,
  readVars,
  readWindow,
} from "../../src/intake/IntakeSession";

/**
 * Prompter that replays fixed answers and records everything printed.
 */
class ScriptedPrompter implements IntakePrompter {
  readonly prompts: string[] = [];
  readonly printed: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? null;
  }

  print(line: string): void {
    this.printed.push(line);
  }
}

const FIELDS = [
  "expr",
  "vars",
  "updates",
  "evalRate",
  "duration",
  "baseMidi",
  "scale",
  "octaveRange",
  "instrument",
  "polyphony",
  "rhythmQuant",
  "velocityCurve",
  "window",
  "limitX",
  "limitY",
  "limitZ",
] as const;

type Field = (typeof FIELDS)[number];

/** Name followed by one answer per field prompt; blank means default */
function equationAnswers(name: string, answers: Partial<Record<Field, string>> = {}): string[] {
  return [name, ...FIELDS.map((field) => answers[field] ?? "")];
}

/** Lifetimes that never end on their own */
const neverEnding: LifetimeTimer = { start: () => () => undefined };

/** Lifetimes that end as soon as they start */
const immediate: LifetimeTimer = {
  start(_durationMs, onDone) {
    onDone();
    return () => undefined;
  },
};

describe("IntakeSession", () => {
  let dir: string;
  let configPath: string;
  let scheduler: EquationScheduler;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "equatone-intake-"));
    configPath = join(dir, "configs", "saved_config.json");
    scheduler = new EquationScheduler({ timer: neverEnding });
  });

  afterEach(async () => {
    scheduler.dispose();
    await rm(dir, { recursive: true, force: true });
  });

  it("collects an equation with defaults and saves it", async () => {
    const prompter = new ScriptedPrompter([
      ...equationAnswers("lead", { expr: "sin(x) + y", window: "0:01,0:03", limitX: "10,0" }),
      "save",
    ]);
    const session = new IntakeSession(prompter, { scheduler, configPath, configOnly: true });

    const result = await session.run();

    const expected = {
      equations: [
        {
          name: "lead",
          expr: "sin(x) + y",
          vars: { x: 0, y: 0, z: 0 },
          updates: [],
          eval_rate: "1/8",
          duration: 5,
          mapping: {
            base_midi: 60,
            scale: "A_minor",
            octave_range: 2,
            instrument: "piano",
            polyphony: 1,
            rhythm_quant: 0.0625,
            velocity_curve: "linear",
          },
          active_window: [1, 3],
          limits: { x: [10, 0] },
        },
      ],
    };
    expect(result.config).toEqual(expected);
    expect(result.savedTo).toBe(configPath);
    expect(await new ConfigStore().load(configPath)).toEqual(expected);
  });

  it("reads explicit field answers", async () => {
    const prompter = new ScriptedPrompter([
      ...equationAnswers("bass", {
        vars: "1,2,3",
        updates: "x = x + 1; y = y * 0.5",
        evalRate: "1/4",
        duration: "2",
        baseMidi: "36",
        scale: "major",
        octaveRange: "1",
        instrument: "synth",
        polyphony: "2",
        rhythmQuant: "1/8",
        velocityCurve: "exp",
      }),
      "save",
    ]);
    const session = new IntakeSession(prompter, { scheduler, configPath, configOnly: true });

    await session.run();

    expect(session.equations[0]).toEqual({
      name: "bass",
      expr: "sin(x)",
      vars: { x: 1, y: 2, z: 3 },
      updates: ["x = x + 1", "y = y * 0.5"],
      eval_rate: "1/4",
      duration: 2,
      mapping: {
        base_midi: 36,
        scale: "major",
        octave_range: 1,
        instrument: "synth",
        polyphony: 2,
        rhythm_quant: 0.125,
        velocity_curve: "exp",
      },
    });
  });

  it("submits accepted equations to the scheduler", async () => {
    const single = new EquationScheduler({ capacity: 1, timer: neverEnding });
    const prompter = new ScriptedPrompter([
      ...equationAnswers("a"),
      ...equationAnswers("b"),
      "status",
      "save",
    ]);

    await new IntakeSession(prompter, { scheduler: single, configPath, configOnly: true }).run();

    expect(single.status()).toEqual({ active: ["a"], queued: ["b"] });
    expect(prompter.printed).toContain("[scheduler] Starting equation 'a' for 5 second(s)");
    expect(prompter.printed).toContain("[scheduler] Queued equation 'b' (position 1)");
    expect(prompter.printed).toContain("Active (1): a");
    expect(prompter.printed).toContain("Queued (1): b");
    single.dispose();
  });

  it("rejects an expression with unsupported symbols", async () => {
    const prompter = new ScriptedPrompter([...equationAnswers("bad", { expr: "x + q" }), "save"]);

    const result = await new IntakeSession(prompter, { scheduler, configPath }).run();

    expect(prompter.printed).toContain(
      "[intake] Rejected 'bad': Expression \"x + q\" uses unsupported symbols: q (allowed: x, y, z)"
    );
    expect(result.config).toBeNull();
    expect(prompter.printed).toContain("No equations collected; nothing saved.");
    expect(scheduler.isIdle()).toBe(true);
  });

  it("rejects a repeated name", async () => {
    const prompter = new ScriptedPrompter([
      ...equationAnswers("a"),
      ...equationAnswers("a"),
      "save",
    ]);

    const result = await new IntakeSession(prompter, { scheduler, configPath, configOnly: true }).run();

    expect(result.config?.equations).toHaveLength(1);
    expect(prompter.printed).toContain(
      "[intake] Rejected 'a': an equation with that name already exists"
    );
  });

  it("prints help and skips blank names", async () => {
    const prompter = new ScriptedPrompter(["", "help", "save"]);

    await new IntakeSession(prompter, { scheduler, configPath }).run();

    expect(prompter.prompts.filter((p) => p.startsWith("Equation name"))).toHaveLength(3);
    expect(prompter.printed.some((line) => line.startsWith("Enter equation fields"))).toBe(true);
  });

  it("waits for the scheduler to drain after saving", async () => {
    const draining = new EquationScheduler({ timer: immediate });
    const prompter = new ScriptedPrompter([...equationAnswers("a"), "save"]);

    const result = await new IntakeSession(prompter, { scheduler: draining, configPath }).run();

    expect(result.drained).toBe(true);
    expect(prompter.printed).toContain("[scheduler] Equation 'a' finished");
    expect(prompter.printed[prompter.printed.length - 1]).toBe("All equations finished.");
  });

  it("stops waiting when aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const prompter = new ScriptedPrompter([...equationAnswers("a"), "save"]);

    const result = await new IntakeSession(prompter, {
      scheduler,
      configPath,
      signal: controller.signal,
    }).run();

    expect(result.drained).toBe(false);
    expect(result.savedTo).toBe(configPath);
    expect(scheduler.status().active).toEqual(["a"]);
  });

  it("treats end of input as save", async () => {
    const prompter = new ScriptedPrompter(equationAnswers("a"));

    const result = await new IntakeSession(prompter, { scheduler, configPath, configOnly: true }).run();

    expect(result.savedTo).toBe(configPath);
    expect(result.config?.equations?.map((e) => e.name)).toEqual(["a"]);
  });

  it("drops an equation cut short by end of input", async () => {
    const prompter = new ScriptedPrompter(["a", "sin(x)"]);

    const result = await new IntakeSession(prompter, { scheduler, configPath }).run();

    expect(result.config).toBeNull();
    expect(scheduler.isIdle()).toBe(true);
  });
});

describe("answer readers", () => {
  it("reads three comma-separated variables", () => {
    expect(readVars("1, 2, 3")).toEqual({ x: 1, y: 2, z: 3 });
    expect(readVars("")).toEqual({ x: 0, y: 0, z: 0 });
    expect(readVars("1,2")).toEqual({ x: 0, y: 0, z: 0 });
    expect(readVars("1,two,3")).toEqual({ x: 0, y: 0, z: 0 });
  });

  it("enforces a minimum duration", () => {
    expect(readDuration("0.01")).toBe(0.1);
    expect(readDuration("abc")).toBe(5);
    expect(readDuration("")).toBe(5);
  });

  it("reads windows with commas, spaces or one value", () => {
    expect(readWindow("0:10,0:20")).toEqual([10, 20]);
    expect(readWindow("0:10 0:20")).toEqual([10, 20]);
    expect(readWindow("5")).toEqual([5, 5]);
    expect(readWindow("")).toBeNull();
    expect(readWindow("a,b")).toBeNull();
  });

  it("reads threshold,reset_to pairs", () => {
    expect(readLimit("10, 0")).toEqual([10, 0]);
    expect(readLimit("10")).toBeNull();
    expect(readLimit("")).toBeNull();
  });
});
