/**
 * Intake Session
 *
 * Interactive loop that collects equations one field at a time, submits
 * each valid one to the scheduler, and saves the collected config when the
 * user types `save`. Commands at the name prompt:
 *
 * - `help` / `h`: usage
 * - `status` / `s`: active and queued equations
 * - `save…`: finish, save, then wait for the scheduler to drain
 *
 * End of input behaves like `save`.
 */

import type {
  CompositionConfig,
  EquationConfig,
  IEquationScheduler,
  IExpressionEvaluator,
  LimitsInput,
  Ms,
  SchedulerEvent,
  VariableName,
} from "@equatone/contracts";
import { STATE_VARIABLES } from "@equatone/contracts";
import {
  ExpressionEvaluator,
  InvalidExpressionError,
  normalizeEquation,
  parseFraction,
  parseInteger,
  parseNumber,
  parseWindow,
} from "@equatone/engine";

import { ConfigStore } from "../config/ConfigStore";
import type { IntakePrompter } from "./IntakePrompter";

/**
 * Answers used when a field is left blank.
 */
export const INTAKE_DEFAULTS = {
  expr: "sin(x)",
  vars: "0,0,0",
  evalRate: "1/8",
  duration: 5,
  baseMidi: 60,
  scale: "A_minor",
  octaveRange: 2,
  instrument: "piano",
  polyphony: 1,
  rhythmQuant: 1 / 16,
  velocityCurve: "linear",
} as const;

/** Shortest lifetime an interactively entered equation may have */
export const MIN_INTAKE_DURATION = 0.1;

/**
 * Configuration for an intake session.
 */
export interface IntakeSessionConfig {
  scheduler: IEquationScheduler;

  /** Where the collected config is saved */
  configPath: string;

  /**
   * Save without waiting for the scheduler to drain.
   * @default false
   */
  configOnly?: boolean;

  /** Defaults to a ConfigStore on the local file system */
  store?: ConfigStore;

  /** Used to validate expressions before submission */
  evaluator?: IExpressionEvaluator;

  /** Interrupts the final wait */
  signal?: AbortSignal;

  /** @default 300 */
  pollIntervalMs?: Ms;
}

export interface IntakeResult {
  /** Collected config, or null when nothing was collected */
  config: CompositionConfig | null;

  /** Path the config was saved to */
  savedTo: string | null;

  /** False when the final wait was interrupted */
  drained: boolean;
}

const NAME_PROMPT = "Equation name (or 'save' to finish, 'status', 'help'): ";

const HELP_TEXT =
  "Enter equation fields when prompted; blank answers take the default in brackets. " +
  "Special names: 'save' to end and save, 'status' to view the queue.";

export class IntakeSession {
  private readonly prompter: IntakePrompter;
  private readonly scheduler: IEquationScheduler;
  private readonly store: ConfigStore;
  private readonly evaluator: IExpressionEvaluator;
  private readonly config: IntakeSessionConfig;

  private collected: EquationConfig[] = [];

  constructor(prompter: IntakePrompter, config: IntakeSessionConfig) {
    this.prompter = prompter;
    this.config = config;
    this.scheduler = config.scheduler;
    this.store = config.store ?? new ConfigStore();
    this.evaluator = config.evaluator ?? new ExpressionEvaluator();
  }

  /** Equations accepted so far, in entry order */
  get equations(): readonly EquationConfig[] {
    return this.collected;
  }

  async run(): Promise<IntakeResult> {
    const unsubscribe = this.scheduler.subscribe((event) => this.prompter.print(describeEvent(event)));
    try {
      this.prompter.print("Interactive mode: enter equations. Type 'help' for commands.");
      await this.collect();
      return await this.finish();
    } finally {
      unsubscribe();
    }
  }

  // === Loop ===

  private async collect(): Promise<void> {
    for (;;) {
      const answer = await this.prompter.ask(NAME_PROMPT);
      if (answer === null) return;

      const name = answer.trim();
      if (name === "") continue;

      const command = name.toLowerCase();
      if (command === "help" || command === "h") {
        this.prompter.print(HELP_TEXT);
        continue;
      }
      if (command === "status" || command === "s") {
        this.printStatus();
        continue;
      }
      if (command.startsWith("save")) {
        return;
      }

      const equation = await this.askEquation(name);
      if (equation === null) return;
      this.accept(equation);
    }
  }

  private accept(raw: EquationConfig): void {
    const name = raw.name ?? "";
    if (this.collected.some((e) => e.name === name)) {
      this.prompter.print(`[intake] Rejected '${name}': an equation with that name already exists`);
      return;
    }

    const { equation } = normalizeEquation(raw, this.collected.length + 1);
    try {
      this.evaluator.compile(equation.expr, STATE_VARIABLES);
    } catch (err) {
      if (!(err instanceof InvalidExpressionError)) throw err;
      this.prompter.print(`[intake] Rejected '${name}': ${err.message}`);
      return;
    }

    this.collected.push(raw);
    this.scheduler.submit(equation);
  }

  private async finish(): Promise<IntakeResult> {
    if (this.collected.length === 0) {
      this.prompter.print("No equations collected; nothing saved.");
      return { config: null, savedTo: null, drained: true };
    }

    const config: CompositionConfig = { equations: [...this.collected] };
    await this.store.save(this.config.configPath, config);
    this.prompter.print(`Saved config to ${this.config.configPath}`);

    if (this.config.configOnly) {
      return { config, savedTo: this.config.configPath, drained: true };
    }

    this.prompter.print("Waiting for active and queued equations to finish...");
    const drained = await this.scheduler.waitForIdle({
      pollIntervalMs: this.config.pollIntervalMs,
      signal: this.config.signal,
    });
    this.prompter.print(
      drained
        ? "All equations finished."
        : "Interrupted while waiting; running equations continue in the background."
    );
    return { config, savedTo: this.config.configPath, drained };
  }

  private printStatus(): void {
    const { active, queued } = this.scheduler.status();
    this.prompter.print(`Active (${active.length}): ${active.join(", ")}`);
    this.prompter.print(`Queued (${queued.length}): ${queued.join(", ")}`);
  }

  // === Field prompts ===

  /**
   * Ask for every field of one equation. Returns null if input ends
   * part-way through.
   */
  private async askEquation(name: string): Promise<EquationConfig | null> {
    const ask = async (prompt: string): Promise<string | null> => {
      const answer = await this.prompter.ask(`  ${prompt}: `);
      return answer === null ? null : answer.trim();
    };

    const expr = await ask("expression (e.g. sin(x) + 0.1*y)");
    if (expr === null) return null;
    const vars = await ask(`initial vars x,y,z (comma-separated) [${INTAKE_DEFAULTS.vars}]`);
    if (vars === null) return null;
    const updates = await ask("update rules (semicolon-separated, e.g. 'x = x + 1; y = y*0.99') [none]");
    if (updates === null) return null;
    const evalRate = await ask(`eval_rate (e.g. 1/8) [${INTAKE_DEFAULTS.evalRate}]`);
    if (evalRate === null) return null;
    const duration = await ask(`duration in seconds [${INTAKE_DEFAULTS.duration}]`);
    if (duration === null) return null;
    const baseMidi = await ask(`mapping.base_midi (int) [${INTAKE_DEFAULTS.baseMidi}]`);
    if (baseMidi === null) return null;
    const scale = await ask(`mapping.scale (e.g. A_minor) [${INTAKE_DEFAULTS.scale}]`);
    if (scale === null) return null;
    const octaveRange = await ask(`mapping.octave_range (int) [${INTAKE_DEFAULTS.octaveRange}]`);
    if (octaveRange === null) return null;
    const instrument = await ask(`mapping.instrument (piano/synth) [${INTAKE_DEFAULTS.instrument}]`);
    if (instrument === null) return null;
    const polyphony = await ask(`mapping.polyphony (int) [${INTAKE_DEFAULTS.polyphony}]`);
    if (polyphony === null) return null;
    const rhythmQuant = await ask("mapping.rhythm_quant (fraction of beat, e.g. 1/16) [1/16]");
    if (rhythmQuant === null) return null;
    const velocityCurve = await ask(`mapping.velocity_curve (linear/exp) [${INTAKE_DEFAULTS.velocityCurve}]`);
    if (velocityCurve === null) return null;
    const window = await ask("active_window (start,end) in mm:ss or seconds [none]");
    if (window === null) return null;

    const limits: LimitsInput = {};
    for (const variable of STATE_VARIABLES) {
      const limit = await ask(`limit for ${variable} (threshold,reset_to) [none]`);
      if (limit === null) return null;
      const pair = readLimit(limit);
      if (pair) limits[variable] = pair;
    }

    const equation: EquationConfig = {
      name,
      expr: expr || INTAKE_DEFAULTS.expr,
      vars: readVars(vars),
      updates: updates
        .split(";")
        .map((u) => u.trim())
        .filter((u) => u !== ""),
      eval_rate: evalRate || INTAKE_DEFAULTS.evalRate,
      duration: readDuration(duration),
      mapping: {
        base_midi: parseInteger(baseMidi) ?? INTAKE_DEFAULTS.baseMidi,
        scale: scale || INTAKE_DEFAULTS.scale,
        octave_range: parseInteger(octaveRange) ?? INTAKE_DEFAULTS.octaveRange,
        instrument: instrument || INTAKE_DEFAULTS.instrument,
        polyphony: parseInteger(polyphony) ?? INTAKE_DEFAULTS.polyphony,
        rhythm_quant: parseFraction(rhythmQuant) ?? INTAKE_DEFAULTS.rhythmQuant,
        velocity_curve: velocityCurve || INTAKE_DEFAULTS.velocityCurve,
      },
    };

    const activeWindow = readWindow(window);
    if (activeWindow) equation.active_window = activeWindow;
    if (Object.keys(limits).length > 0) equation.limits = limits;

    return equation;
  }
}

// ============================================================================
// Answer readers
// ============================================================================

/**
 * "x,y,z"; anything else gives all zeros.
 */
export function readVars(answer: string): Record<VariableName, number> {
  const parts = (answer || INTAKE_DEFAULTS.vars).split(",").map((p) => parseNumber(p));
  const [x, y, z] = parts;
  if (parts.length !== 3 || x === null || y === null || z === null) {
    return { x: 0, y: 0, z: 0 };
  }
  return { x, y, z };
}

export function readDuration(answer: string): number {
  const value = parseNumber(answer);
  return value === null ? INTAKE_DEFAULTS.duration : Math.max(MIN_INTAKE_DURATION, value);
}

/**
 * "start,end" or "start end"; a single value is both ends.
 */
export function readWindow(answer: string): [number, number] | null {
  if (answer === "") return null;
  let text = answer;
  if (!text.includes(",")) {
    const parts = text.split(/\s+/);
    text = `${parts[0]},${parts[1] ?? parts[0]}`;
  }
  const window = parseWindow(text);
  return window ? [window.start, window.end] : null;
}

export function readLimit(answer: string): [number, number] | null {
  const comma = answer.indexOf(",");
  if (comma < 0) return null;
  const threshold = parseNumber(answer.slice(0, comma));
  const resetTo = parseNumber(answer.slice(comma + 1));
  return threshold === null || resetTo === null ? null : [threshold, resetTo];
}

function describeEvent(event: SchedulerEvent): string {
  const name = event.equation.name;
  switch (event.type) {
    case "admitted":
      return `[scheduler] Starting equation '${name}' for ${event.lifetimeMs / 1000} second(s)`;
    case "queued":
      return `[scheduler] Queued equation '${name}' (position ${event.position})`;
    case "finished":
      return `[scheduler] Equation '${name}' finished`;
  }
}
