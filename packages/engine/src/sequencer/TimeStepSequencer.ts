/**
 * Time-Step Sequencer
 *
 * Turns one Equation into a Track by stepping local time across the
 * equation's active window. Each step:
 *
 * 1. evaluates the expression at the current (x, y, z), falling back to
 *    (t, t, t) and then to 0
 * 2. saturates the value with tanh and rescales it to [0, 1]
 * 3. maps it to pitches and a velocity (ScaleMapper)
 * 4. quantizes the note interval to the rhythm grid
 * 5. emits one note per voice
 * 6. applies update rules in declaration order
 * 7. applies limit resets
 * 8. advances t by dt
 *
 * Runtime failures never escape a step; they degrade the value and are
 * recorded as diagnostics.
 *
 * @see IEquationSequencer for the lifecycle contract
 */

import type {
  Bpm,
  CompiledExpression,
  Diagnostic,
  DiagnosticCategory,
  Equation,
  IEquationSequencer,
  IExpressionEvaluator,
  NoteEvent,
  Seconds,
  SequencerPhase,
  Track,
  VariableName,
  VariableState,
} from "@equatone/contracts";

import {
  STATE_VARIABLES,
  TIME_EPSILON,
  UPDATE_VARIABLES,
  beatSeconds,
  isVariableName,
} from "@equatone/contracts";

import { ExpressionEvaluator } from "../expression/ExpressionEvaluator";
import { InvalidExpressionError } from "../errors";
import { clamp, mapScale } from "../mapping/ScaleMapper";
import { quantizeTime } from "./quantize";

/**
 * Configuration for the TimeStepSequencer.
 */
export interface TimeStepSequencerConfig {
  /**
   * Beats per minute; sets the length of a beat for evalRate and rhythmQuant.
   * @default 120
   */
  tempo?: Bpm;

  /**
   * Expression compiler. Defaults to the built-in ExpressionEvaluator.
   */
  evaluator?: IExpressionEvaluator;
}

const DEFAULT_CONFIG: Required<TimeStepSequencerConfig> = {
  tempo: 120,
  evaluator: new ExpressionEvaluator(),
};

/** Evaluation rate used when the configured one yields a non-positive dt */
export const FALLBACK_EVAL_RATE = 1 / 8;

/** Shortest note emitted when quantization collapses an interval */
export const MIN_NOTE_SECONDS: Seconds = 0.01;

/**
 * A compiled `var = f(x, y, z, t)` rule.
 */
interface UpdateRule {
  index: number;
  source: string;
  target: VariableName;
  expression: CompiledExpression;
}

/**
 * Squash a raw value into [-1, 1] with tanh; clip if tanh is unusable.
 */
export function normalizeValue(raw: number): number {
  const saturated = Math.tanh(raw);
  if (!Number.isNaN(saturated)) return saturated;
  return Number.isNaN(raw) ? 0 : clamp(raw, -1, 1);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TimeStepSequencer implements IEquationSequencer {
  readonly id: string;

  private readonly equation: Equation;
  private readonly beatSeconds: Seconds;
  private readonly dt: Seconds;
  private readonly expression: CompiledExpression;
  private readonly updates: UpdateRule[] = [];

  private currentPhase: SequencerPhase = "initialized";
  private t: Seconds;
  private vars: VariableState;
  private emitted: NoteEvent[] = [];
  private recorded: Map<string, Diagnostic> = new Map();
  private compileDiagnostics: Diagnostic[] = [];

  /**
   * Compiles the expression and update rules.
   * Throws InvalidExpressionError for an invalid main expression; invalid
   * update rules are skipped and reported.
   */
  constructor(equation: Equation, config: TimeStepSequencerConfig = {}) {
    const tempo = config.tempo ?? DEFAULT_CONFIG.tempo;
    const evaluator = config.evaluator ?? DEFAULT_CONFIG.evaluator;
    this.id = equation.name;
    this.equation = equation;

    this.beatSeconds = beatSeconds(tempo);
    const dt = this.beatSeconds * equation.evalRate;
    this.dt = dt > 0 ? dt : this.beatSeconds * FALLBACK_EVAL_RATE;

    this.expression = evaluator.compile(equation.expr, STATE_VARIABLES);
    this.compileUpdates(evaluator);

    this.t = equation.window.start;
    this.vars = { ...equation.vars };
    this.restoreCompileDiagnostics();
  }

  get phase(): SequencerPhase {
    return this.currentPhase;
  }

  get time(): Seconds {
    return this.t;
  }

  get state(): VariableState {
    return { ...this.vars };
  }

  get diagnostics(): readonly Diagnostic[] {
    return Array.from(this.recorded.values());
  }

  /** Seconds between evaluations */
  get stepSeconds(): Seconds {
    return this.dt;
  }

  init(): void {
    this.reset();
  }

  reset(): void {
    this.currentPhase = "initialized";
    this.t = this.equation.window.start;
    this.vars = { ...this.equation.vars };
    this.emitted = [];
    this.restoreCompileDiagnostics();
  }

  dispose(): void {
    this.emitted = [];
    this.recorded.clear();
  }

  step(): NoteEvent[] | null {
    if (this.currentPhase === "completed") {
      return null;
    }
    const t = this.t;
    const end = this.equation.window.end;
    if (t > end + TIME_EPSILON) {
      this.currentPhase = "completed";
      return null;
    }
    this.currentPhase = "stepping";

    const raw = this.evaluate(t);
    const vScaled = (normalizeValue(raw) + 1) / 2;
    const { pitches, velocity } = mapScale(vScaled, this.equation.mapping);

    const quant = this.equation.mapping.rhythmQuant;
    const start = quantizeTime(t, quant, this.beatSeconds);
    let noteEnd = quantizeTime(Math.min(end, t + this.dt), quant, this.beatSeconds);
    if (noteEnd <= start) {
      noteEnd = start + Math.max(MIN_NOTE_SECONDS, this.dt);
    }

    const notes = pitches.map((pitch) =>
      Object.freeze({ pitch, velocity, start, end: noteEnd, track: this.id })
    );
    this.emitted.push(...notes);

    this.applyUpdates(t);
    this.applyLimits();

    this.t = t + this.dt;
    return notes;
  }

  run(): Track {
    let notes = this.step();
    while (notes !== null) {
      notes = this.step();
    }
    return {
      name: this.id,
      instrument: this.equation.mapping.instrument,
      notes: [...this.emitted],
    };
  }

  // === Step stages ===

  private evaluate(t: Seconds): number {
    const { x, y, z } = this.vars;
    try {
      return this.expression.evaluate(x, y, z);
    } catch (err) {
      this.report(
        "expression:state",
        "expression",
        `Evaluation at (x, y, z) failed, retrying at (t, t, t): ${describeError(err)}`,
        t
      );
    }
    try {
      return this.expression.evaluate(t, t, t);
    } catch (err) {
      this.report(
        "expression:time",
        "expression",
        `Evaluation at (t, t, t) failed, using 0: ${describeError(err)}`,
        t
      );
      return 0;
    }
  }

  /**
   * Rules run in declaration order; each sees the values written by the
   * rules before it in the same step.
   */
  private applyUpdates(t: Seconds): void {
    for (const rule of this.updates) {
      const { x, y, z } = this.vars;
      try {
        this.vars[rule.target] = rule.expression.evaluate(x, y, z, t);
      } catch (err) {
        this.report(
          `update:${rule.index}`,
          "update",
          `Update rule "${rule.source}" skipped: ${describeError(err)}`,
          t
        );
      }
    }
  }

  /**
   * Each limit targets a distinct variable, so order does not matter.
   */
  private applyLimits(): void {
    for (const limit of this.equation.limits) {
      if (this.vars[limit.variable] >= limit.threshold) {
        this.vars[limit.variable] = limit.resetTo;
      }
    }
  }

  // === Setup ===

  private compileUpdates(evaluator: IExpressionEvaluator): void {
    this.equation.updates.forEach((source, index) => {
      const eq = source.indexOf("=");
      if (eq < 0) {
        this.compileDiagnostics.push(
          this.makeDiagnostic(`update:${index}`, "update", `Update rule "${source}" has no '='`, 0)
        );
        return;
      }

      const target = source.slice(0, eq).trim();
      if (!isVariableName(target)) {
        this.compileDiagnostics.push(
          this.makeDiagnostic(
            `update:${index}`,
            "update",
            `Update rule "${source}" assigns unknown variable "${target}"`,
            0
          )
        );
        return;
      }

      try {
        const expression = evaluator.compile(source.slice(eq + 1).trim(), UPDATE_VARIABLES);
        this.updates.push({ index, source, target, expression });
      } catch (err) {
        if (!(err instanceof InvalidExpressionError)) throw err;
        this.compileDiagnostics.push(
          this.makeDiagnostic(
            `update:${index}`,
            "update",
            `Update rule "${source}" skipped: ${err.message}`,
            0
          )
        );
      }
    });
  }

  // === Diagnostics ===

  private restoreCompileDiagnostics(): void {
    this.recorded = new Map(this.compileDiagnostics.map((d) => [d.id, { ...d }]));
  }

  private makeDiagnostic(
    key: string,
    category: DiagnosticCategory,
    message: string,
    t: Seconds
  ): Diagnostic {
    return {
      id: `${this.id}:${key}`,
      category,
      severity: "warning",
      message,
      t,
      equation: this.id,
      occurrences: 1,
    };
  }

  private report(key: string, category: DiagnosticCategory, message: string, t: Seconds): void {
    const id = `${this.id}:${key}`;
    const existing = this.recorded.get(id);
    if (existing) {
      existing.occurrences++;
      return;
    }
    this.recorded.set(id, this.makeDiagnostic(key, category, message, t));
  }
}
