/**
 * Configuration Normalization
 *
 * Converts raw equation configs (file or interactive input) into frozen
 * Equations. Missing or unreadable values fall back to defaults; each
 * fallback that hides a malformed value is reported as a diagnostic rather
 * than an error. Expressions are not compiled here.
 */

import type {
  Bpm,
  CompositionConfig,
  Diagnostic,
  DiagnosticCategory,
  Equation,
  EquationConfig,
  LimitRule,
  LimitsInput,
  MappingConfig,
  MappingInput,
  VariableState,
  VelocityCurve,
} from "@equatone/contracts";

import { STATE_VARIABLES, isVariableName } from "@equatone/contracts";

import { isKnownScale } from "../mapping/scales";
import { parseFraction, parseInteger, parseNumber, parseWindow } from "./parse";

export const DEFAULT_TEMPO: Bpm = 120;

export const EQUATION_DEFAULTS = {
  expr: "sin(x)",
  evalRate: 1 / 8,
  duration: 5,
} as const;

export const MAPPING_DEFAULTS: Readonly<MappingConfig> = {
  baseMidi: 60,
  scale: "a_minor",
  octaveRange: 2,
  polyphony: 1,
  rhythmQuant: 1 / 16,
  velocityCurve: "linear",
  instrument: "piano",
};

export interface NormalizedEquation {
  equation: Equation;
  diagnostics: Diagnostic[];
}

export interface NormalizedComposition {
  tempo: Bpm;
  equations: Equation[];
  diagnostics: Diagnostic[];
}

/**
 * Collects config diagnostics for one equation.
 */
class ConfigReport {
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly equation: string) {}

  add(category: DiagnosticCategory, key: string, message: string): void {
    this.diagnostics.push({
      id: `${this.equation}:${category}:${key}`,
      category,
      severity: category === "limit" ? "warning" : "info",
      message,
      t: 0,
      equation: this.equation,
      occurrences: 1,
    });
  }
}

/**
 * @param index - 1-based position, used for the default name "eq{index}"
 */
export function normalizeEquation(raw: EquationConfig, index: number): NormalizedEquation {
  const name = typeof raw.name === "string" && raw.name !== "" ? raw.name : `eq${index}`;
  const report = new ConfigReport(name);

  const evalRate = readFraction(raw.eval_rate, EQUATION_DEFAULTS.evalRate, "eval_rate", report);

  let duration: number = EQUATION_DEFAULTS.duration;
  if (raw.duration !== undefined) {
    const parsed = parseNumber(raw.duration);
    if (parsed === null) {
      report.add("config", "duration", `duration "${String(raw.duration)}" is not a finite number; using ${duration}`);
    } else {
      duration = parsed;
    }
  }

  const windowInput = raw.active_window ?? raw.activeWindow ?? null;
  let window = parseWindow(windowInput);
  if (window === null) {
    if (windowInput !== null) {
      report.add("config", "active_window", `active_window is unreadable; using 0..${duration}s`);
    }
    window = { start: 0, end: duration };
  }

  const equation: Equation = {
    name,
    expr: typeof raw.expr === "string" ? raw.expr : EQUATION_DEFAULTS.expr,
    vars: Object.freeze(readVariables(raw.vars, report)),
    updates: Object.freeze((raw.updates ?? []).filter((u): u is string => typeof u === "string")),
    evalRate,
    duration,
    window: Object.freeze(window),
    mapping: Object.freeze(readMapping(raw.mapping ?? {}, report)),
    limits: Object.freeze(readLimits(raw.limits ?? {}, report)),
  };

  return { equation: Object.freeze(equation), diagnostics: report.diagnostics };
}

export function normalizeComposition(raw: CompositionConfig): NormalizedComposition {
  const parsedTempo = parseNumber(raw.tempo);
  const tempo = parsedTempo !== null && parsedTempo > 0 ? parsedTempo : DEFAULT_TEMPO;

  const equations: Equation[] = [];
  const diagnostics: Diagnostic[] = [];
  (raw.equations ?? []).forEach((entry, i) => {
    const normalized = normalizeEquation(entry, i + 1);
    equations.push(normalized.equation);
    diagnostics.push(...normalized.diagnostics);
  });

  return { tempo, equations, diagnostics };
}

// ============================================================================
// Field readers
// ============================================================================

function readFraction(
  input: string | number | undefined,
  fallback: number,
  field: string,
  report: ConfigReport
): number {
  if (input === undefined) return fallback;
  const value = parseFraction(input);
  if (value === null) {
    report.add("config", field, `${field} "${String(input)}" is unreadable; using ${fallback}`);
    return fallback;
  }
  return value;
}

function readVariables(
  input: Record<string, number | string> | undefined,
  report: ConfigReport
): VariableState {
  const vars: VariableState = { x: 0, y: 0, z: 0 };
  if (!input) return vars;

  for (const name of STATE_VARIABLES) {
    const rawValue = input[name];
    if (rawValue === undefined) continue;
    const value = parseNumber(rawValue);
    if (value === null) {
      report.add("config", `vars.${name}`, `Initial ${name} "${String(rawValue)}" is not a number; using 0`);
    } else {
      vars[name] = value;
    }
  }
  return vars;
}

function readMapping(input: MappingInput, report: ConfigReport): MappingConfig {
  const scale = typeof input.scale === "string" && input.scale !== ""
    ? input.scale
    : MAPPING_DEFAULTS.scale;
  if (!isKnownScale(scale)) {
    report.add("config", "scale", `Unknown scale "${scale}"; using minor`);
  }

  const polyphony = parseInteger(input.polyphony ?? input.poly) ?? MAPPING_DEFAULTS.polyphony;

  return {
    baseMidi: parseInteger(input.base_midi) ?? MAPPING_DEFAULTS.baseMidi,
    scale,
    octaveRange: parseInteger(input.octave_range) ?? MAPPING_DEFAULTS.octaveRange,
    polyphony: Math.max(1, polyphony),
    rhythmQuant: readFraction(input.rhythm_quant, MAPPING_DEFAULTS.rhythmQuant, "rhythm_quant", report),
    velocityCurve: readVelocityCurve(input.velocity_curve),
    instrument: typeof input.instrument === "string" && input.instrument !== ""
      ? input.instrument
      : MAPPING_DEFAULTS.instrument,
  };
}

export function readVelocityCurve(input: string | undefined): VelocityCurve {
  const curve = (input ?? "").toLowerCase();
  return curve === "exp" || curve === "exponential" ? "exponential" : "linear";
}

function readLimits(input: LimitsInput, report: ConfigReport): LimitRule[] {
  const limits: LimitRule[] = [];

  for (const [variable, bounds] of Object.entries(input)) {
    if (!isVariableName(variable)) {
      report.add("limit", variable, `Limit on unknown variable "${variable}" skipped`);
      continue;
    }
    const pair: readonly unknown[] = Array.isArray(bounds) ? bounds : [];
    const threshold = parseNumber(pair[0]);
    const resetTo = parseNumber(pair[1]);
    if (threshold === null || resetTo === null) {
      report.add("limit", variable, `Limit for ${variable} is not a [threshold, reset_to] pair; skipped`);
      continue;
    }
    limits.push({ variable, threshold, resetTo });
  }

  return limits;
}
