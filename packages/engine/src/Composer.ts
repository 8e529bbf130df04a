/**
 * Composer
 *
 * Runs one TimeStepSequencer per equation and collects the resulting
 * tracks. Every sequencer is constructed before any of them steps, so an
 * invalid expression anywhere aborts the whole run before simulation.
 *
 * Sequencers share no state; they are run one after another here, in
 * equation order.
 */

import type {
  Bpm,
  Composition,
  CompositionConfig,
  Diagnostic,
  Equation,
  IExpressionEvaluator,
  Track,
} from "@equatone/contracts";

import { mergeDiagnostics } from "@equatone/contracts";

import { DEFAULT_TEMPO, normalizeComposition } from "./config/normalize";
import { DuplicateEquationError } from "./errors";
import { ExpressionEvaluator } from "./expression/ExpressionEvaluator";
import { TimeStepSequencer } from "./sequencer/TimeStepSequencer";

/**
 * Configuration for a composition run.
 */
export interface ComposerConfig {
  /** @default 120 */
  tempo?: Bpm;

  evaluator?: IExpressionEvaluator;
}

/**
 * Throws DuplicateEquationError or InvalidExpressionError before any
 * equation is simulated.
 */
export function composeTracks(
  equations: readonly Equation[],
  config: ComposerConfig = {}
): Composition {
  const tempo = config.tempo ?? DEFAULT_TEMPO;
  const evaluator = config.evaluator ?? new ExpressionEvaluator();

  const seen = new Set<string>();
  for (const equation of equations) {
    if (seen.has(equation.name)) {
      throw new DuplicateEquationError(equation.name);
    }
    seen.add(equation.name);
  }

  const sequencers = equations.map(
    (equation) => new TimeStepSequencer(equation, { tempo, evaluator })
  );

  const tracks: Track[] = [];
  const diagnostics: Diagnostic[] = [];
  for (const sequencer of sequencers) {
    sequencer.init();
    tracks.push(sequencer.run());
    diagnostics.push(...sequencer.diagnostics);
    sequencer.dispose();
  }

  return { tempo, tracks, diagnostics: mergeDiagnostics(diagnostics) };
}

/**
 * Normalize a raw config and compose it. Normalization diagnostics come
 * first in the result.
 */
export function composeFromConfig(
  raw: CompositionConfig,
  evaluator?: IExpressionEvaluator
): Composition {
  const { tempo, equations, diagnostics } = normalizeComposition(raw);
  const composition = composeTracks(equations, { tempo, evaluator });
  return {
    ...composition,
    diagnostics: mergeDiagnostics([...diagnostics, ...composition.diagnostics]),
  };
}
