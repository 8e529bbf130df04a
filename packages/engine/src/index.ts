// Errors
export { InvalidExpressionError, EvaluationError, DuplicateEquationError } from "./errors";

// Expressions
export { ExpressionEvaluator } from "./expression/ExpressionEvaluator";
export { FUNCTIONS, CONSTANTS, DomainError, floorMod } from "./expression/functions";
export { parseExpression, ExpressionSyntaxError } from "./expression/parser";
export type { ExpressionNode, BinaryOperator } from "./expression/parser";

// Mapping
export { mapScale, velocityFor, totalSteps, clamp, type ScaleMapping } from "./mapping/ScaleMapper";
export {
  DEFAULT_SCALE,
  getScaleDegrees,
  isKnownScale,
  listScales,
  normalizeScaleName,
} from "./mapping/scales";

// Sequencing
export {
  TimeStepSequencer,
  normalizeValue,
  FALLBACK_EVAL_RATE,
  MIN_NOTE_SECONDS,
  type TimeStepSequencerConfig,
} from "./sequencer/TimeStepSequencer";
export { quantizeTime, roundHalfEven } from "./sequencer/quantize";

// Scheduling
export {
  EquationScheduler,
  DEFAULT_CAPACITY,
  DEFAULT_POLL_INTERVAL_MS,
  MAX_TIMEOUT_MS,
  type EquationSchedulerConfig,
  type LifetimeTimer,
} from "./scheduler/EquationScheduler";

// Configuration
export {
  normalizeEquation,
  normalizeComposition,
  readVelocityCurve,
  DEFAULT_TEMPO,
  EQUATION_DEFAULTS,
  MAPPING_DEFAULTS,
  type NormalizedEquation,
  type NormalizedComposition,
} from "./config/normalize";
export { parseClock, parseFraction, parseInteger, parseNumber, parseWindow } from "./config/parse";

// Composition
export { composeTracks, composeFromConfig, type ComposerConfig } from "./Composer";
