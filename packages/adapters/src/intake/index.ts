export type { IntakePrompter } from "./IntakePrompter";
export { ReadlinePrompter } from "./IntakePrompter";
export {
  IntakeSession,
  INTAKE_DEFAULTS,
  MIN_INTAKE_DURATION,
  readDuration,
  readLimit,
  readVars,
  readWindow,
  type IntakeResult,
  type IntakeSessionConfig,
} from "./IntakeSession";
