import type { Seconds } from "../core/time";

/**
 * Diagnostic categories for grouping.
 */
export type DiagnosticCategory = "expression" | "update" | "limit" | "config";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A record of something that went wrong while the system kept going
 * (graceful degradation): a step that could not be evaluated, a skipped
 * update rule, an unparsable limit.
 */
export interface Diagnostic {
  /** Identifier for deduplication; equal ids describe the same failure */
  id: string;

  category: DiagnosticCategory;

  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Simulation time of the first occurrence */
  t: Seconds;

  /** Optional: the equation concerned */
  equation?: string;

  /** How many times this failure happened */
  occurrences: number;
}

/**
 * Merge diagnostics sharing an id, keeping the first message and time and
 * summing occurrences. Order of first appearance is preserved.
 */
export function mergeDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  const byId = new Map<string, Diagnostic>();
  for (const d of diagnostics) {
    const existing = byId.get(d.id);
    if (existing) {
      existing.occurrences += d.occurrences;
    } else {
      byId.set(d.id, { ...d });
    }
  }
  return Array.from(byId.values());
}
