/**
 * Equation Scheduler Contract
 *
 * Bounded-concurrency admission control over independently-lived
 * equations. Orthogonal to the note simulation: the scheduler only tracks
 * how long each equation is "running".
 */

import type { Equation } from "../equation/equation";
import type { Ms } from "../core/time";

/**
 * Lifecycle of an equation inside the scheduler. Terminal at "finished";
 * no cancellation, no re-entry.
 */
export type EquationPhase = "queued" | "active" | "finished";

/**
 * Snapshot of the scheduler, by equation name.
 * Active names in admission order, queued names in arrival order.
 */
export interface SchedulerStatus {
  active: string[];
  queued: string[];
}

export type SchedulerEvent =
  | { type: "admitted"; equation: Equation; lifetimeMs: Ms }
  | { type: "queued"; equation: Equation; position: number }
  | { type: "finished"; equation: Equation };

export type SchedulerListener = (event: SchedulerEvent) => void;

export interface WaitOptions {
  /** Poll interval of the wait loop */
  pollIntervalMs?: Ms;

  /** Interrupts the wait; active equations keep running */
  signal?: AbortSignal;
}

export interface IEquationScheduler {
  readonly capacity: number;

  /** Admit or enqueue. Always succeeds. */
  submit(equation: Equation): EquationPhase;

  /**
   * Mark an active equation finished and promote the queue head.
   * Returns false when the equation was not active.
   */
  onComplete(equation: Equation): boolean;

  status(): SchedulerStatus;

  isIdle(): boolean;

  /** Resolves true once idle, false when interrupted */
  waitForIdle(options?: WaitOptions): Promise<boolean>;

  /** Returns an unsubscribe function */
  subscribe(listener: SchedulerListener): () => void;
}
