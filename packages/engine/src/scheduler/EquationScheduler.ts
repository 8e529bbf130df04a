/**
 * Equation Scheduler
 *
 * Bounds how many equations are "running" at once during live intake.
 * Submissions beyond capacity wait in a FIFO queue; when an active
 * equation's lifetime ends, the queue head is admitted.
 *
 * Lifetimes are deferred callbacks (one timer per active equation, lasting
 * the equation's declared duration). Nothing polls internally; only
 * waitForIdle() polls, and it can be interrupted without affecting the
 * running timers.
 *
 * Every read and write of the active set and queue goes through
 * `critical()`. Listeners are notified, then timers started, only after the
 * critical section has been left.
 */

import type {
  Equation,
  EquationPhase,
  IEquationScheduler,
  Ms,
  SchedulerEvent,
  SchedulerListener,
  SchedulerStatus,
  WaitOptions,
} from "@equatone/contracts";

/**
 * Starts a lifetime and returns a function that cancels it.
 * Injected so tests and hosts can substitute their own clock.
 */
export interface LifetimeTimer {
  start(durationMs: Ms, onDone: () => void): () => void;
}

/**
 * Configuration for the EquationScheduler.
 */
export interface EquationSchedulerConfig {
  /**
   * Maximum number of concurrently active equations.
   * @default 3
   */
  capacity?: number;

  /**
   * Lifetime timer. Defaults to setTimeout.
   */
  timer?: LifetimeTimer;
}

export const DEFAULT_CAPACITY = 3;

export const DEFAULT_POLL_INTERVAL_MS: Ms = 300;

/** Longest delay setTimeout honours; longer lifetimes are chained */
export const MAX_TIMEOUT_MS: Ms = 2 ** 31 - 1;

const timeoutTimer: LifetimeTimer = {
  start(durationMs, onDone) {
    let handle: ReturnType<typeof setTimeout>;
    const schedule = (remaining: Ms): void => {
      if (remaining > MAX_TIMEOUT_MS) {
        handle = setTimeout(() => schedule(remaining - MAX_TIMEOUT_MS), MAX_TIMEOUT_MS);
      } else {
        handle = setTimeout(onDone, remaining);
      }
    };
    schedule(durationMs);
    return () => clearTimeout(handle);
  },
};

const DEFAULT_CONFIG: Required<EquationSchedulerConfig> = {
  capacity: DEFAULT_CAPACITY,
  timer: timeoutTimer,
};

/**
 * Work deferred until the critical section is left.
 */
interface Transaction {
  events: SchedulerEvent[];
  admitted: Equation[];
}

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
function sleep(ms: Ms, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve(false);
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class EquationScheduler implements IEquationScheduler {
  readonly capacity: number;

  private readonly timer: LifetimeTimer;

  // Guarded by critical()
  private active: Equation[] = [];
  private queue: Equation[] = [];
  // Finished equations stay here so phaseOf and resubmission report them;
  // held weakly so the session does not keep every equation alive
  private phases: WeakMap<Equation, EquationPhase> = new WeakMap();
  private cancels: Map<Equation, () => void> = new Map();
  private locked = false;

  private listeners: SchedulerListener[] = [];

  constructor(config: EquationSchedulerConfig = {}) {
    const capacity = config.capacity ?? DEFAULT_CONFIG.capacity;
    this.capacity = Number.isFinite(capacity) ? Math.max(1, Math.floor(capacity)) : DEFAULT_CAPACITY;
    this.timer = config.timer ?? DEFAULT_CONFIG.timer;
  }

  // === IEquationScheduler ===

  /**
   * Admit immediately if a slot is free, otherwise append to the queue.
   * Resubmitting an equation the scheduler has already seen is a no-op that
   * returns its current phase.
   */
  submit(equation: Equation): EquationPhase {
    return this.critical((tx) => {
      const known = this.phases.get(equation);
      if (known !== undefined) {
        return known;
      }

      if (this.active.length < this.capacity) {
        this.admit(equation, tx);
        return "active";
      }

      this.queue.push(equation);
      this.phases.set(equation, "queued");
      tx.events.push({ type: "queued", equation, position: this.queue.length });
      return "queued";
    });
  }

  onComplete(equation: Equation): boolean {
    return this.critical((tx) => {
      const index = this.active.indexOf(equation);
      if (index < 0) {
        return false;
      }

      this.active.splice(index, 1);
      this.phases.set(equation, "finished");
      this.cancels.get(equation)?.();
      this.cancels.delete(equation);
      tx.events.push({ type: "finished", equation });

      // FIFO promotion: earliest submission wins
      const next = this.queue.shift();
      if (next !== undefined) {
        this.admit(next, tx);
      }
      return true;
    });
  }

  status(): SchedulerStatus {
    return this.critical(() => ({
      active: this.active.map((e) => e.name),
      queued: this.queue.map((e) => e.name),
    }));
  }

  isIdle(): boolean {
    return this.critical(() => this.active.length === 0 && this.queue.length === 0);
  }

  phaseOf(equation: Equation): EquationPhase | undefined {
    return this.critical(() => this.phases.get(equation));
  }

  async waitForIdle(options: WaitOptions = {}): Promise<boolean> {
    const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    while (!this.isIdle()) {
      const slept = await sleep(interval, options.signal);
      if (!slept) {
        return false;
      }
    }
    return true;
  }

  subscribe(listener: SchedulerListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  // === Lifecycle ===

  /**
   * Cancel pending lifetimes and forget all state.
   */
  dispose(): void {
    this.critical(() => {
      for (const cancel of this.cancels.values()) {
        cancel();
      }
      this.cancels.clear();
      this.active = [];
      this.queue = [];
      this.phases = new WeakMap();
    });
    this.listeners = [];
  }

  // === Helpers ===

  private admit(equation: Equation, tx: Transaction): void {
    this.active.push(equation);
    this.phases.set(equation, "active");
    tx.admitted.push(equation);
    tx.events.push({ type: "admitted", equation, lifetimeMs: lifetimeMs(equation) });
  }

  private critical<T>(body: (tx: Transaction) => T): T {
    if (this.locked) {
      throw new Error("EquationScheduler: re-entrant access to active set");
    }
    const tx: Transaction = { events: [], admitted: [] };
    this.locked = true;
    let result: T;
    try {
      result = body(tx);
    } finally {
      this.locked = false;
    }

    this.emit(tx.events);
    for (const equation of tx.admitted) {
      this.startLifetime(equation);
    }
    return result;
  }

  private startLifetime(equation: Equation): void {
    const cancel = this.timer.start(lifetimeMs(equation), () => {
      this.onComplete(equation);
    });
    // A synchronous timer may already have completed the equation
    if (this.phases.get(equation) === "active") {
      this.cancels.set(equation, cancel);
    }
  }

  private emit(events: SchedulerEvent[]): void {
    for (const event of events) {
      for (const listener of [...this.listeners]) {
        try {
          listener(event);
        } catch (e) {
          console.error("[EquationScheduler] listener error:", e);
        }
      }
    }
  }
}

function lifetimeMs(equation: Equation): Ms {
  return Math.max(0, equation.duration * 1000);
}
