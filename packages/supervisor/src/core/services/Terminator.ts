/**
 * Graceful-then-forceful termination with bounded waits.
 *
 *   graceful: SIGTERM, wait up to gracefulTimeoutMs  -> stopped
 *   forceful: SIGKILL, wait up to forcefulTimeoutMs  -> killed
 *   done:     still alive                            -> TerminationError
 *
 * A process that is not there (before or while signalling) ends the machine
 * with "already-gone". Total wall time is bounded by the two windows.
 */

import type { Signal, StopOutcome } from "../model.js";
import type { Clock } from "../ports/Clock.js";
import type { LivenessProbe } from "../ports/LivenessProbe.js";
import type { ProcessSignaller } from "../ports/ProcessSignaller.js";

export interface TerminatorOptions {
  /** How long to wait after SIGTERM. Default: 10000 */
  gracefulTimeoutMs?: number;

  /** How long to wait after SIGKILL. Default: 5000 */
  forcefulTimeoutMs?: number;

  /** Liveness polling interval while waiting. Default: 100 */
  pollIntervalMs?: number;
}

export const DEFAULT_TERMINATOR_OPTIONS: Required<TerminatorOptions> = {
  gracefulTimeoutMs: 10_000,
  forcefulTimeoutMs: 5_000,
  pollIntervalMs: 100,
};

export type TerminationPhase = "graceful" | "forceful" | "done";

interface PhaseStep {
  signal: Signal;
  timeoutMs: number;
  exited: StopOutcome;
  next: TerminationPhase;
}

/**
 * The process survived SIGKILL and the forceful window.
 */
export class TerminationError extends Error {
  constructor(
    readonly pid: number,
    readonly waitedMs: number
  ) {
    super(`Process ${pid} is still alive ${waitedMs}ms after SIGTERM and SIGKILL`);
    this.name = "TerminationError";
  }
}

export class Terminator {
  private readonly options: Required<TerminatorOptions>;

  constructor(
    private readonly probe: LivenessProbe,
    private readonly signaller: ProcessSignaller,
    private readonly clock: Clock,
    options: TerminatorOptions = {}
  ) {
    this.options = { ...DEFAULT_TERMINATOR_OPTIONS, ...options };
  }

  /**
   * Stop `pid`, escalating to SIGKILL if SIGTERM is ignored.
   * Throws TerminationError only if the process outlives both windows.
   */
  async stop(pid: number): Promise<StopOutcome> {
    if (!this.probe.isAlive(pid)) {
      return "already-gone";
    }

    const startedAt = this.clock.now();
    let phase: TerminationPhase = "graceful";

    while (phase !== "done") {
      const step = this.step(phase);

      if (!this.signaller.signal(pid, step.signal)) {
        return "already-gone";
      }

      if (await this.waitForExit(pid, step.timeoutMs)) {
        return step.exited;
      }

      phase = step.next;
    }

    throw new TerminationError(pid, this.clock.now() - startedAt);
  }

  private step(phase: Exclude<TerminationPhase, "done">): PhaseStep {
    switch (phase) {
      case "graceful":
        return {
          signal: "SIGTERM",
          timeoutMs: this.options.gracefulTimeoutMs,
          exited: "stopped",
          next: "forceful",
        };
      case "forceful":
        return {
          signal: "SIGKILL",
          timeoutMs: this.options.forcefulTimeoutMs,
          exited: "killed",
          next: "done",
        };
    }
  }

  /**
   * Poll until the process is gone or `timeoutMs` has passed.
   * Resolves true if it exited.
   */
  private async waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
    const deadline = this.clock.now() + timeoutMs;

    while (this.probe.isAlive(pid)) {
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return false;
      }
      await this.clock.sleep(Math.min(this.options.pollIntervalMs, remaining));
    }

    return true;
  }
}
