/**
 * Simulated process table for testing the supervisor without real processes.
 * Acts as liveness probe, signaller and launcher at once, with time taken from
 * a shared clock.
 */

import type { Signal } from "../../core/model.js";
import type { Clock } from "../../core/ports/Clock.js";
import type { LivenessProbe } from "../../core/ports/LivenessProbe.js";
import type {
  ForegroundParams,
  LaunchParams,
  ProcessLauncher,
} from "../../core/ports/ProcessLauncher.js";
import type { ProcessSignaller } from "../../core/ports/ProcessSignaller.js";

/**
 * How a fake process reacts.
 *
 * - onTerm / onKill: whether the signal ends it ("exit") or is ignored
 * - exitDelayMs: time between the signal and the actual exit
 * - lifetimeMs: exits by itself this long after launch (null = runs forever)
 * - zombie: after exit it stays in the table as a zombie
 */
export interface FakeBehavior {
  onTerm: "exit" | "ignore";
  onKill: "exit" | "ignore";
  exitDelayMs: number;
  lifetimeMs: number | null;
  zombie: boolean;
}

export const COOPERATIVE: FakeBehavior = {
  onTerm: "exit",
  onKill: "exit",
  exitDelayMs: 0,
  lifetimeMs: null,
  zombie: false,
};

export interface FakeProcess {
  readonly pid: number;
  readonly behavior: FakeBehavior;
  readonly launch: LaunchParams | null;
  readonly signals: Signal[];
  /** Clock time at which it exits, null while it runs indefinitely */
  exitAt: number | null;
}

export class FakeProcessTable implements LivenessProbe, ProcessSignaller, ProcessLauncher {
  readonly launches: LaunchParams[] = [];
  readonly foregroundRuns: ForegroundParams[] = [];

  private readonly processes = new Map<number, FakeProcess>();
  private nextPid: number;
  private nextBehavior: FakeBehavior = COOPERATIVE;
  private launchFailure: Error | null = null;
  private foregroundExitCode = 0;

  constructor(
    private readonly clock: Clock,
    firstPid = 4000
  ) {
    this.nextPid = firstPid;
  }

  /** Behavior of the next launched process */
  behaveNext(behavior: Partial<FakeBehavior>): void {
    this.nextBehavior = { ...COOPERATIVE, ...behavior };
  }

  /** Make the next launch fail with `error` */
  failNextLaunch(error: Error): void {
    this.launchFailure = error;
  }

  /** Exit code of the next foreground run */
  exitForegroundWith(code: number): void {
    this.foregroundExitCode = code;
  }

  /** Add a process that was not launched through this table */
  add(behavior: Partial<FakeBehavior> = {}): FakeProcess {
    return this.register({ ...COOPERATIVE, ...behavior }, null);
  }

  /** Kill a process from outside, as if it crashed */
  crash(pid: number): void {
    const proc = this.processes.get(pid);
    if (proc) {
      proc.exitAt = this.clock.now();
    }
  }

  get(pid: number): FakeProcess | undefined {
    return this.processes.get(pid);
  }

  isAlive(pid: number): boolean {
    const proc = this.processes.get(pid);
    if (!proc) return false;
    return proc.exitAt === null || this.clock.now() < proc.exitAt;
  }

  signal(pid: number, signal: Signal): boolean {
    const proc = this.processes.get(pid);
    if (!proc || !this.exists(proc)) return false;

    proc.signals.push(signal);
    const reaction = signal === "SIGTERM" ? proc.behavior.onTerm : proc.behavior.onKill;
    if (reaction === "exit") {
      const exitAt = this.clock.now() + proc.behavior.exitDelayMs;
      proc.exitAt = proc.exitAt === null ? exitAt : Math.min(proc.exitAt, exitAt);
    }
    return true;
  }

  async launch(params: LaunchParams): Promise<number> {
    if (this.launchFailure) {
      const failure = this.launchFailure;
      this.launchFailure = null;
      throw failure;
    }

    this.launches.push(params);
    const proc = this.register(this.nextBehavior, params);
    this.nextBehavior = COOPERATIVE;
    return proc.pid;
  }

  async runForeground(params: ForegroundParams): Promise<number> {
    if (this.launchFailure) {
      const failure = this.launchFailure;
      this.launchFailure = null;
      throw failure;
    }

    this.foregroundRuns.push(params);
    return this.foregroundExitCode;
  }

  /**
   * Zombies stay in the table after exiting: they can still be signalled but
   * are not alive.
   */
  private exists(proc: FakeProcess): boolean {
    return this.isAlive(proc.pid) || proc.behavior.zombie;
  }

  private register(behavior: FakeBehavior, launch: LaunchParams | null): FakeProcess {
    const pid = this.nextPid++;
    const proc: FakeProcess = {
      pid,
      behavior,
      launch,
      signals: [],
      exitAt: behavior.lifetimeMs === null ? null : this.clock.now() + behavior.lifetimeMs,
    };
    this.processes.set(pid, proc);
    return proc;
  }
}
