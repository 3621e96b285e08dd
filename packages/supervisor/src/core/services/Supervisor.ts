/**
 * Supervisor - single-instance lifecycle for a background worker.
 *
 * Composes the PID store, liveness probe, log sink, launcher and terminator
 * into start / stop / status / log. The singleton rule lives here and nowhere
 * else: an instance exists iff the PID store yields a live PID.
 *
 * start, stop and clean run one at a time per Supervisor, so overlapping
 * calls from a long-lived host (the MCP server) see each other's PID record.
 * There is no cross-invocation locking: two supervisors racing on the same
 * PID record can both decide nothing is running.
 */

import { Ok, Err, mapErr, tryCatchAsync, type Result } from "@tether/core";

import type {
  CleanResult,
  LogSnapshot,
  StartResult,
  StopResult,
  SupervisorError,
  SupervisorStatus,
  TrackedProcess,
  WorkerInvocation,
} from "../model.js";
import { BUILTIN_TASKS } from "../model.js";
import type { BuildCollaborator } from "../ports/BuildCollaborator.js";
import type { Clock } from "../ports/Clock.js";
import type { LivenessProbe } from "../ports/LivenessProbe.js";
import type { LogSink } from "../ports/LogSink.js";
import type { PidStore } from "../ports/PidStore.js";
import type { ProcessLauncher } from "../ports/ProcessLauncher.js";
import { SpawnError } from "../ports/ProcessLauncher.js";
import { workerArgs, workerEnvironment } from "../invocation.js";
import { TerminationError, type Terminator } from "./Terminator.js";

export interface SupervisorOptions {
  /** Worker name used in the log header */
  name: string;

  /** Path of the worker executable */
  binary: string;

  /** Environment variable removed before the worker starts */
  unsetEnv: string;

  /** Prompt for `run` when none is given */
  defaultPrompt: string;

  /** Pause between spawn and the post-launch liveness check (ms) */
  settleDelayMs: number;

  /** Working directory for the worker. Default: inherited */
  cwd?: string;

  /** Base environment for the worker. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

export interface SupervisorDeps {
  pids: PidStore;
  logs: LogSink;
  probe: LivenessProbe;
  launcher: ProcessLauncher;
  terminator: Terminator;
  tasks: BuildCollaborator;
  clock: Clock;
}

export interface RunInvocation {
  prompt?: string;
  flags: readonly string[];
}

export class Supervisor {
  /** Tail of the chain that serializes state-changing operations */
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly deps: SupervisorDeps,
    private readonly options: SupervisorOptions
  ) {}

  get name(): string {
    return this.options.name;
  }

  get logPath(): string {
    return this.deps.logs.path;
  }

  /**
   * Build and launch the worker unless one is already running.
   */
  start(invocation: WorkerInvocation): Promise<Result<StartResult, SupervisorError>> {
    return this.exclusive(() => this.startNow(invocation));
  }

  private async startNow(invocation: WorkerInvocation): Promise<Result<StartResult, SupervisorError>> {
    const existing = this.current();
    if (existing) {
      return Ok({ kind: "already-running", process: existing });
    }

    const built = await this.runTask("build");
    if (!built.ok) return built;

    const startedAt = new Date(this.deps.clock.now());
    const session = this.deps.logs.beginSession(this.options.name, startedAt);

    let launched: Result<number, SupervisorError>;
    try {
      launched = mapErr(
        await tryCatchAsync(() =>
          this.deps.launcher.launch({
            executable: this.options.binary,
            args: workerArgs(invocation),
            env: this.environment(),
            cwd: this.options.cwd,
            output: session,
          })
        ),
        (error) => this.spawnFailure(error)
      );
    } finally {
      session.close();
    }
    if (!launched.ok) return launched;

    const pid = launched.value;
    this.deps.pids.write(pid);

    const tracked: TrackedProcess = {
      pid,
      logPath: this.deps.logs.path,
      startedAt: startedAt.toISOString(),
    };

    await this.deps.clock.sleep(this.options.settleDelayMs);

    if (this.deps.probe.isAlive(pid)) {
      return Ok({ kind: "started", process: tracked });
    }
    return Ok({ kind: "exited-early", process: tracked });
  }

  /**
   * Terminate the tracked worker, if any, and clear the PID record.
   */
  stop(): Promise<Result<StopResult, SupervisorError>> {
    return this.exclusive(() => this.stopNow());
  }

  private async stopNow(): Promise<Result<StopResult, SupervisorError>> {
    const pid = this.deps.pids.read();
    if (pid === null) {
      return Ok({ kind: "not-running" });
    }

    try {
      const outcome = await this.deps.terminator.stop(pid);
      this.deps.pids.clear();
      return Ok({ kind: "stopped", pid, outcome });
    } catch (error) {
      if (error instanceof TerminationError) {
        return Err({ kind: "stop-failed", pid, message: error.message });
      }
      throw error;
    }
  }

  status(): SupervisorStatus {
    const tracked = this.current();
    if (tracked) {
      return { state: "running", process: tracked };
    }
    return { state: "not-running", logPath: this.deps.logs.path };
  }

  /**
   * Current log contents, optionally only the last `tail` lines.
   */
  log(options: { tail?: number } = {}): LogSnapshot {
    const path = this.deps.logs.path;
    const content =
      options.tail !== undefined ? this.deps.logs.tail(options.tail) : this.deps.logs.read();

    if (content === null) {
      return { available: false, path };
    }
    return { available: true, path, content };
  }

  /**
   * Build, then run the worker in the foreground. Resolves with its exit code.
   */
  async run(invocation: RunInvocation): Promise<Result<number, SupervisorError>> {
    const built = await this.runTask("build");
    if (!built.ok) return built;

    const args = workerArgs({
      prompt: invocation.prompt ?? this.options.defaultPrompt,
      flags: invocation.flags,
    });

    return mapErr(
      await tryCatchAsync(() =>
        this.deps.launcher.runForeground({
          executable: this.options.binary,
          args,
          env: this.environment(),
          cwd: this.options.cwd,
        })
      ),
      (error) => this.spawnFailure(error)
    );
  }

  /**
   * Run a build/test/packaging task. Non-zero exit codes become task-failed
   * carrying the code so callers can propagate it.
   */
  async runTask(task: string): Promise<Result<void, SupervisorError>> {
    if (!isBuiltinTask(task) && !this.deps.tasks.has(task)) {
      return Err({ kind: "unknown-task", task });
    }

    const exitCode = await this.deps.tasks.run(task);
    if (exitCode !== 0) {
      return Err({ kind: "task-failed", task, exitCode });
    }
    return Ok(undefined);
  }

  /**
   * Run the clean task and remove the PID record and log.
   * Refuses while the worker is alive.
   */
  clean(): Promise<Result<CleanResult, SupervisorError>> {
    return this.exclusive(() => this.cleanNow());
  }

  private async cleanNow(): Promise<Result<CleanResult, SupervisorError>> {
    const pid = this.deps.pids.read();
    if (pid !== null) {
      return Ok({ kind: "running", pid });
    }

    const cleaned = await this.runTask("clean");
    if (!cleaned.ok) return cleaned;

    const removed: string[] = [];
    if (this.deps.pids.writtenAt() !== null) {
      removed.push(this.deps.pids.path);
    }
    this.deps.pids.clear();
    if (this.deps.logs.remove()) {
      removed.push(this.deps.logs.path);
    }

    return Ok({ kind: "cleaned", removed });
  }

  /**
   * Run `operation` once every earlier start/stop/clean has settled.
   * A rejection reaches this caller only; the chain moves on.
   */
  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.pending.then(operation);
    this.pending = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private current(): TrackedProcess | null {
    const pid = this.deps.pids.read();
    if (pid === null) return null;

    const writtenAt = this.deps.pids.writtenAt();
    return {
      pid,
      logPath: this.deps.logs.path,
      startedAt: writtenAt ? writtenAt.toISOString() : null,
    };
  }

  private environment(): NodeJS.ProcessEnv {
    return workerEnvironment(this.options.env ?? process.env, this.options.unsetEnv);
  }

  private spawnFailure(error: Error): SupervisorError {
    const failure = SpawnError.from(error, this.options.binary);
    return {
      kind: "spawn-failed",
      executable: failure.executable,
      code: failure.code,
      message: failure.message,
    };
  }
}

function isBuiltinTask(task: string): boolean {
  return BUILTIN_TASKS.some((name) => name === task);
}
