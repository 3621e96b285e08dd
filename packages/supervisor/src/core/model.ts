/**
 * Domain model for the worker supervisor.
 *
 * Exactly one worker instance is tracked at a time. Its identity is the PID in
 * the PID record; the record only counts while that PID names a live,
 * non-zombie process.
 */

/**
 * The single supervised worker instance.
 */
export interface TrackedProcess {
  /** OS process identifier */
  readonly pid: number;

  /** File receiving the worker's merged stdout/stderr */
  readonly logPath: string;

  /** When the instance was started (ISO string), if known. Informational only. */
  readonly startedAt: string | null;
}

export type Signal = "SIGTERM" | "SIGKILL";

/**
 * How a stop request ended.
 *
 * - stopped: exited within the graceful window after SIGTERM
 * - killed: needed SIGKILL
 * - already-gone: no live process by the time we looked or signalled
 */
export type StopOutcome = "stopped" | "killed" | "already-gone";

/**
 * Arguments for one worker invocation: `<binary> [...flags] <prompt>`.
 */
export interface WorkerInvocation {
  readonly prompt: string;
  readonly flags: readonly string[];
}

/**
 * One command of a task, run with the parent environment plus `env`.
 */
export interface TaskStep {
  readonly command: readonly [string, ...string[]];
  readonly env?: Readonly<Record<string, string>>;
}

export type StartResult =
  | { kind: "started"; process: TrackedProcess }
  | { kind: "exited-early"; process: TrackedProcess }
  | { kind: "already-running"; process: TrackedProcess };

export type StopResult =
  | { kind: "not-running" }
  | { kind: "stopped"; pid: number; outcome: StopOutcome };

export type SupervisorStatus =
  | { state: "running"; process: TrackedProcess }
  | { state: "not-running"; logPath: string };

export type LogSnapshot =
  | { available: true; path: string; content: string }
  | { available: false; path: string };

export type CleanResult =
  | { kind: "cleaned"; removed: string[] }
  | { kind: "running"; pid: number };

/**
 * Failures the supervisor reports to its callers.
 * Stale state (dead PID, missing log) is never one of these.
 */
export type SupervisorError =
  | { kind: "unknown-task"; task: string }
  | { kind: "task-failed"; task: string; exitCode: number }
  | { kind: "spawn-failed"; executable: string; code: string | null; message: string }
  | { kind: "stop-failed"; pid: number; message: string };

/**
 * Task names every configuration understands, configured or not.
 */
export const BUILTIN_TASKS = ["build", "build-all", "install", "test", "fmt", "vet", "clean"] as const;

export type BuiltinTask = (typeof BUILTIN_TASKS)[number];
