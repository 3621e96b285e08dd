/**
 * Worker command-line and environment construction.
 */

import type { WorkerInvocation } from "./model.js";

/**
 * Split raw `start` arguments: the last token is the prompt, everything before
 * it goes to the worker as flags, verbatim.
 *
 * Flags that take a value are not recognised; `--model x` with no prompt after
 * it makes `x` the prompt. Returns null when there is no (non-empty) prompt.
 */
export function splitInvocation(args: readonly string[]): WorkerInvocation | null {
  if (args.length === 0) return null;

  const prompt = args[args.length - 1];
  if (prompt === undefined || prompt.trim() === "") return null;

  return { prompt, flags: args.slice(0, -1) };
}

/**
 * The worker's argv (without the executable): flags first, prompt last.
 */
export function workerArgs(invocation: WorkerInvocation): string[] {
  return [...invocation.flags, invocation.prompt];
}

/**
 * Copy of `base` without `unset`. A worker that inherits that variable would
 * believe it is itself running under a supervisor.
 */
export function workerEnvironment(base: NodeJS.ProcessEnv, unset: string): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  delete env[unset];
  return env;
}
