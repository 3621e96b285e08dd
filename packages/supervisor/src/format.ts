import type { SupervisorError } from "./core/model.js";

/**
 * One-line description of a supervisor failure, without the "Error:" prefix.
 */
export function describeError(name: string, error: SupervisorError): string {
  switch (error.kind) {
    case "unknown-task":
      return `unknown task '${error.task}'`;
    case "task-failed":
      return `task '${error.task}' failed with exit code ${error.exitCode}`;
    case "spawn-failed":
      return error.message;
    case "stop-failed":
      return `could not stop ${name} (PID: ${error.pid}): ${error.message}`;
  }
}
