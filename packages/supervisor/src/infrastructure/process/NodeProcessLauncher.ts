/**
 * Spawns the worker with Node's child_process.
 */

import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import { constants } from "node:os";

import type {
  ForegroundParams,
  LaunchParams,
  ProcessLauncher,
} from "../../core/ports/ProcessLauncher.js";
import { SpawnError } from "../../core/ports/ProcessLauncher.js";

/**
 * Spawn options that keep the worker alive after the launcher exits and out of
 * reach of the launcher's Ctrl+C.
 *
 * POSIX: `detached` puts the child in a new session (setsid), so it leads its
 * own process group and has no controlling terminal.
 * Windows: `detached` gives a new process group; the console window is hidden
 * because output already goes to the log file.
 */
export function detachmentOptions(
  platform: NodeJS.Platform
): Pick<SpawnOptions, "detached" | "windowsHide"> {
  if (platform === "win32") {
    return { detached: true, windowsHide: true };
  }
  return { detached: true };
}

/**
 * Shell-style exit code for a child that ended by signal.
 */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const signalNumber: unknown = Reflect.get(constants.signals, signal);
    if (typeof signalNumber === "number") return 128 + signalNumber;
  }
  return 1;
}

export class NodeProcessLauncher implements ProcessLauncher {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  launch(params: LaunchParams): Promise<number> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(params.executable, [...params.args], {
          ...detachmentOptions(this.platform),
          cwd: params.cwd,
          env: params.env,
          stdio: ["ignore", params.output.fd, params.output.fd],
        });
      } catch (error) {
        reject(SpawnError.from(error, params.executable));
        return;
      }

      child.once("error", (error) => {
        reject(SpawnError.from(error, params.executable));
      });

      child.once("spawn", () => {
        const { pid } = child;
        // Let the launcher exit without waiting for the worker
        child.unref();
        if (pid === undefined) {
          reject(new SpawnError(params.executable, null, `Failed to start ${params.executable}: no PID assigned`));
          return;
        }
        resolve(pid);
      });
    });
  }

  runForeground(params: ForegroundParams): Promise<number> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(params.executable, [...params.args], {
          cwd: params.cwd,
          env: params.env,
          stdio: "inherit",
        });
      } catch (error) {
        reject(SpawnError.from(error, params.executable));
        return;
      }

      child.once("error", (error) => {
        reject(SpawnError.from(error, params.executable));
      });

      child.once("close", (code, signal) => {
        resolve(exitCodeOf(code, signal));
      });
    });
  }
}
