import type { Signal } from "../../core/model.js";
import type { ProcessSignaller } from "../../core/ports/ProcessSignaller.js";
import { errorCode } from "../../core/ports/ProcessLauncher.js";

/**
 * Signals the worker's whole process group on POSIX (the worker leads its own
 * session, so -pid reaches anything it spawned), the single process on Windows.
 *
 * The group is signalled on purpose, so the worker's children go with it. If
 * the recorded PID has been reused by an unrelated group leader, that group is
 * signalled too.
 */
export class NodeProcessSignaller implements ProcessSignaller {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  signal(pid: number, signal: Signal): boolean {
    if (this.platform !== "win32" && deliver(-pid, signal)) {
      return true;
    }
    // Not a group leader (or Windows): fall back to the process itself
    return deliver(pid, signal);
  }
}

function deliver(target: number, signal: Signal): boolean {
  try {
    process.kill(target, signal);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ESRCH" || code === "EPERM") {
      return false;
    }
    throw error;
  }
}
