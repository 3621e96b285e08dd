/**
 * Liveness via the OS process table.
 *
 * Existence is checked with signal 0, then the process state is read so that
 * zombies (exited but not yet reaped) count as dead:
 * - linux: /proc/<pid>/stat
 * - other POSIX: `ps -o stat= -p <pid>`
 * - win32: no zombies, existence is enough
 */

import { execFileSync } from "node:child_process";
import { readFileSync } from "node:fs";

import type { LivenessProbe } from "../../core/ports/LivenessProbe.js";
import { errorCode } from "../../core/ports/ProcessLauncher.js";

export type ProcessState = "running" | "zombie" | "missing" | "unknown";

export class NodeLivenessProbe implements LivenessProbe {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  isAlive(pid: number): boolean {
    if (!Number.isSafeInteger(pid) || pid <= 0) {
      return false;
    }
    if (!pidExists(pid)) {
      return false;
    }

    const state = this.state(pid);
    return state === "running" || state === "unknown";
  }

  state(pid: number): ProcessState {
    switch (this.platform) {
      case "win32":
        return "unknown";
      case "linux":
        return procState(pid);
      default:
        return psState(pid);
    }
  }
}

/**
 * Signal 0 probes for existence without delivering anything.
 * EPERM (someone else's process) is reported as not alive too.
 */
export function pidExists(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read the state letter from /proc/<pid>/stat. The command name is wrapped in
 * parentheses and may itself contain spaces or parentheses, so the state is
 * the first field after the last ")".
 */
export function procState(pid: number): ProcessState {
  let stat: string;
  try {
    stat = readFileSync(`/proc/${pid}/stat`, "utf-8");
  } catch (error) {
    return errorCode(error) === "ENOENT" ? "missing" : "unknown";
  }
  return parseStatState(stat);
}

export function parseStatState(stat: string): ProcessState {
  const end = stat.lastIndexOf(")");
  if (end === -1) return "unknown";

  const state = stat.slice(end + 1).trim().charAt(0);
  switch (state) {
    case "":
      return "unknown";
    case "Z":
      return "zombie";
    case "X":
    case "x":
      return "missing";
    default:
      return "running";
  }
}

function psState(pid: number): ProcessState {
  let output: string;
  try {
    output = execFileSync("ps", ["-o", "stat=", "-p", String(pid)], {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    });
  } catch (error) {
    // ps exits 1 when no process matched; ENOENT means there is no ps at all
    return errorCode(error) === "ENOENT" ? "unknown" : "missing";
  }

  const stat = output.trim();
  if (stat === "") return "missing";
  return stat.startsWith("Z") ? "zombie" : "running";
}
