/**
 * PID record as a plain-text file holding one positive integer.
 */

import { mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { LivenessProbe } from "../../core/ports/LivenessProbe.js";
import type { PidStore } from "../../core/ports/PidStore.js";

export class FilePidStore implements PidStore {
  constructor(
    readonly path: string,
    private readonly probe: LivenessProbe
  ) {}

  read(): number | null {
    const pid = this.readRecord();
    if (pid === null) return null;
    return this.probe.isAlive(pid) ? pid : null;
  }

  /**
   * The stored PID without the liveness check.
   */
  readRecord(): number | null {
    let text: string;
    try {
      text = readFileSync(this.path, "utf-8");
    } catch {
      return null;
    }
    return parsePid(text);
  }

  write(pid: number): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, String(pid));
  }

  clear(): void {
    rmSync(this.path, { force: true });
  }

  writtenAt(): Date | null {
    try {
      return statSync(this.path).mtime;
    } catch {
      return null;
    }
  }
}

/**
 * Parse a PID record. Surrounding whitespace is allowed; anything other than a
 * positive decimal integer is rejected.
 */
export function parsePid(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const pid = Number(trimmed);
  if (!Number.isSafeInteger(pid) || pid <= 0) return null;
  return pid;
}
