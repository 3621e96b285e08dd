import type { LivenessProbe } from "../../core/ports/LivenessProbe.js";
import type { PidStore } from "../../core/ports/PidStore.js";

/**
 * PID record held in memory. `record` is the raw stored value, before the
 * liveness check that `read()` applies.
 */
export class InMemoryPidStore implements PidStore {
  record: number | null = null;
  private written: Date | null = null;

  constructor(
    private readonly probe: LivenessProbe,
    readonly path = "memory://worker.pid"
  ) {}

  read(): number | null {
    if (this.record === null) return null;
    return this.probe.isAlive(this.record) ? this.record : null;
  }

  write(pid: number): void {
    this.record = pid;
    this.written = new Date();
  }

  clear(): void {
    this.record = null;
    this.written = null;
  }

  writtenAt(): Date | null {
    return this.written;
  }
}
