import type { Signal } from "../model.js";

export interface ProcessSignaller {
  /**
   * Deliver `signal` to the worker. Returns false if there is no such process
   * (or it cannot be signalled), true once the signal was sent.
   */
  signal(pid: number, signal: Signal): boolean;
}
