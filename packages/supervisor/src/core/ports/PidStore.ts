/**
 * Persistent record of the tracked worker's PID.
 */
export interface PidStore {
  /** Where the record lives (for messages) */
  readonly path: string;

  /**
   * The stored PID, or null when the record is missing, unreadable, not a
   * positive integer, or names a process that is no longer alive.
   */
  read(): number | null;

  write(pid: number): void;

  /** Remove the record. Clearing an absent record is not an error. */
  clear(): void;

  /** When the record was last written, if it exists */
  writtenAt(): Date | null;
}
