/**
 * Output handle for one worker session.
 * The parent closes its copy once the child has been spawned.
 */
export interface LogSession {
  /** File descriptor opened in append mode, handed to the child as stdout/stderr */
  readonly fd: number;
  close(): void;
}

export interface LogSink {
  readonly path: string;

  /**
   * Truncate the log, write the session header and open it for appending.
   */
  beginSession(name: string, startedAt: Date): LogSession;

  /** Full contents, or null if the log was never created */
  read(): string | null;

  /** Last `lines` lines, or null if the log was never created */
  tail(lines: number): string | null;

  /** Delete the log. Returns whether there was one. */
  remove(): boolean;
}
