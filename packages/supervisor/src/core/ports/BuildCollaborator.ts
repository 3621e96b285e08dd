/**
 * Runs the external build/test/packaging tasks.
 */
export interface BuildCollaborator {
  /** Whether the task has steps configured */
  has(task: string): boolean;

  /**
   * Run every step of the task in order and resolve with the first non-zero
   * exit code, or 0. A task without steps resolves with 0.
   */
  run(task: string): Promise<number>;
}
