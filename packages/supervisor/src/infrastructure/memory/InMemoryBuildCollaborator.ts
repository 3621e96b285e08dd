import type { BuildCollaborator } from "../../core/ports/BuildCollaborator.js";

/**
 * Records task runs and answers with preset exit codes (default 0).
 */
export class InMemoryBuildCollaborator implements BuildCollaborator {
  readonly runs: string[] = [];
  private readonly exitCodes = new Map<string, number>();

  constructor(private readonly configured: readonly string[] = []) {}

  exitWith(task: string, code: number): void {
    this.exitCodes.set(task, code);
  }

  has(task: string): boolean {
    return this.configured.includes(task);
  }

  async run(task: string): Promise<number> {
    this.runs.push(task);
    return this.exitCodes.get(task) ?? 0;
  }
}
