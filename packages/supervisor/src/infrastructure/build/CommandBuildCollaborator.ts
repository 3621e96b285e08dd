/**
 * Runs configured task steps as child processes.
 *
 * Tasks are opaque: tether only cares about the exit status. Output is either
 * passed to the terminal (CLI) or routed to stderr (MCP server, whose stdout
 * carries the protocol).
 */

import { spawn, type StdioOptions } from "node:child_process";

import type { TaskStep } from "../../core/model.js";
import type { BuildCollaborator } from "../../core/ports/BuildCollaborator.js";
import { exitCodeOf } from "../process/NodeProcessLauncher.js";

export type TaskOutput = "inherit" | "stderr";

export interface CommandBuildCollaboratorOptions {
  cwd: string;
  output: TaskOutput;
  /** Base environment for every step. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

/** Exit code reported when a step's command cannot be started */
export const COMMAND_NOT_FOUND = 127;

export class CommandBuildCollaborator implements BuildCollaborator {
  constructor(
    private readonly tasks: Readonly<Record<string, readonly TaskStep[]>>,
    private readonly options: CommandBuildCollaboratorOptions
  ) {}

  has(task: string): boolean {
    return Object.hasOwn(this.tasks, task);
  }

  async run(task: string): Promise<number> {
    const steps = this.has(task) ? (this.tasks[task] ?? []) : [];

    for (const step of steps) {
      const code = await this.runStep(step);
      if (code !== 0) {
        return code;
      }
    }
    return 0;
  }

  private runStep(step: TaskStep): Promise<number> {
    const [command, ...args] = step.command;
    const stdio: StdioOptions = this.options.output === "inherit" ? "inherit" : ["ignore", 2, 2];

    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: this.options.cwd,
        env: { ...(this.options.env ?? process.env), ...step.env },
        stdio,
      });

      child.once("error", (error) => {
        console.error(`[tether] Could not run ${command}: ${error.message}`);
        resolve(COMMAND_NOT_FOUND);
      });

      child.once("close", (code, signal) => {
        resolve(exitCodeOf(code, signal));
      });
    });
  }
}
