/**
 * Wires the Node adapters into a Supervisor for a loaded configuration.
 */

import type { SupervisorConfig } from "./config.js";
import { Supervisor } from "./core/services/Supervisor.js";
import { Terminator } from "./core/services/Terminator.js";
import {
  CommandBuildCollaborator,
  type TaskOutput,
} from "./infrastructure/build/CommandBuildCollaborator.js";
import { FileLogSink } from "./infrastructure/fs/FileLogSink.js";
import { FilePidStore } from "./infrastructure/fs/FilePidStore.js";
import { NodeLivenessProbe } from "./infrastructure/process/NodeLivenessProbe.js";
import { NodeProcessLauncher } from "./infrastructure/process/NodeProcessLauncher.js";
import { NodeProcessSignaller } from "./infrastructure/process/NodeProcessSignaller.js";
import { SystemClock } from "./infrastructure/system/SystemClock.js";

export interface CreateSupervisorOptions {
  /** Where task output goes. The MCP server must keep stdout for the protocol. */
  taskOutput: TaskOutput;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

export function createSupervisor(
  config: SupervisorConfig,
  options: CreateSupervisorOptions
): Supervisor {
  const platform = options.platform ?? process.platform;
  const clock = new SystemClock();
  const probe = new NodeLivenessProbe(platform);

  const terminator = new Terminator(probe, new NodeProcessSignaller(platform), clock, {
    gracefulTimeoutMs: config.gracefulTimeoutMs,
    forcefulTimeoutMs: config.forcefulTimeoutMs,
    pollIntervalMs: config.pollIntervalMs,
  });

  return new Supervisor(
    {
      pids: new FilePidStore(config.pidFile, probe),
      logs: new FileLogSink(config.logFile),
      probe,
      launcher: new NodeProcessLauncher(platform),
      terminator,
      tasks: new CommandBuildCollaborator(config.tasks, {
        cwd: config.cwd,
        output: options.taskOutput,
        env: options.env,
      }),
      clock,
    },
    {
      name: config.name,
      binary: config.binary,
      unsetEnv: config.unsetEnv,
      defaultPrompt: config.defaultPrompt,
      settleDelayMs: config.settleDelayMs,
      cwd: config.cwd,
      env: options.env,
    }
  );
}
