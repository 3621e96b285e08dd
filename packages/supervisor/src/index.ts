export { Supervisor } from "./core/services/Supervisor.js";
export type { SupervisorDeps, SupervisorOptions, RunInvocation } from "./core/services/Supervisor.js";
export {
  Terminator,
  TerminationError,
  DEFAULT_TERMINATOR_OPTIONS,
} from "./core/services/Terminator.js";
export type { TerminatorOptions, TerminationPhase } from "./core/services/Terminator.js";
export { splitInvocation, workerArgs, workerEnvironment } from "./core/invocation.js";
export { BUILTIN_TASKS } from "./core/model.js";
export type * from "./core/model.js";
export * from "./core/ports/index.js";

export { FilePidStore, parsePid } from "./infrastructure/fs/FilePidStore.js";
export { FileLogSink, sessionHeader } from "./infrastructure/fs/FileLogSink.js";
export { NodeLivenessProbe } from "./infrastructure/process/NodeLivenessProbe.js";
export { NodeProcessLauncher } from "./infrastructure/process/NodeProcessLauncher.js";
export { NodeProcessSignaller } from "./infrastructure/process/NodeProcessSignaller.js";
export { SystemClock } from "./infrastructure/system/SystemClock.js";
export { CommandBuildCollaborator } from "./infrastructure/build/CommandBuildCollaborator.js";
export type { TaskOutput } from "./infrastructure/build/CommandBuildCollaborator.js";

export { loadConfig, resolveConfig, ConfigError, DEFAULT_CONFIG, CONFIG_FILE } from "./config.js";
export type { SupervisorConfig, ConfigFile, LoadConfigOptions } from "./config.js";
export { createSupervisor } from "./factory.js";
export type { CreateSupervisorOptions } from "./factory.js";
export { runCli, buildProgram } from "./cli/program.js";
export type { CliDeps, CliIO } from "./cli/program.js";
export { registerAllTools } from "./tools/index.js";
export { cleanOutput, tailLines } from "./output.js";
export { describeError } from "./format.js";
export { VERSION } from "./version.js";
