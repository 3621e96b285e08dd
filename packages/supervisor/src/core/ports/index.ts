export type { LivenessProbe } from "./LivenessProbe.js";
export type { PidStore } from "./PidStore.js";
export type { LogSink, LogSession } from "./LogSink.js";
export type { ProcessLauncher, LaunchParams, ForegroundParams } from "./ProcessLauncher.js";
export { SpawnError, errorCode } from "./ProcessLauncher.js";
export type { ProcessSignaller } from "./ProcessSignaller.js";
export type { BuildCollaborator } from "./BuildCollaborator.js";
export type { Clock } from "./Clock.js";
