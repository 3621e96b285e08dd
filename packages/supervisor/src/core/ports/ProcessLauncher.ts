import type { LogSession } from "./LogSink.js";

export interface LaunchParams {
  executable: string;
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
  output: LogSession;
}

export interface ForegroundParams {
  executable: string;
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ProcessLauncher {
  /**
   * Spawn a detached worker writing to `output` and resolve with its PID as
   * soon as the OS reports the spawn. Rejects with SpawnError if it cannot be
   * started.
   */
  launch(params: LaunchParams): Promise<number>;

  /**
   * Run attached to the current terminal and resolve with the exit code.
   */
  runForeground(params: ForegroundParams): Promise<number>;
}

/**
 * The worker could not be spawned at all (missing binary, no permission).
 */
export class SpawnError extends Error {
  constructor(
    readonly executable: string,
    readonly code: string | null,
    message: string
  ) {
    super(message);
    this.name = "SpawnError";
  }

  static from(error: unknown, executable: string): SpawnError {
    if (error instanceof SpawnError) return error;
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    return new SpawnError(executable, code, `Failed to start ${executable}: ${detail}`);
  }
}

export function errorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}
