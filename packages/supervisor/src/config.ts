/**
 * Supervisor configuration.
 *
 * Read from `tether.config.json` in the working directory (or the path given
 * by --config / TETHER_CONFIG). Every field is optional; missing ones come
 * from DEFAULT_CONFIG or are derived from `name`.
 */

import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";
import * as z from "zod/v4";

import { Err, Ok, tryCatch, type Result } from "@tether/core";

import type { TaskStep } from "./core/model.js";

export const CONFIG_FILE = "tether.config.json";

const TaskStepSchema = z.object({
  command: z.tuple([z.string().min(1)], z.string()).describe("Executable followed by its arguments"),
  env: z.record(z.string(), z.string()).optional(),
});

export const ConfigFileSchema = z
  .object({
    name: z
      .string()
      .regex(/^[\w.-]+$/, "may only contain letters, digits, '.', '_' and '-'")
      .optional(),
    binary: z.string().min(1).optional(),
    pidFile: z.string().min(1).optional(),
    logFile: z.string().min(1).optional(),
    unsetEnv: z.string().min(1).optional(),
    defaultPrompt: z.string().min(1).optional(),
    settleDelayMs: z.number().int().nonnegative().optional(),
    gracefulTimeoutMs: z.number().int().positive().optional(),
    forcefulTimeoutMs: z.number().int().positive().optional(),
    pollIntervalMs: z.number().int().positive().optional(),
    tasks: z.record(z.string(), z.array(TaskStepSchema)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface SupervisorConfig {
  /** Worker name, used in messages, the log header and default file names */
  name: string;

  /** Absolute path of the worker executable */
  binary: string;

  /** Absolute path of the PID record */
  pidFile: string;

  /** Absolute path of the log file */
  logFile: string;

  /** Environment variable removed from the worker's environment */
  unsetEnv: string;

  /** Prompt used by `run` when none is given */
  defaultPrompt: string;

  settleDelayMs: number;
  gracefulTimeoutMs: number;
  forcefulTimeoutMs: number;
  pollIntervalMs: number;

  /** Build/test/packaging tasks by name */
  tasks: Record<string, TaskStep[]>;

  /** Directory relative paths were resolved against */
  cwd: string;
}

export const DEFAULT_CONFIG = {
  name: "worker",
  unsetEnv: "CLAUDECODE",
  defaultPrompt: "What is 2+2?",
  settleDelayMs: 2_000,
  gracefulTimeoutMs: 10_000,
  forcefulTimeoutMs: 5_000,
  pollIntervalMs: 100,
} as const;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config path; it must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Locate, parse and validate the config file, then fill in defaults.
 * A missing default config file is not an error.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<SupervisorConfig, ConfigError> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? env.TETHER_CONFIG;
  const path = resolve(cwd, explicit ?? CONFIG_FILE);

  if (!existsSync(path)) {
    if (explicit !== undefined) {
      return Err(new ConfigError(`Config file not found: ${path}`, path));
    }
    return Ok(resolveConfig({}, { cwd, env, platform: options.platform }));
  }

  const parsed = tryCatch((): unknown => JSON.parse(readFileSync(path, "utf-8")));
  if (!parsed.ok) {
    return Err(new ConfigError(`Could not read ${path}: ${parsed.error.message}`, path));
  }

  const validated = ConfigFileSchema.safeParse(parsed.value);
  if (!validated.success) {
    return Err(new ConfigError(`Invalid config ${path}:\n${formatIssues(validated.error)}`, path));
  }

  return Ok(resolveConfig(validated.data, { cwd, env, platform: options.platform }));
}

/**
 * Apply defaults and make every path absolute.
 *
 * TETHER_DATA_DIR moves the default PID and log files; explicit `pidFile` /
 * `logFile` values still resolve against `cwd`.
 */
export function resolveConfig(
  file: ConfigFile,
  options: { cwd: string; env?: NodeJS.ProcessEnv; platform?: NodeJS.Platform }
): SupervisorConfig {
  const { cwd } = options;
  const platform = options.platform ?? process.platform;
  const name = file.name ?? DEFAULT_CONFIG.name;
  const dataDir = resolve(cwd, options.env?.TETHER_DATA_DIR ?? ".");

  const defaultBinary = platform === "win32" ? `${name}.exe` : name;

  return {
    name,
    binary: resolve(cwd, file.binary ?? defaultBinary),
    pidFile: file.pidFile ? resolve(cwd, file.pidFile) : join(dataDir, `.${name}.pid`),
    logFile: file.logFile ? resolve(cwd, file.logFile) : join(dataDir, `.${name}.log`),
    unsetEnv: file.unsetEnv ?? DEFAULT_CONFIG.unsetEnv,
    defaultPrompt: file.defaultPrompt ?? DEFAULT_CONFIG.defaultPrompt,
    settleDelayMs: file.settleDelayMs ?? DEFAULT_CONFIG.settleDelayMs,
    gracefulTimeoutMs: file.gracefulTimeoutMs ?? DEFAULT_CONFIG.gracefulTimeoutMs,
    forcefulTimeoutMs: file.forcefulTimeoutMs ?? DEFAULT_CONFIG.forcefulTimeoutMs,
    pollIntervalMs: file.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs,
    tasks: file.tasks ?? {},
    cwd: isAbsolute(cwd) ? cwd : resolve(cwd),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.map(String).join(".") : "(root)";
      return `  ${where}: ${issue.message}`;
    })
    .join("\n");
}
