/**
 * The `tether` command line.
 *
 * Everything a command prints goes through CliIO so the program can run
 * against captured output. runCli never exits the process; it resolves with
 * the exit code.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";

import type { Result } from "@tether/core";

import type { ConfigError } from "../config.js";
import type { SupervisorError, WorkerInvocation } from "../core/model.js";
import type { Supervisor } from "../core/services/Supervisor.js";
import { splitInvocation } from "../core/invocation.js";
import { describeError } from "../format.js";
import { VERSION } from "../version.js";

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io: CliIO;

  /** Build the supervisor for the given --config value */
  load(configPath: string | undefined): Result<Supervisor, ConfigError>;
}

type GlobalOptions = {
  config?: string;
};

/** Passthrough task commands and their help text */
const TASK_COMMANDS: ReadonlyArray<readonly [string, string]> = [
  ["build", "Build the worker for the current platform"],
  ["build-all", "Build the worker for all platforms"],
  ["install", "Install the worker"],
  ["test", "Run the worker's tests"],
  ["fmt", "Format the worker's code"],
  ["vet", "Run static checks on the worker's code"],
];

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const { io } = deps;
  const program = new Command();

  program
    .name("tether")
    .description("Run one worker process in the background and keep track of it")
    .version(VERSION)
    .option("-c, --config <path>", "Config file (default: ./tether.config.json)")
    .enablePositionalOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  /** Resolve the supervisor, or report the config problem and fail */
  const withSupervisor = async (run: (supervisor: Supervisor) => Promise<number> | number): Promise<void> => {
    const { config } = program.opts<GlobalOptions>();
    const loaded = deps.load(config);
    if (!loaded.ok) {
      io.err(`Error: ${loaded.error.message}`);
      setExitCode(1);
      return;
    }
    setExitCode(await run(loaded.value));
  };

  const fail = (supervisor: Supervisor, error: SupervisorError): number => {
    io.err(`Error: ${describeError(supervisor.name, error)}`);
    return error.kind === "task-failed" ? error.exitCode : 1;
  };

  const start = async (supervisor: Supervisor, invocation: WorkerInvocation): Promise<number> => {
    const result = await supervisor.start(invocation);
    if (!result.ok) return fail(supervisor, result.error);

    const { name } = supervisor;
    const outcome = result.value;
    const { pid, logPath } = outcome.process;

    if (outcome.kind === "already-running") {
      io.out(`${name} is already running (PID: ${pid})`);
      io.out("Use 'tether stop' to stop it first");
      return 0;
    }

    io.out(`${name} started (PID: ${pid})`);
    io.out(`Log output: ${logPath}`);

    if (outcome.kind === "started") {
      io.out(`${name} is running`);
      return 0;
    }
    io.out(`${name} failed to start. Check log file:`);
    io.out("  tether log");
    return 1;
  };

  const runTask = async (supervisor: Supervisor, task: string): Promise<number> => {
    const result = await supervisor.runTask(task);
    return result.ok ? 0 : fail(supervisor, result.error);
  };

  program
    .command("start")
    .description("Build and start the worker in the background: start [flags...] <prompt>")
    .argument("[args...]", "Worker flags followed by the prompt")
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .action((args: string[]) =>
      withSupervisor(async (supervisor) => {
        const invocation = splitInvocation(args);
        if (!invocation) {
          io.err("Error: start command requires a prompt");
          io.err('Usage: tether start [flags...] "your prompt here"');
          return 1;
        }
        return start(supervisor, invocation);
      })
    );

  program
    .command("stop")
    .description("Stop the background worker (SIGTERM, then SIGKILL)")
    .action(() =>
      withSupervisor(async (supervisor) => {
        const { name } = supervisor;
        const status = supervisor.status();
        if (status.state === "not-running") {
          io.out(`No running ${name} process found`);
          return 0;
        }

        io.out(`Stopping ${name} (PID: ${status.process.pid})...`);
        const result = await supervisor.stop();
        if (!result.ok) return fail(supervisor, result.error);

        const stopped = result.value;
        if (stopped.kind === "not-running") {
          io.out("Process already stopped");
          return 0;
        }
        switch (stopped.outcome) {
          case "stopped":
            io.out(`${name} stopped`);
            break;
          case "killed":
            io.out(`${name} killed after ignoring SIGTERM`);
            break;
          case "already-gone":
            io.out("Process already stopped");
            break;
        }
        return 0;
      })
    );

  program
    .command("status")
    .description("Show whether the worker is running")
    .action(() =>
      withSupervisor((supervisor) => {
        const status = supervisor.status();
        if (status.state === "running") {
          io.out(`${supervisor.name} is running (PID: ${status.process.pid})`);
          io.out(`  Logs: ${status.process.logPath}`);
        } else {
          io.out(`${supervisor.name} is not running`);
        }
        return 0;
      })
    );

  program
    .command("log")
    .description("Print the worker's log")
    .option("-n, --tail <lines>", "Only the last <lines> lines", parsePositiveInt)
    .action((options: { tail?: number }) =>
      withSupervisor((supervisor) => {
        const snapshot = supervisor.log({ tail: options.tail });
        if (!snapshot.available) {
          io.out("No log file found");
          io.out(`Start ${supervisor.name} first: tether start 'prompt'`);
          return 0;
        }
        io.out(`=== Logs from ${snapshot.path} ===`);
        io.out("");
        io.out(snapshot.content);
        return 0;
      })
    );

  program
    .command("run")
    .description("Build and run the worker in the foreground: run [flags...] [prompt]")
    .argument("[args...]", "Worker flags followed by the prompt")
    .helpOption(false)
    .allowUnknownOption()
    .passThroughOptions()
    .action((args: string[]) =>
      withSupervisor(async (supervisor) => {
        const invocation = args.length === 0 ? { flags: [] } : splitInvocation(args);
        if (!invocation) {
          io.err("Error: run command requires a non-empty prompt");
          io.err('Usage: tether run [flags...] ["your prompt here"]');
          return 1;
        }
        const result = await supervisor.run(invocation);
        return result.ok ? result.value : fail(supervisor, result.error);
      })
    );

  program
    .command("clean")
    .description("Run the clean task and remove the PID and log files")
    .action(() =>
      withSupervisor(async (supervisor) => {
        const result = await supervisor.clean();
        if (!result.ok) return fail(supervisor, result.error);

        if (result.value.kind === "running") {
          io.err(`Error: ${supervisor.name} is running (PID: ${result.value.pid})`);
          io.err("Use 'tether stop' to stop it first");
          return 1;
        }
        for (const path of result.value.removed) {
          io.out(`Removed ${path}`);
        }
        io.out("Clean complete");
        return 0;
      })
    );

  for (const [task, description] of TASK_COMMANDS) {
    program
      .command(task)
      .description(description)
      .action(() => withSupervisor((supervisor) => runTask(supervisor, task)));
  }

  program
    .command("task")
    .description("Run a task from the config file")
    .argument("<name>", "Task name")
    .action((name: string) => withSupervisor((supervisor) => runTask(supervisor, name)));

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  if (argv.length === 0) {
    deps.io.out(program.helpInformation().trimEnd());
    return 0;
  }

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    // --help, --version and usage errors; commander already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}
