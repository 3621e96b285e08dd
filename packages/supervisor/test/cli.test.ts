import { describe, it, expect } from "vitest";
import { Err, Ok } from "@tether/core";
import { runCli } from "../src/cli/program.js";
import { ConfigError } from "../src/config.js";
import { VERSION } from "../src/version.js";
import { createTestSupervisor } from "./fixtures.js";

type TestContext = ReturnType<typeof createTestSupervisor>;

/**
 * Run the CLI against a fake-backed supervisor and capture its output.
 */
function cli(context: TestContext = createTestSupervisor()) {
  const out: string[] = [];
  const err: string[] = [];
  const configPaths: Array<string | undefined> = [];

  const run = (...argv: string[]): Promise<number> =>
    runCli(argv, {
      io: {
        out: (line) => out.push(line),
        err: (line) => err.push(line),
      },
      load: (configPath) => {
        configPaths.push(configPath);
        return Ok(context.supervisor);
      },
    });

  const reset = (): void => {
    out.length = 0;
    err.length = 0;
  };

  return { run, reset, out, err, configPaths, ...context };
}

describe("tether CLI", () => {
  it("prints help and succeeds without arguments", async () => {
    const { run, out } = cli();

    expect(await run()).toBe(0);
    expect(out[0]?.startsWith("Usage: tether [options] [command]")).toBe(true);
  });

  it("prints the version", async () => {
    const { run, out } = cli();

    expect(await run("--version")).toBe(0);
    expect(out).toEqual([VERSION]);
  });

  it("fails on an unknown command", async () => {
    const { run, err } = cli();

    expect(await run("xyzzy")).toBe(1);
    expect(err[0]?.startsWith("error: unknown command 'xyzzy'")).toBe(true);
  });

  describe("start", () => {
    it("starts the worker", async () => {
      const { run, out, err } = cli();

      expect(await run("start", "ping")).toBe(0);
      expect(out).toEqual([
        "worker started (PID: 4000)",
        "Log output: memory://worker.log",
        "worker is running",
      ]);
      expect(err).toEqual([]);
    });

    it("passes everything before the prompt to the worker", async () => {
      const { run, table } = cli();

      await run("start", "--model", "opus", "-v", "ping");

      expect(table.launches[0]?.args).toEqual(["--model", "opus", "-v", "ping"]);
    });

    it("does not interpret --help after start", async () => {
      const { run, table } = cli();

      expect(await run("start", "--help", "ping")).toBe(0);
      expect(table.launches[0]?.args).toEqual(["--help", "ping"]);
    });

    it("requires a prompt", async () => {
      const { run, err, table } = cli();

      expect(await run("start")).toBe(1);
      expect(err).toEqual([
        "Error: start command requires a prompt",
        'Usage: tether start [flags...] "your prompt here"',
      ]);
      expect(table.launches).toHaveLength(0);
    });

    it("leaves a running worker alone", async () => {
      const { run, out, reset, table } = cli();
      await run("start", "ping");
      reset();

      expect(await run("start", "ping")).toBe(0);
      expect(out).toEqual([
        "worker is already running (PID: 4000)",
        "Use 'tether stop' to stop it first",
      ]);
      expect(table.launches).toHaveLength(1);
    });

    it("points at the log when the worker dies right away", async () => {
      const { run, out, table } = cli();
      table.behaveNext({ lifetimeMs: 100 });

      expect(await run("start", "ping")).toBe(1);
      expect(out).toEqual([
        "worker started (PID: 4000)",
        "Log output: memory://worker.log",
        "worker failed to start. Check log file:",
        "  tether log",
      ]);
    });

    it("propagates the build's exit code", async () => {
      const { run, err, tasks } = cli();
      tasks.exitWith("build", 2);

      expect(await run("start", "ping")).toBe(2);
      expect(err).toEqual(["Error: task 'build' failed with exit code 2"]);
    });

    it("reports a spawn failure", async () => {
      const { run, err, table } = cli();
      table.failNextLaunch(Object.assign(new Error("spawn worker EACCES"), { code: "EACCES" }));

      expect(await run("start", "ping")).toBe(1);
      expect(err).toEqual(["Error: Failed to start /opt/worker/bin/worker: spawn worker EACCES"]);
    });
  });

  describe("stop", () => {
    it("reports that nothing is running", async () => {
      const { run, out } = cli();

      expect(await run("stop")).toBe(0);
      expect(out).toEqual(["No running worker process found"]);
    });

    it("stops the worker", async () => {
      const { run, out, reset } = cli();
      await run("start", "ping");
      reset();

      expect(await run("stop")).toBe(0);
      expect(out).toEqual(["Stopping worker (PID: 4000)...", "worker stopped"]);
    });

    it("says when SIGKILL was needed", async () => {
      const { run, out, reset, table } = cli();
      table.behaveNext({ onTerm: "ignore" });
      await run("start", "ping");
      reset();

      expect(await run("stop")).toBe(0);
      expect(out).toEqual([
        "Stopping worker (PID: 4000)...",
        "worker killed after ignoring SIGTERM",
      ]);
    });

    it("fails when the worker survives SIGKILL", async () => {
      const { run, err, reset, table } = cli();
      table.behaveNext({ onTerm: "ignore", onKill: "ignore" });
      await run("start", "ping");
      reset();

      expect(await run("stop")).toBe(1);
      expect(err).toEqual([
        "Error: could not stop worker (PID: 4000): Process 4000 is still alive 15000ms after SIGTERM and SIGKILL",
      ]);
    });
  });

  describe("status", () => {
    it("reports a running worker", async () => {
      const { run, out, reset } = cli();
      await run("start", "ping");
      reset();

      expect(await run("status")).toBe(0);
      expect(out).toEqual(["worker is running (PID: 4000)", "  Logs: memory://worker.log"]);
    });

    it("reports a stopped worker", async () => {
      const { run, out } = cli();

      expect(await run("status")).toBe(0);
      expect(out).toEqual(["worker is not running"]);
    });
  });

  describe("log", () => {
    it("explains a missing log", async () => {
      const { run, out } = cli();

      expect(await run("log")).toBe(0);
      expect(out).toEqual(["No log file found", "Start worker first: tether start 'prompt'"]);
    });

    it("prints the log under a header", async () => {
      const { run, out, logs } = cli();
      logs.append("line one\nline two\n");

      expect(await run("log")).toBe(0);
      expect(out).toEqual(["=== Logs from memory://worker.log ===", "", "line one\nline two\n"]);
    });

    it("prints only the tail", async () => {
      const { run, out, logs } = cli();
      logs.append("line one\nline two\n");

      expect(await run("log", "--tail", "1")).toBe(0);
      expect(out[2]).toBe("line two");
    });

    it("rejects a tail that is not a positive integer", async () => {
      const { run, out } = cli();

      expect(await run("log", "--tail", "0")).toBe(1);
      expect(out).toEqual([]);
    });
  });

  describe("run", () => {
    it("uses the default prompt and returns the worker's exit code", async () => {
      const { run, table } = cli();
      table.exitForegroundWith(7);

      expect(await run("run")).toBe(7);
      expect(table.foregroundRuns[0]?.args).toEqual(["What is 2+2?"]);
    });

    it("passes flags and prompt through", async () => {
      const { run, table } = cli();

      expect(await run("run", "--json", "hello")).toBe(0);
      expect(table.foregroundRuns[0]?.args).toEqual(["--json", "hello"]);
    });
  });

  describe("clean", () => {
    it("removes the tracking files", async () => {
      const { run, out, logs } = cli();
      logs.append("old output\n");

      expect(await run("clean")).toBe(0);
      expect(out).toEqual(["Removed memory://worker.log", "Clean complete"]);
    });

    it("refuses while the worker runs", async () => {
      const { run, err, reset } = cli();
      await run("start", "ping");
      reset();

      expect(await run("clean")).toBe(1);
      expect(err).toEqual([
        "Error: worker is running (PID: 4000)",
        "Use 'tether stop' to stop it first",
      ]);
    });
  });

  describe("tasks", () => {
    it("runs a passthrough task", async () => {
      const { run, tasks } = cli();

      expect(await run("fmt")).toBe(0);
      expect(tasks.runs).toEqual(["fmt"]);
    });

    it("propagates a task's exit code", async () => {
      const { run, tasks } = cli();
      tasks.exitWith("test", 3);

      expect(await run("test")).toBe(3);
    });

    it("runs a configured task by name", async () => {
      const { run, tasks } = cli(createTestSupervisor({ configuredTasks: ["lint"] }));

      expect(await run("task", "lint")).toBe(0);
      expect(tasks.runs).toEqual(["lint"]);
    });

    it("rejects an unknown task", async () => {
      const { run, err } = cli();

      expect(await run("task", "deploy")).toBe(1);
      expect(err).toEqual(["Error: unknown task 'deploy'"]);
    });
  });

  describe("configuration", () => {
    it("hands --config to the loader", async () => {
      const { run, configPaths } = cli();

      await run("--config", "alt.json", "status");

      expect(configPaths).toEqual(["alt.json"]);
    });

    it("reports an invalid config", async () => {
      const err: string[] = [];
      const code = await runCli(["status"], {
        io: { out: () => undefined, err: (line) => err.push(line) },
        load: () => Err(new ConfigError("Config file not found: /srv/tether.json", "/srv/tether.json")),
      });

      expect(code).toBe(1);
      expect(err).toEqual(["Error: Config file not found: /srv/tether.json"]);
    });
  });
});
