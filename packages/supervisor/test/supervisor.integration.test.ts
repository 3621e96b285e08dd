import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { resolveConfig, type SupervisorConfig } from "../src/config.js";
import type { Supervisor } from "../src/core/services/Supervisor.js";
import { createSupervisor } from "../src/factory.js";

const WORKER = [
  "console.log('prompt: ' + process.argv[process.argv.length - 1]);",
  "console.log('CLAUDECODE: ' + (process.env.CLAUDECODE ?? 'unset'));",
  "setInterval(() => {}, 1000);",
].join(" ");

describe.skipIf(process.platform === "win32")("Supervisor with real processes", () => {
  let dir: string;
  let config: SupervisorConfig;
  let supervisor: Supervisor;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tether-e2e-"));
    config = resolveConfig(
      {
        binary: process.execPath,
        settleDelayMs: 1000,
        gracefulTimeoutMs: 3000,
        forcefulTimeoutMs: 2000,
        pollIntervalMs: 50,
      },
      { cwd: dir, env: {} }
    );
    supervisor = createSupervisor(config, {
      taskOutput: "stderr",
      env: { ...process.env, CLAUDECODE: "1" },
    });
  });

  afterEach(async () => {
    await supervisor.stop();
    rmSync(dir, { recursive: true, force: true });
  });

  async function waitForLog(text: string): Promise<string> {
    for (let i = 0; i < 100; i++) {
      const snapshot = supervisor.log();
      if (snapshot.available && snapshot.content.includes(text)) return snapshot.content;
      await delay(50);
    }
    throw new Error(`Log never contained ${JSON.stringify(text)}`);
  }

  it("starts, reports, and stops a single instance", async () => {
    const started = await supervisor.start({ prompt: "ping", flags: ["-e", WORKER] });
    expect(started.ok && started.value.kind).toBe("started");
    if (!started.ok) return;
    const { pid } = started.value.process;

    expect(existsSync(config.pidFile)).toBe(true);
    expect(supervisor.status()).toMatchObject({ state: "running", process: { pid } });

    const content = await waitForLog("CLAUDECODE: ");
    expect(content.startsWith("=== worker started at ")).toBe(true);
    expect(content).toContain("prompt: ping\n");
    expect(content).toContain("CLAUDECODE: unset\n");

    const again = await supervisor.start({ prompt: "pong", flags: ["-e", WORKER] });
    expect(again.ok && again.value.kind).toBe("already-running");

    const stopped = await supervisor.stop();
    expect(stopped).toEqual({ ok: true, value: { kind: "stopped", pid, outcome: "stopped" } });
    expect(existsSync(config.pidFile)).toBe(false);
    expect(supervisor.status().state).toBe("not-running");
  });

  it("reports a worker that exits during the settle delay", async () => {
    const started = await supervisor.start({
      prompt: "ping",
      flags: ["-e", "console.error('bad flag'); process.exit(2)"],
    });

    expect(started.ok && started.value.kind).toBe("exited-early");
    expect(supervisor.status().state).toBe("not-running");
    expect(await waitForLog("bad flag")).toContain("bad flag\n");
  });

  it("fails to start a missing binary without writing a PID record", async () => {
    const missing = createSupervisor(
      resolveConfig({ binary: "no-such-worker" }, { cwd: dir, env: {} }),
      { taskOutput: "stderr" }
    );

    const started = await missing.start({ prompt: "ping", flags: [] });

    expect(started.ok).toBe(false);
    if (started.ok) return;
    expect(started.error).toMatchObject({ kind: "spawn-failed", code: "ENOENT" });
    expect(existsSync(config.pidFile)).toBe(false);
  });
});
