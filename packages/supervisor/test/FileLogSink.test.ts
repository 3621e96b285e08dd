import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync, writeSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLogSink, formatLocalTimestamp, sessionHeader } from "../src/infrastructure/fs/FileLogSink.js";

describe("FileLogSink", () => {
  let dir: string;
  let sink: FileLogSink;
  const startedAt = new Date(2026, 2, 5, 7, 8, 9);

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tether-log-"));
    sink = new FileLogSink(join(dir, ".worker.log"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads nothing before the first session", () => {
    expect(sink.read()).toBeNull();
    expect(sink.tail(10)).toBeNull();
  });

  it("writes the header and appends through the session descriptor", () => {
    const session = sink.beginSession("worker", startedAt);
    writeSync(session.fd, "hello\n");
    session.close();

    expect(sink.read()).toBe("=== worker started at 2026-03-05 07:08:09 ===\n\nhello\n");
  });

  it("truncates the previous session", () => {
    const first = sink.beginSession("worker", startedAt);
    writeSync(first.fd, "first run\n");
    first.close();

    sink.beginSession("worker", startedAt).close();

    expect(sink.read()).toBe(sessionHeader("worker", startedAt));
  });

  it("closes a session only once", () => {
    const session = sink.beginSession("worker", startedAt);

    session.close();

    expect(() => session.close()).not.toThrow();
  });

  it("returns the last lines", () => {
    writeFileSync(sink.path, "a\nb\nc\n");

    expect(sink.tail(2)).toBe("b\nc");
  });

  it("replaces undecodable bytes", () => {
    writeFileSync(sink.path, Buffer.from([0x6f, 0x6b, 0xff, 0x0a]));

    expect(sink.read()).toBe("ok\uFFFD\n");
  });

  it("removes the log and reports whether it existed", () => {
    sink.beginSession("worker", startedAt).close();

    expect(sink.remove()).toBe(true);
    expect(existsSync(sink.path)).toBe(false);
    expect(sink.remove()).toBe(false);
  });

  it("creates the log directory", () => {
    const nested = new FileLogSink(join(dir, "logs", "worker.log"));

    nested.beginSession("worker", startedAt).close();

    expect(nested.read()).toBe(sessionHeader("worker", startedAt));
  });
});

describe("formatLocalTimestamp", () => {
  it("pads every field", () => {
    expect(formatLocalTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("2026-01-02 03:04:05");
  });
});
