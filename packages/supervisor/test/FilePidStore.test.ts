import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FilePidStore, parsePid } from "../src/infrastructure/fs/FilePidStore.js";

describe("FilePidStore", () => {
  let dir: string;
  let path: string;
  let alive: Set<number>;
  let store: FilePidStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tether-pid-"));
    path = join(dir, ".worker.pid");
    alive = new Set();
    store = new FilePidStore(path, { isAlive: (pid) => alive.has(pid) });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads nothing when the file is missing", () => {
    expect(store.read()).toBeNull();
    expect(store.writtenAt()).toBeNull();
  });

  it("round-trips a live PID", () => {
    alive.add(4242);

    store.write(4242);

    expect(readFileSync(path, "utf-8")).toBe("4242");
    expect(store.read()).toBe(4242);
    expect(store.writtenAt()).toBeInstanceOf(Date);
  });

  it("ignores a PID whose process is gone", () => {
    store.write(4242);

    expect(store.read()).toBeNull();
    expect(store.readRecord()).toBe(4242);
  });

  it("tolerates surrounding whitespace", () => {
    alive.add(77);
    writeFileSync(path, "  77\n");

    expect(store.read()).toBe(77);
  });

  it("treats a corrupt record as absent", () => {
    writeFileSync(path, "not a pid");

    expect(store.read()).toBeNull();
  });

  it("creates missing parent directories", () => {
    const nested = new FilePidStore(join(dir, "state", "run", "worker.pid"), { isAlive: () => true });

    nested.write(10);

    expect(nested.read()).toBe(10);
  });

  it("clears the record, even twice", () => {
    store.write(4242);

    store.clear();
    store.clear();

    expect(existsSync(path)).toBe(false);
  });
});

describe("parsePid", () => {
  it("accepts positive integers", () => {
    expect(parsePid("1")).toBe(1);
    expect(parsePid("65535\n")).toBe(65535);
  });

  it("rejects everything else", () => {
    for (const text of ["", "0", "-5", "12.5", "1e3", "0x1f", "12 34", "99999999999999999999"]) {
      expect(parsePid(text)).toBeNull();
    }
  });
});
