/**
 * Worker log file: truncated with a header at each session start, then
 * appended to by the worker through an inherited descriptor.
 */

import {
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";

import type { LogSession, LogSink } from "../../core/ports/LogSink.js";
import { errorCode } from "../../core/ports/ProcessLauncher.js";
import { tailLines } from "../../output.js";

export class FileLogSink implements LogSink {
  constructor(readonly path: string) {}

  beginSession(name: string, startedAt: Date): LogSession {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, sessionHeader(name, startedAt));

    const fd = openSync(this.path, "a");
    let open = true;
    return {
      fd,
      close: () => {
        if (!open) return;
        open = false;
        closeSync(fd);
      },
    };
  }

  /**
   * Decoded as UTF-8; invalid byte sequences become U+FFFD.
   */
  read(): string | null {
    let bytes: Buffer;
    try {
      bytes = readFileSync(this.path);
    } catch (error) {
      if (errorCode(error) === "ENOENT") return null;
      throw error;
    }
    return bytes.toString("utf-8");
  }

  tail(lines: number): string | null {
    const content = this.read();
    return content === null ? null : tailLines(content, lines);
  }

  remove(): boolean {
    const existed = existsSync(this.path);
    rmSync(this.path, { force: true });
    return existed;
  }
}

/**
 * `=== <name> started at YYYY-MM-DD HH:MM:SS ===` and a blank line.
 */
export function sessionHeader(name: string, startedAt: Date): string {
  return `=== ${name} started at ${formatLocalTimestamp(startedAt)} ===\n\n`;
}

export function formatLocalTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
