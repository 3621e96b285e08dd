import type { LogSession, LogSink } from "../../core/ports/LogSink.js";
import { sessionHeader } from "../fs/FileLogSink.js";
import { tailLines } from "../../output.js";

export class InMemoryLogSink implements LogSink {
  content: string | null = null;
  openSessions = 0;

  /** Written after the header of every session, as if by the worker */
  workerOutput = "";

  constructor(readonly path = "memory://worker.log") {}

  beginSession(name: string, startedAt: Date): LogSession {
    this.content = sessionHeader(name, startedAt) + this.workerOutput;
    this.openSessions++;
    let open = true;
    return {
      fd: -1,
      close: () => {
        if (!open) return;
        open = false;
        this.openSessions--;
      },
    };
  }

  /** Simulate worker output */
  append(text: string): void {
    this.content = (this.content ?? "") + text;
  }

  read(): string | null {
    return this.content;
  }

  tail(lines: number): string | null {
    return this.content === null ? null : tailLines(this.content, lines);
  }

  remove(): boolean {
    const existed = this.content !== null;
    this.content = null;
    return existed;
  }
}
