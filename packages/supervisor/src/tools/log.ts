import * as z from "zod/v4";

import { textResponse, type CallToolResult } from "@tether/core";

import type { Supervisor } from "../core/services/Supervisor.js";
import { cleanOutput } from "../output.js";
import type { ToolRegistrar } from "./types.js";

export const DEFAULT_TAIL = 100;
export const MAX_TAIL = 5000;

export interface WorkerLogInput {
  tail?: number;
}

export function handleWorkerLog(supervisor: Supervisor, input: WorkerLogInput): CallToolResult {
  const snapshot = supervisor.log({ tail: Math.min(input.tail ?? DEFAULT_TAIL, MAX_TAIL) });
  if (!snapshot.available) {
    return textResponse(`No log file found at ${snapshot.path}`);
  }

  const state = supervisor.status().state === "running" ? "[running]" : "[not running]";
  const output = cleanOutput(snapshot.content);
  return textResponse(`${state}\n${output || "(no output)"}`);
}

export const registerWorkerLog: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_log",
    {
      title: "Worker log",
      description: `Read the worker's recent output (stdout and stderr merged).

The log is reset on every start and begins with a header naming the start time.
Terminal colors and progress redraws are removed.`,
      inputSchema: {
        tail: z
          .number()
          .int()
          .positive()
          .optional()
          .describe(`Lines to return (default: ${DEFAULT_TAIL}, max: ${MAX_TAIL})`),
      },
    },
    (input: WorkerLogInput) => handleWorkerLog(supervisor, input)
  );
};
