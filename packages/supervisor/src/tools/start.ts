import * as z from "zod/v4";

import { errorResponse, resultToResponse, type CallToolResult } from "@tether/core";

import type { StartResult } from "../core/model.js";
import type { Supervisor } from "../core/services/Supervisor.js";
import { describeError } from "../format.js";
import { cleanOutput } from "../output.js";
import type { ToolRegistrar } from "./types.js";

/** Log lines included when the worker dies during the settle delay */
const EARLY_EXIT_LOG_LINES = 20;

export interface WorkerStartInput {
  prompt: string;
  flags?: string[];
}

export async function handleWorkerStart(
  supervisor: Supervisor,
  input: WorkerStartInput
): Promise<CallToolResult> {
  if (input.prompt.trim() === "") {
    return errorResponse("prompt must not be empty");
  }

  const result = await supervisor.start({ prompt: input.prompt, flags: input.flags ?? [] });
  if (result.ok && result.value.kind === "exited-early") {
    return errorResponse(earlyExitMessage(supervisor, result.value.process.pid));
  }
  return resultToResponse(
    result,
    (outcome) => formatStart(supervisor.name, outcome),
    (error) => describeError(supervisor.name, error)
  );
}

function formatStart(name: string, outcome: StartResult): string {
  const { pid, logPath } = outcome.process;
  switch (outcome.kind) {
    case "already-running":
      return `${name} is already running (PID: ${pid}). Use worker_stop to stop it first.`;
    case "started":
    case "exited-early":
      return `${name} started (PID: ${pid})\nLog output: ${logPath}`;
  }
}

function earlyExitMessage(supervisor: Supervisor, pid: number): string {
  const lines = [`${supervisor.name} (PID: ${pid}) exited right after starting.`];
  const snapshot = supervisor.log({ tail: EARLY_EXIT_LOG_LINES });
  if (snapshot.available) {
    lines.push(`Last lines of ${snapshot.path}:`, cleanOutput(snapshot.content));
  }
  return lines.join("\n");
}

export const registerWorkerStart: ToolRegistrar = (server, { supervisor }) => {
  server.registerTool(
    "worker_start",
    {
      title: "Start worker",
      description: `Build and start the worker in the background with a prompt.

Only one instance runs at a time; if one is already running this reports its PID and does nothing.
Output goes to the log file; read it with worker_log.`,
      inputSchema: {
        prompt: z.string().min(1).describe("Prompt passed to the worker as its last argument"),
        flags: z
          .array(z.string())
          .optional()
          .describe("Extra worker arguments placed before the prompt, passed verbatim"),
      },
    },
    (input: WorkerStartInput) => handleWorkerStart(supervisor, input)
  );
};
