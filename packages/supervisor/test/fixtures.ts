import { Supervisor, type SupervisorOptions } from "../src/core/services/Supervisor.js";
import { Terminator, type TerminatorOptions } from "../src/core/services/Terminator.js";
import { FakeProcessTable } from "../src/infrastructure/memory/FakeProcessTable.js";
import { InMemoryBuildCollaborator } from "../src/infrastructure/memory/InMemoryBuildCollaborator.js";
import { InMemoryLogSink } from "../src/infrastructure/memory/InMemoryLogSink.js";
import { InMemoryPidStore } from "../src/infrastructure/memory/InMemoryPidStore.js";
import { ManualClock } from "../src/infrastructure/memory/ManualClock.js";

export const START_TIME = Date.UTC(2026, 0, 15, 9, 30, 0);

export interface TestSupervisorOptions {
  supervisor?: Partial<SupervisorOptions>;
  terminator?: TerminatorOptions;
  /** Task names present in the (fake) config */
  configuredTasks?: string[];
}

/**
 * Supervisor over in-memory adapters and a simulated process table.
 */
export function createTestSupervisor(options: TestSupervisorOptions = {}) {
  const clock = new ManualClock(START_TIME);
  const table = new FakeProcessTable(clock);
  const pids = new InMemoryPidStore(table);
  const logs = new InMemoryLogSink();
  const tasks = new InMemoryBuildCollaborator(options.configuredTasks);
  const terminator = new Terminator(table, table, clock, options.terminator);

  const supervisor = new Supervisor(
    { pids, logs, probe: table, launcher: table, terminator, tasks, clock },
    {
      name: "worker",
      binary: "/opt/worker/bin/worker",
      unsetEnv: "CLAUDECODE",
      defaultPrompt: "What is 2+2?",
      settleDelayMs: 2000,
      env: { PATH: "/usr/bin", HOME: "/home/test", CLAUDECODE: "1" },
      ...options.supervisor,
    }
  );

  return { supervisor, clock, table, pids, logs, tasks };
}
