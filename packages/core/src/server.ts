/**
 * MCP server bootstrap.
 * Every tether MCP entry point goes through runServer so signal handling and
 * shutdown hooks behave the same.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Build the services the tools operate on */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs once on SIGTERM/SIGINT, before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create the server, register tools and connect it to stdio.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "tether", version: "0.1.0" },
 *   createServices: () => ({ supervisor }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await onShutdown?.(services);
      await server.close();
      process.exit(0);
    } catch (error: unknown) {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  await onStartup?.(services);

  await server.connect(transport);
  return server;
}

/**
 * bootstrapServer with a fatal-error exit. Preferred entry point for bins.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer };
