export {
  Ok,
  Err,
  map,
  mapErr,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

export { textResponse, errorResponse, resultToResponse } from "./mcp.js";
export type { CallToolResult } from "./mcp.js";

export { bootstrapServer, runServer, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
