/**
 * MCP Server bootstrap utilities.
 * One stdio server per analysis package, all started the same way.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  /** Server name and version configuration */
  config: ServerConfig;

  /** Factory function to create services */
  createServices: () => S;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Optional callback when server is shutting down (close store handles here) */
  onShutdown?: (services: S) => void;
}

/**
 * Create services, register tools, wire signal handlers and connect stdio.
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onShutdown } = options;

  const services = createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await server.connect(transport);
  console.error(`[${config.name}] Listening on stdio (v${config.version})`);
}

/**
 * Run bootstrapServer with standard error handling.
 *
 * @example
 * ```typescript
 * runServer({
 *   config: { name: "codepulse:graph", version: "0.1.0" },
 *   createServices: () => ({ graph: new GraphService(openRelationshipStore(dbPath)) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
