import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { App } from "../app.js";
import type { Logger } from "../log/logger.js";

export const SERVER_NAME = "covctl";
export const SERVER_VERSION = "0.1.0";

/**
 * MCP server exposing the tool registry. Each `tools/call` answers with one
 * text item holding the JSON result or the `{ kind, message }` error.
 */
export function createMcpServer(app: App): Server {
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: app.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const outcome = await app.dispatcher.dispatch(request.params.name, request.params.arguments);
    const payload = outcome.ok ? outcome.result : outcome.error;
    return {
      content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
      isError: !outcome.ok,
    };
  });

  return server;
}

/** Serve over stdin/stdout until the client disconnects or a signal arrives. */
export async function serveStdio(app: App, log: Logger): Promise<void> {
  const server = createMcpServer(app);
  const transport = new StdioServerTransport();

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal });
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Shutdown failed", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  server.onerror = (err) => log.error("MCP transport error", err);
  await server.connect(transport);
  log.info("covctl MCP server listening on stdio", { tools: app.registry.names() });
}
