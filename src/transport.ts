import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { LOG_PREFIX } from "./constants.ts";
import { describeCause } from "./errors.ts";
import { createMcpServer, type ServerOptions } from "./server.ts";
import type { CardStore } from "./store.ts";

/**
 * Start the stdio transport. Connects a dedicated McpServer to stdin/stdout.
 * All logging must go to stderr since stdout is the JSON-RPC channel.
 */
export async function startStdioTransport(store: CardStore, options: ServerOptions): Promise<void> {
  const server = createMcpServer(store, options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${LOG_PREFIX} stdio transport connected`);
}

async function handleHttpRequest(
  store: CardStore,
  options: ServerOptions,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");

  if (url.pathname !== "/mcp") {
    res.writeHead(404).end("Not Found");
    return;
  }

  // Stateless mode: new transport + server per request, one shared store
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });
  const server = createMcpServer(store, options);

  res.on("close", () => {
    server.close().catch((err: unknown) => {
      console.error(`${LOG_PREFIX} Failed to close request server: ${describeCause(err)}`);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Start the HTTP transport on Node's http module using the streamable
 * HTTP transport from the MCP SDK, served at /mcp. Resolves once the port
 * is bound; a failure to bind (port in use, no permission) rejects.
 */
export function startHttpTransport(store: CardStore, options: ServerOptions, port: number): Promise<Server> {
  const httpServer = createServer((req, res) => {
    handleHttpRequest(store, options, req, res).catch((err: unknown) => {
      console.error(`${LOG_PREFIX} HTTP request failed: ${describeCause(err)}`);
      if (!res.headersSent) {
        res.writeHead(500).end("Internal Server Error");
      }
    });
  });

  return new Promise<Server>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, () => {
      httpServer.off("error", reject);
      httpServer.on("error", (err) => {
        console.error(`${LOG_PREFIX} HTTP server error: ${describeCause(err)}`);
      });
      console.error(`${LOG_PREFIX} HTTP transport listening on port ${port}`);
      resolve(httpServer);
    });
  });
}
