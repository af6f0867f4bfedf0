/**
 * Streamable HTTP transport.
 *
 * Session model: a client POSTs an `initialize` request to /mcp without an
 * `mcp-session-id` header; a new transport + MCP Server pair is created and
 * the SDK returns the generated session id. Later requests (POST, GET for the
 * event stream, DELETE for teardown) must carry that header.
 *
 * Endpoints:
 *  - POST   /mcp    JSON-RPC requests
 *  - GET    /mcp    server-to-client stream for an existing session
 *  - DELETE /mcp    session teardown
 *  - GET    /health status snapshot from `statusManager`
 *
 * DNS rebinding protection is on unless ENABLE_DNS_REBINDING_PROTECTION=false;
 * allowed hosts default to the local listener (override with ALLOWED_HOSTS).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { statusManager } from "../status";

export interface HttpOptions {
  port: number;
  host: string;
}

function sessionIdOf(req: express.Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

/** Build the Express app; exported separately from listening for reuse. */
export function createHttpApp(createServer: () => Server, { port, host }: HttpOptions): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const allowedHosts = (
    process.env.ALLOWED_HOSTS ??
    ["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`].join(",")
  )
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  const transports = new Map<string, StreamableHTTPServerTransport>();

  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid) => {
        transports.set(sid, transport);
      },
      enableDnsRebindingProtection: (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
      allowedHosts,
    });
    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      // server.close() closes the transport again; guard against re-entry.
      if (closing) return;
      closing = true;
      if (transport.sessionId) transports.delete(transport.sessionId);
      server.close().catch((e: unknown) => console.error("[RAG] Error closing MCP session:", e));
    };
    await server.connect(transport);
    return transport;
  }

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
      }
      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  return app;
}

/** Start listening; resolves once the port is bound. */
export async function startHttpTransport(createServer: () => Server, opts: HttpOptions): Promise<void> {
  const app = createHttpApp(createServer, opts);
  await new Promise<void>((resolve) => {
    app.listen(opts.port, opts.host, () => {
      console.error(`[RAG] Streamable HTTP listening at http://${opts.host}:${opts.port}/mcp`);
      resolve();
    });
  });
}
