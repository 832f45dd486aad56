import { randomUUID } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { MediationService } from "../services/mediation.service.js";
import { registerTools } from "./tools/index.js";

export const MCP_SERVER_INFO = { name: "shoal-mediator", version: "0.1.0" };

export function createMcpServer(service: MediationService): McpServer {
  const mcp = new McpServer(MCP_SERVER_INFO);
  registerTools(mcp, service);
  return mcp;
}

function sessionIdOf(request: FastifyRequest): string | undefined {
  const header = request.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

/**
 * Register MCP Streamable HTTP routes on the Fastify instance.
 * Handles POST (requests), GET (SSE stream), DELETE (session cleanup).
 */
export function registerMcpRoutes(app: FastifyInstance, service: MediationService) {
  /** Active MCP sessions keyed by session ID */
  const sessions = new Map<string, StreamableHTTPServerTransport>();

  app.addHook("onClose", async () => {
    for (const transport of sessions.values()) {
      await transport.close();
    }
    sessions.clear();
  });

  // ─── POST /mcp — Initialize or send requests ────────────
  app.post("/mcp", async (request, reply) => {
    const sessionId = sessionIdOf(request);
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    // Existing session — forward request
    if (existing) {
      reply.hijack();
      await existing.handleRequest(request.raw, reply.raw, request.body);
      return;
    }

    // New session — create transport + server
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    };

    const server = createMcpServer(service);
    await server.connect(transport);

    reply.hijack();
    await transport.handleRequest(request.raw, reply.raw, request.body);

    // Store session AFTER handleRequest — sessionId is assigned during initialize
    if (transport.sessionId) {
      sessions.set(transport.sessionId, transport);
      request.log.info({ mcp_session: transport.sessionId }, "mcp session opened");
    }
  });

  // ─── GET /mcp — SSE stream for server-initiated messages ─
  app.get("/mcp", async (request, reply) => {
    const sessionId = sessionIdOf(request);
    const transport = sessionId ? sessions.get(sessionId) : undefined;

    if (!transport) {
      return reply.status(400).send({ error: "Invalid or missing session ID" });
    }

    reply.hijack();
    await transport.handleRequest(request.raw, reply.raw);
  });

  // ─── DELETE /mcp — Terminate session ─────────────────────
  app.delete("/mcp", async (request, reply) => {
    const sessionId = sessionIdOf(request);
    const transport = sessionId ? sessions.get(sessionId) : undefined;

    if (sessionId && transport) {
      await transport.close();
      sessions.delete(sessionId);
    }

    return reply.status(200).send({ ok: true });
  });
}
