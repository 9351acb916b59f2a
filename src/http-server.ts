/**
 * HTTP surface of the gateway.
 *
 *   POST   /create-session      create a session bound to a set of providers
 *   POST   /session/:id/mcp     JSON-RPC endpoint for one session
 *   GET    /sessions/:id        session metadata (never credentials)
 *   DELETE /sessions/:id        delete a session
 *   GET    /health              liveness plus registry and session counts
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { z } from "zod";
import { GatewayError, errorMessage, isGatewayError } from "./errors.js";
import type { StructuredLogger } from "./logging.js";
import { errorResponse, type ProtocolHandler } from "./protocol-handler.js";
import type { ProviderRegistry } from "./registry/provider-registry.js";
import { CredentialMaterialSchema, type SessionStore } from "./session/session-store.js";

export const MAX_BODY_BYTES = 1024 * 1024;

const CreateSessionSchema = z.object({
  servers: z.array(z.string().min(1)).min(1),
  credentials: z.record(CredentialMaterialSchema).optional(),
});

/**
 * Dependencies for createGatewayServer
 */
export interface GatewayServerDeps {
  registry: ProviderRegistry;
  sessions: SessionStore;
  handler: ProtocolHandler;
  /** Logger for structured logging */
  logger?: StructuredLogger;
  /** Request body limit in bytes (default: 1 MiB) */
  maxBodyBytes?: number;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${String(limit)} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

const SESSION_MCP_PATH = /^\/session\/([^/]+)\/mcp$/;
const SESSION_PATH = /^\/sessions\/([^/]+)$/;

export function createGatewayServer(deps: GatewayServerDeps): Server {
  const { registry, sessions, handler, logger } = deps;
  const maxBodyBytes = deps.maxBodyBytes ?? MAX_BODY_BYTES;

  // ==================== Routes ====================

  const createSession = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const text = await readBody(req, maxBodyBytes);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      sendJson(res, 400, { error: "Request body is not valid JSON" });
      return;
    }

    const parsed = CreateSessionSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      sendJson(res, 400, {
        error: `Invalid create-session request: ${issue ? `${issue.path.join(".")} ${issue.message}` : "malformed"}`,
      });
      return;
    }

    try {
      const sessionId = await sessions.create(parsed.data.servers, parsed.data.credentials ?? {});
      sendJson(res, 201, {
        sessionId,
        mcpEndpoint: `/session/${sessionId}/mcp`,
        status: "created",
      });
    } catch (err) {
      if (isGatewayError(err) && (err.kind === "UnknownProvider" || err.kind === "InvalidRequest")) {
        sendJson(res, 400, { error: err.message, kind: err.kind, ...err.data });
        return;
      }
      throw err;
    }
  };

  const sessionMcp = async (
    sessionId: string,
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> => {
    const text = await readBody(req, maxBodyBytes);

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      sendJson(res, 200, errorResponse(null, new GatewayError("ParseError", "Parse error")));
      return;
    }

    const response = await handler.handle(sessionId, body);
    if (response === null) {
      res.writeHead(202);
      res.end();
      return;
    }
    sendJson(res, 200, response);
  };

  const getSession = (sessionId: string, res: ServerResponse): void => {
    if (!sessions.has(sessionId)) {
      sendJson(res, 404, { error: "Session not found" });
      return;
    }
    const binding = sessions.get(sessionId);
    sendJson(res, 200, {
      id: binding.id,
      servers: binding.providers,
      createdAt: binding.createdAt.toISOString(),
    });
  };

  const deleteSession = async (sessionId: string, res: ServerResponse): Promise<void> => {
    await sessions.delete(sessionId);
    res.writeHead(204);
    res.end();
  };

  const health = (res: ServerResponse): void => {
    sendJson(res, 200, {
      status: "ok",
      providers: registry.size,
      sessions: sessions.size,
    });
  };

  // ==================== Dispatch ====================

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const host = req.headers.host ?? "localhost";
    const url = new URL(req.url ?? "/", `http://${host}`);
    const method = req.method ?? "GET";

    if (url.pathname === "/create-session") {
      if (method !== "POST") return methodNotAllowed(res, "POST");
      return createSession(req, res);
    }

    if (url.pathname === "/health") {
      if (method !== "GET") return methodNotAllowed(res, "GET");
      return health(res);
    }

    const mcpMatch = SESSION_MCP_PATH.exec(url.pathname);
    if (mcpMatch?.[1] !== undefined) {
      if (method !== "POST") return methodNotAllowed(res, "POST");
      const sessionId = decodePathSegment(mcpMatch[1]);
      if (sessionId === undefined) return malformedSessionId(res);
      return sessionMcp(sessionId, req, res);
    }

    const sessionMatch = SESSION_PATH.exec(url.pathname);
    if (sessionMatch?.[1] !== undefined) {
      const sessionId = decodePathSegment(sessionMatch[1]);
      if (sessionId === undefined) return malformedSessionId(res);
      if (method === "GET") return getSession(sessionId, res);
      if (method === "DELETE") return deleteSession(sessionId, res);
      return methodNotAllowed(res, "GET, DELETE");
    }

    sendJson(res, 404, { error: "Not found" });
  };

  return createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      if (err instanceof PayloadTooLargeError) {
        sendJson(res, 413, { error: err.message });
        return;
      }
      logger?.error("http_request_failed", {
        method: req.method,
        url: req.url,
        error: errorMessage(err),
      });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.end();
      }
    });
  });
}

function decodePathSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
}

function malformedSessionId(res: ServerResponse): void {
  sendJson(res, 400, { error: "Malformed session id in path" });
}

function methodNotAllowed(res: ServerResponse, allow: string): void {
  res.setHeader("Allow", allow);
  sendJson(res, 405, { error: "Method not allowed" });
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      reject(new PayloadTooLargeError(limit));
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > limit) {
        // Drain the rest without buffering it
        req.off("data", onData);
        req.resume();
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    };

    req.on("data", onData);
    req.on("end", () => {
      resolve(Buffer.concat(chunks).toString("utf-8"));
    });
    req.on("error", reject);
  });
}
