/**
 * Protocol Handler
 *
 * Turns one inbound JSON-RPC message on a session endpoint into at most one
 * JSON-RPC response. Never throws: every failure becomes an error object.
 */

import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import type { RequestId } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { GatewayError, errorMessage, isGatewayError } from "./errors.js";
import type { StructuredLogger } from "./logging.js";
import type { Multiplexer } from "./multiplexer.js";
import type { SessionStore } from "./session/session-store.js";
import type { JsonRpcResponseMessage } from "./types.js";

export const GATEWAY_NAME = "mcp-multiplexer";
export const GATEWAY_VERSION = "0.1.0";

const RequestIdSchema = z.union([z.string(), z.number().int()]);

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: RequestIdSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const ToolCallParamsSchema = z
  .object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()).optional(),
  })
  .passthrough();

type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

/**
 * Configuration for ProtocolHandler
 */
export interface ProtocolHandlerConfig {
  sessions: SessionStore;
  multiplexer: Multiplexer;
  /** Logger for structured logging */
  logger?: StructuredLogger;
}

export class ProtocolHandler {
  private readonly sessions: SessionStore;
  private readonly multiplexer: Multiplexer;
  private readonly logger?: StructuredLogger;

  constructor(config: ProtocolHandlerConfig) {
    this.sessions = config.sessions;
    this.multiplexer = config.multiplexer;
    this.logger = config.logger;
  }

  /**
   * Handle one message. Returns null for notifications, which get no body.
   */
  public async handle(sessionId: string, body: unknown): Promise<JsonRpcResponseMessage | null> {
    const parsed = JsonRpcRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return errorResponse(
        echoableId(body),
        new GatewayError(
          "InvalidRequest",
          `Invalid JSON-RPC request: ${issue ? `${issue.path.join(".") || "message"} ${issue.message}` : "malformed"}`
        )
      );
    }

    const request = parsed.data;
    const id = request.id ?? null;

    try {
      this.sessions.get(sessionId);

      if (request.id === undefined) {
        this.logger?.debug("notification_received", { sessionId, method: request.method });
        return null;
      }

      const result = await this.route(sessionId, request);
      return { jsonrpc: "2.0", id, result };
    } catch (err) {
      if (isGatewayError(err)) {
        if (request.id === undefined) {
          // Notifications only hear back about a missing session
          return err.kind === "SessionNotFound" ? errorResponse(null, err) : null;
        }
        return errorResponse(id, err);
      }

      this.logger?.error("request_failed", {
        sessionId,
        method: request.method,
        error: errorMessage(err),
      });
      return errorResponse(id, new GatewayError("InternalError", "Internal error", { cause: err }));
    }
  }

  // ==================== Routing ====================

  private async route(sessionId: string, request: JsonRpcRequest): Promise<unknown> {
    switch (request.method) {
      case "initialize": {
        const catalog = await this.multiplexer.initialize(sessionId, request.params ?? {});
        const requested = request.params?.["protocolVersion"];
        return {
          protocolVersion: typeof requested === "string" ? requested : LATEST_PROTOCOL_VERSION,
          capabilities: { tools: { listChanged: false } },
          serverInfo: { name: GATEWAY_NAME, version: GATEWAY_VERSION },
          tools: catalog.tools,
          providers: catalog.providers,
        };
      }

      case "tools/list":
        return this.multiplexer.listTools(sessionId);

      case "tools/call": {
        const params = ToolCallParamsSchema.safeParse(request.params ?? {});
        if (!params.success) {
          const issue = params.error.issues[0];
          throw new GatewayError(
            "InvalidParams",
            `Invalid tools/call params: ${issue ? `${issue.path.join(".")} ${issue.message}` : "malformed"}`
          );
        }
        const { name, arguments: args, ...extraParams } = params.data;
        return this.multiplexer.dispatch(sessionId, name, args ?? {}, extraParams);
      }

      case "ping":
        return {};

      default:
        throw new GatewayError("MethodNotFound", `Method not found: ${request.method}`, {
          data: { method: request.method },
        });
    }
  }
}

export function errorResponse(id: RequestId | null, err: GatewayError): JsonRpcResponseMessage {
  return { jsonrpc: "2.0", id, error: err.toJsonRpcError() };
}

function echoableId(body: unknown): RequestId | null {
  if (typeof body !== "object" || body === null || !("id" in body)) {
    return null;
  }
  const parsed = RequestIdSchema.safeParse(body.id);
  return parsed.success ? parsed.data : null;
}
