import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { describe, expect, it } from "vitest";
import { BackendClient } from "../src/backend/backend-client.js";
import { RetryPolicy } from "../src/backend/retry-policy.js";
import { Multiplexer } from "../src/multiplexer.js";
import { GATEWAY_NAME, GATEWAY_VERSION, ProtocolHandler } from "../src/protocol-handler.js";
import { NameMapper } from "../src/session/name-mapper.js";
import { MemorySessionPersistence } from "../src/session/persistence.js";
import { SessionStore } from "../src/session/session-store.js";
import {
  createFakeBackends,
  createSpyLogger,
  makeRegistry,
  noSleep,
  rpcError,
  sequentialIds,
  toolServer,
  type BackendHandler,
} from "./helpers.js";

const ALPHA = "http://alpha.test/mcp";
const BETA = "http://beta.test/mcp";

const registry = makeRegistry({
  alpha: { url: ALPHA },
  beta: { url: BETA },
});

class ExplodingMultiplexer extends Multiplexer {
  public override dispatch(): Promise<unknown> {
    return Promise.reject(new Error("boom"));
  }
}

async function setup(
  handlers: Record<string, BackendHandler> = {
    [ALPHA]: toolServer([{ name: "search" }]),
    [BETA]: toolServer([{ name: "search" }, { name: "fetch" }]),
  },
  MultiplexerClass: typeof Multiplexer = Multiplexer
) {
  const backends = createFakeBackends(handlers);
  const logger = createSpyLogger();
  const sessions = new SessionStore({
    registry,
    persistence: new MemorySessionPersistence(),
    generateId: sequentialIds(),
  });
  const multiplexer = new MultiplexerClass({
    sessions,
    registry,
    names: new NameMapper(),
    backend: new BackendClient({
      fetch: backends.fetch,
      retryPolicy: new RetryPolicy({ maxAttempts: 1 }, { sleep: noSleep }),
    }),
  });
  const handler = new ProtocolHandler({ sessions, multiplexer, logger });
  const sessionId = await sessions.create(["alpha", "beta"]);
  return { backends, handler, logger, sessionId };
}

describe("ProtocolHandler", () => {
  it("answers initialize with the merged catalog and gateway identity", async () => {
    const { handler, sessionId } = await setup();

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 1,
      method: "initialize",
      params: { protocolVersion: "2025-03-26", capabilities: {} },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2025-03-26",
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: GATEWAY_NAME, version: GATEWAY_VERSION },
        tools: [{ name: "alpha.search" }, { name: "beta.search" }, { name: "beta.fetch" }],
        providers: [
          { provider: "alpha", status: "ok", toolCount: 1 },
          { provider: "beta", status: "ok", toolCount: 2 },
        ],
      },
    });
  });

  it("falls back to the latest protocol version", async () => {
    const { handler, sessionId } = await setup();

    const response = await handler.handle(sessionId, { jsonrpc: "2.0", id: "init", method: "initialize" });

    expect(response && "result" in response ? response.result : undefined).toMatchObject({
      protocolVersion: LATEST_PROTOCOL_VERSION,
    });
  });

  it("lists tools", async () => {
    const { handler, sessionId } = await setup();

    const response = await handler.handle(sessionId, { jsonrpc: "2.0", id: 2, method: "tools/list" });

    expect(response).toMatchObject({
      id: 2,
      result: { tools: [{ name: "alpha.search" }, { name: "beta.search" }, { name: "beta.fetch" }] },
    });
  });

  it("calls a tool by its public name", async () => {
    const { handler, sessionId, backends } = await setup();
    await handler.handle(sessionId, { jsonrpc: "2.0", id: 1, method: "initialize" });

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 3,
      method: "tools/call",
      params: { name: "beta.fetch", arguments: { url: "https://example.test" } },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 3,
      result: { content: [{ type: "text", text: "ran fetch" }] },
    });
    expect(backends.callsTo(ALPHA).map((call) => call.body.method)).toEqual(["initialize"]);
  });

  it("forwards other tools/call params alongside the native name", async () => {
    const { handler, sessionId, backends } = await setup();
    await handler.handle(sessionId, { jsonrpc: "2.0", id: 1, method: "initialize" });

    await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 4,
      method: "tools/call",
      params: { name: "beta.fetch", arguments: { url: "https://example.test" }, _meta: { progressToken: "tok-1" } },
    });

    const call = backends.callsTo(BETA).find((recorded) => recorded.body.method === "tools/call");
    expect(call?.body.params).toEqual({
      name: "fetch",
      arguments: { url: "https://example.test" },
      _meta: { progressToken: "tok-1" },
    });
  });

  it("passes a backend error through with its own code", async () => {
    const { handler, sessionId } = await setup({
      [ALPHA]: (call) =>
        call.body.method === "tools/call"
          ? rpcError(call, -32050, "quota exceeded")
          : toolServer([{ name: "search" }])(call),
    });
    await handler.handle(sessionId, { jsonrpc: "2.0", id: 1, method: "initialize" });

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 4,
      method: "tools/call",
      params: { name: "alpha.search" },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 4,
      error: { code: -32050, message: "quota exceeded", data: { kind: "BackendError", provider: "alpha" } },
    });
  });

  it("rejects tools/call without a name", async () => {
    const { handler, sessionId } = await setup();

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 5,
      method: "tools/call",
      params: { arguments: {} },
    });

    expect(response).toMatchObject({ id: 5, error: { code: -32602, data: { kind: "InvalidParams" } } });
  });

  it("rejects an unknown tool name", async () => {
    const { handler, sessionId } = await setup();
    await handler.handle(sessionId, { jsonrpc: "2.0", id: 1, method: "initialize" });

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 6,
      method: "tools/call",
      params: { name: "alpha.nope" },
    });

    expect(response).toMatchObject({
      id: 6,
      error: {
        code: -32602,
        message: "Unknown tool: alpha.nope. Tool may not exist or session may need reinitialization.",
        data: { kind: "UnknownCapability", capability: "alpha.nope" },
      },
    });
  });

  it("answers ping locally", async () => {
    const { handler, sessionId, backends } = await setup();

    expect(await handler.handle(sessionId, { jsonrpc: "2.0", id: 7, method: "ping" })).toEqual({
      jsonrpc: "2.0",
      id: 7,
      result: {},
    });
    expect(backends.calls).toHaveLength(0);
  });

  it("reports unknown methods", async () => {
    const { handler, sessionId } = await setup();

    const response = await handler.handle(sessionId, { jsonrpc: "2.0", id: 8, method: "resources/list" });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 8,
      error: {
        code: -32601,
        message: "Method not found: resources/list",
        data: { kind: "MethodNotFound", method: "resources/list" },
      },
    });
  });

  it("acknowledges notifications without a body", async () => {
    const { handler, sessionId, backends } = await setup();

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      method: "notifications/initialized",
    });

    expect(response).toBeNull();
    expect(backends.calls).toHaveLength(0);
  });

  it("rejects malformed requests and echoes a usable id", async () => {
    const { handler, sessionId } = await setup();

    const response = await handler.handle(sessionId, { jsonrpc: "1.0", id: 9, method: "ping" });

    expect(response).toMatchObject({ jsonrpc: "2.0", id: 9, error: { code: -32600, data: { kind: "InvalidRequest" } } });
  });

  it("uses a null id when the request has none worth echoing", async () => {
    const { handler, sessionId } = await setup();

    expect(await handler.handle(sessionId, [1, 2])).toMatchObject({ id: null, error: { code: -32600 } });
    expect(await handler.handle(sessionId, { id: { nested: true } })).toMatchObject({ id: null });
  });

  it("reports unknown sessions", async () => {
    const { handler } = await setup();

    const response = await handler.handle("missing", { jsonrpc: "2.0", id: 10, method: "ping" });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 10,
      error: { code: -32000, message: "Unknown session missing", data: { kind: "SessionNotFound", sessionId: "missing" } },
    });
  });

  it("turns unexpected failures into internal errors", async () => {
    const { handler, sessionId, logger } = await setup(undefined, ExplodingMultiplexer);

    const response = await handler.handle(sessionId, {
      jsonrpc: "2.0",
      id: 11,
      method: "tools/call",
      params: { name: "alpha.search" },
    });

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 11,
      error: { code: -32603, message: "Internal error", data: { kind: "InternalError" } },
    });
    expect(logger.error).toHaveBeenCalledWith("request_failed", {
      sessionId,
      method: "tools/call",
      error: "boom",
    });
  });
});
