/**
 * Test helpers: an in-process stand-in for backend MCP servers, reached
 * through an injected fetch, and small registry builders.
 */

import { z } from "zod";
import { vi, type Mock } from "vitest";
import type { StructuredLogger } from "../src/logging.js";
import { ProviderRegistry, type RegistryFile } from "../src/registry/provider-registry.js";

const RecordedBodySchema = z.object({
  jsonrpc: z.string(),
  id: z.union([z.string(), z.number()]),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

export interface RecordedCall {
  url: string;
  headers: Record<string, string>;
  body: z.infer<typeof RecordedBodySchema>;
}

export type BackendHandler = (call: RecordedCall) => Response | Promise<Response>;

export interface FakeBackends {
  fetch: typeof fetch;
  calls: RecordedCall[];
  /** Calls that went to the given URL */
  callsTo(url: string): RecordedCall[];
}

/**
 * Route fetch calls to per-URL handlers and record every request.
 * A URL without a handler rejects the way a refused connection does.
 */
export function createFakeBackends(handlers: Record<string, BackendHandler>): FakeBackends {
  const calls: RecordedCall[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;

    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const rawBody = init?.body;
    const body = RecordedBodySchema.parse(JSON.parse(typeof rawBody === "string" ? rawBody : "null"));
    const call: RecordedCall = { url, headers, body };
    calls.push(call);

    const handler = handlers[url];
    if (!handler) {
      throw new TypeError("fetch failed");
    }
    return handler(call);
  };

  return {
    fetch: fakeFetch,
    calls,
    callsTo: (url) => calls.filter((call) => call.url === url),
  };
}

/**
 * JSON-RPC success response echoing the request id
 */
export function rpcResult(
  call: RecordedCall,
  result: unknown,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify({ jsonrpc: "2.0", id: call.body.id, result }), {
    status: 200,
    headers: { "content-type": "application/json", ...headers },
  });
}

/**
 * JSON-RPC error response echoing the request id
 */
export function rpcError(call: RecordedCall, code: number, message: string): Response {
  return new Response(JSON.stringify({ jsonrpc: "2.0", id: call.body.id, error: { code, message } }), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

/**
 * Backend that answers initialize and tools/list with `tools`, and
 * tools/call with a text result naming the tool it ran.
 */
export function toolServer(
  tools: { name: string; description?: string }[],
  headers: Record<string, string> = {}
): BackendHandler {
  return (call) => {
    if (call.body.method === "tools/call") {
      const name = call.body.params?.["name"];
      return rpcResult(call, { content: [{ type: "text", text: `ran ${String(name)}` }] }, headers);
    }
    return rpcResult(call, { tools }, headers);
  };
}

export function makeRegistry(providers: RegistryFile["providers"]): ProviderRegistry {
  return ProviderRegistry.fromDocument({ providers });
}

export type SpyLogger = { [K in keyof StructuredLogger]: Mock<StructuredLogger[K]> };

export function createSpyLogger(): SpyLogger {
  return {
    debug: vi.fn<StructuredLogger["debug"]>(),
    info: vi.fn<StructuredLogger["info"]>(),
    warn: vi.fn<StructuredLogger["warn"]>(),
    error: vi.fn<StructuredLogger["error"]>(),
  };
}

export function sequentialIds(prefix = "sess"): () => string {
  let next = 0;
  return () => {
    next++;
    return `${prefix}-${String(next)}`;
  };
}

export const noSleep = (): Promise<void> => Promise.resolve();
