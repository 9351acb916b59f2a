/**
 * Shared types for the MCP multiplexing gateway
 */

import type { RequestId } from "@modelcontextprotocol/sdk/types.js";
import type { JsonRpcErrorObject } from "./errors.js";

/**
 * How outbound calls to a provider are authenticated.
 * Adding an auth kind means adding a variant here.
 */
export type ProviderAuth =
  | { kind: "none" }
  | { kind: "bearer" }
  | { kind: "api-key"; headerName: string };

/**
 * A backend MCP server as loaded from the registry
 */
export interface ProviderBinding {
  /** Registry key; unique across the registry */
  name: string;
  /** HTTP URL of the provider's JSON-RPC endpoint */
  url: string;
  auth: ProviderAuth;
  /** Static headers sent on every call to this provider */
  extraHeaders: Readonly<Record<string, string>>;
  /** Response headers to capture from fan-out calls and replay on later calls */
  persistResponseHeaders: readonly string[];
}

/**
 * Session-supplied credentials for one provider
 */
export interface CredentialMaterial {
  token?: string;
  key?: string;
}

/**
 * The durable association between a session and its providers
 */
export interface SessionBinding {
  id: string;
  /** Bound providers, in the order the client listed them */
  providers: readonly string[];
  credentials: Readonly<Record<string, CredentialMaterial>>;
  createdAt: Date;
}

/**
 * A capability (tool) descriptor as a provider reports it.
 * Everything but `name` is opaque to the gateway.
 */
export interface CapabilityDescriptor {
  name: string;
  [key: string]: unknown;
}

/**
 * One provider's native catalog, input to the name mapper
 */
export interface ProviderCatalog {
  provider: string;
  capabilities: readonly CapabilityDescriptor[];
}

/**
 * Outcome of one provider's branch of a fan-out
 */
export type ProviderStatus =
  | { provider: string; status: "ok"; toolCount: number }
  | { provider: string; status: "error"; kind: string; message: string };

/**
 * Merged result of an initialize or tools/list fan-out
 */
export interface MergedCatalog {
  tools: CapabilityDescriptor[];
  providers: ProviderStatus[];
}

/**
 * Outgoing HTTP request before it is handed to fetch
 */
export interface OutgoingRequest {
  url: string;
  headers: Record<string, string>;
  body: JsonRpcRequestMessage;
}

export interface JsonRpcRequestMessage {
  jsonrpc: "2.0";
  id: RequestId;
  method: string;
  params?: Record<string, unknown>;
}

export type JsonRpcResponseMessage =
  | { jsonrpc: "2.0"; id: RequestId | null; result: unknown }
  | { jsonrpc: "2.0"; id: RequestId | null; error: JsonRpcErrorObject };
