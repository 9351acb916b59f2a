/**
 * Multiplexer
 *
 * Fans a catalog request out to every provider bound to a session and merges
 * the answers, or routes a single tool call to the one provider a public name
 * points at.
 */

import type { BackendClient } from "./backend/backend-client.js";
import { GatewayError, errorMessage, isGatewayError } from "./errors.js";
import type { StructuredLogger } from "./logging.js";
import type { ProviderRegistry } from "./registry/provider-registry.js";
import type { NameMapper } from "./session/name-mapper.js";
import type { SessionStore } from "./session/session-store.js";
import type {
  CapabilityDescriptor,
  MergedCatalog,
  ProviderBinding,
  ProviderCatalog,
  ProviderStatus,
  SessionBinding,
} from "./types.js";

/**
 * Configuration for Multiplexer
 */
export interface MultiplexerConfig {
  sessions: SessionStore;
  registry: ProviderRegistry;
  backend: BackendClient;
  names: NameMapper;
  /** How long a tools/list result is reused, in ms (default: 600000; 0 disables) */
  toolsCacheTtlMs?: number;
  /** Clock for cache expiry */
  now?: () => number;
  /** Logger for structured logging */
  logger?: StructuredLogger;
}

export const DEFAULT_TOOLS_CACHE_TTL_MS = 600_000;

interface CachedToolList {
  /** Provider set the result was built from */
  providersKey: string;
  /** Name map version the result was built into */
  nameMapVersion: number;
  expiresAt: number;
  catalog: MergedCatalog;
}

type FanOutBranch =
  | { provider: string; ok: true; capabilities: CapabilityDescriptor[] }
  | { provider: string; ok: false; error: unknown };

export class Multiplexer {
  private readonly sessions: SessionStore;
  private readonly registry: ProviderRegistry;
  private readonly backend: BackendClient;
  private readonly names: NameMapper;
  private readonly logger?: StructuredLogger;
  private readonly toolsCacheTtlMs: number;
  private readonly now: () => number;
  private readonly toolListCache = new Map<string, CachedToolList>();
  /** sessionId → provider → headers captured from that provider's responses */
  private readonly capturedHeaders = new Map<string, Map<string, Record<string, string>>>();

  constructor(config: MultiplexerConfig) {
    this.sessions = config.sessions;
    this.registry = config.registry;
    this.backend = config.backend;
    this.names = config.names;
    this.logger = config.logger;
    this.toolsCacheTtlMs = config.toolsCacheTtlMs ?? DEFAULT_TOOLS_CACHE_TTL_MS;
    this.now = config.now ?? Date.now;

    this.sessions.onDeleted((sessionId) => {
      this.forgetSession(sessionId);
    });
  }

  /**
   * Forward `initialize` to every bound provider and merge their tool lists.
   *
   * A provider that fails is reported in `providers` and left out of
   * `tools`; the call only fails when every provider failed.
   *
   * @throws GatewayError: SessionNotFound, AllBackendsUnavailable,
   *   AmbiguousCapability
   */
  public async initialize(
    sessionId: string,
    params: Record<string, unknown> = {}
  ): Promise<MergedCatalog> {
    this.toolListCache.delete(sessionId);
    return this.fanOut(sessionId, "initialize", params);
  }

  /**
   * Forward `tools/list` to every bound provider and merge their tool lists.
   * Rebuilds the session's name map exactly as initialize does.
   *
   * A result every provider answered is reused until the TTL passes, as long
   * as the session's name map is still the one it produced.
   */
  public async listTools(sessionId: string): Promise<MergedCatalog> {
    const session = this.sessions.get(sessionId);
    const providersKey = JSON.stringify([...session.providers].sort());

    const cached = this.toolListCache.get(sessionId);
    if (
      cached &&
      cached.providersKey === providersKey &&
      cached.nameMapVersion === this.names.version(sessionId) &&
      cached.expiresAt > this.now()
    ) {
      this.logger?.debug("tools_list_cache_hit", { sessionId });
      return cached.catalog;
    }
    this.toolListCache.delete(sessionId);

    const catalog = await this.fanOut(sessionId, "tools/list", undefined);

    if (this.toolsCacheTtlMs > 0 && catalog.providers.every((status) => status.status === "ok")) {
      this.toolListCache.set(sessionId, {
        providersKey,
        nameMapVersion: this.names.version(sessionId),
        expiresAt: this.now() + this.toolsCacheTtlMs,
        catalog,
      });
    }
    return catalog;
  }

  /**
   * Call the tool behind `publicName` with `args`, unmodified. Any other
   * `tools/call` params (such as `_meta`) travel along as given.
   *
   * @throws GatewayError: SessionNotFound, UnknownCapability (no backend
   *   contacted), or whatever the backend client raises for the one call
   */
  public async dispatch(
    sessionId: string,
    publicName: string,
    args: Record<string, unknown> = {},
    extraParams: Record<string, unknown> = {}
  ): Promise<unknown> {
    const session = this.sessions.get(sessionId);
    const target = this.names.resolve(sessionId, publicName);

    const provider = this.requireProvider(target.provider);

    this.logger?.info("dispatch_start", {
      sessionId,
      tool: publicName,
      provider: target.provider,
      nativeName: target.nativeName,
    });

    try {
      const { result } = await this.backend.call(
        provider,
        session.credentials[target.provider],
        "tools/call",
        { ...extraParams, name: target.nativeName, arguments: args },
        { headers: this.headersFor(sessionId, target.provider) }
      );
      this.logger?.debug("dispatch_complete", { sessionId, tool: publicName });
      return result;
    } catch (err) {
      this.logger?.warn("dispatch_failed", {
        sessionId,
        tool: publicName,
        provider: target.provider,
        kind: isGatewayError(err) ? err.kind : "InternalError",
        error: errorMessage(err),
      });
      throw err;
    }
  }

  /**
   * Drop per-session state (captured headers, name map, cached tool list).
   */
  public forgetSession(sessionId: string): void {
    this.capturedHeaders.delete(sessionId);
    this.toolListCache.delete(sessionId);
    this.names.forget(sessionId);
  }

  // ==================== Fan-out ====================

  private async fanOut(
    sessionId: string,
    method: "initialize" | "tools/list",
    params: Record<string, unknown> | undefined
  ): Promise<MergedCatalog> {
    const session = this.sessions.get(sessionId);

    this.logger?.info("fan_out_start", {
      sessionId,
      method,
      providers: session.providers,
    });

    // Every branch settles into a value; one provider's failure never rejects the join
    const branches = await Promise.all(
      session.providers.map((name) => this.callBranch(session, name, method, params))
    );

    // Deleted while the fan-out was in flight
    if (!this.sessions.has(sessionId)) {
      throw new GatewayError("SessionNotFound", `Unknown session ${sessionId}`, {
        data: { sessionId },
      });
    }

    const catalogs: ProviderCatalog[] = [];
    const statuses: ProviderStatus[] = [];

    for (const branch of branches) {
      if (branch.ok) {
        catalogs.push({ provider: branch.provider, capabilities: branch.capabilities });
        statuses.push({
          provider: branch.provider,
          status: "ok",
          toolCount: branch.capabilities.length,
        });
      } else {
        const kind = isGatewayError(branch.error) ? branch.error.kind : "InternalError";
        statuses.push({
          provider: branch.provider,
          status: "error",
          kind,
          message: errorMessage(branch.error),
        });
        this.logger?.warn("fan_out_provider_failed", {
          sessionId,
          method,
          provider: branch.provider,
          kind,
          error: errorMessage(branch.error),
        });
      }
    }

    if (catalogs.length === 0) {
      throw new GatewayError(
        "AllBackendsUnavailable",
        `All ${String(statuses.length)} backend(s) failed during ${method}`,
        { data: { providers: statuses } }
      );
    }

    const { tools } = this.names.buildCatalog(sessionId, catalogs);

    this.logger?.info("fan_out_complete", {
      sessionId,
      method,
      toolCount: tools.length,
      failedProviders: statuses.length - catalogs.length,
    });

    return { tools, providers: statuses };
  }

  private async callBranch(
    session: SessionBinding,
    providerName: string,
    method: string,
    params: Record<string, unknown> | undefined
  ): Promise<FanOutBranch> {
    try {
      const provider = this.requireProvider(providerName);
      const { result, responseHeaders } = await this.backend.call(
        provider,
        session.credentials[providerName],
        method,
        params,
        { headers: this.headersFor(session.id, providerName) }
      );
      if (this.sessions.has(session.id)) {
        this.captureHeaders(session.id, providerName, provider.persistResponseHeaders, responseHeaders);
      }
      return { provider: providerName, ok: true, capabilities: extractCapabilities(result) };
    } catch (error) {
      return { provider: providerName, ok: false, error };
    }
  }

  // ==================== Captured headers ====================

  private captureHeaders(
    sessionId: string,
    providerName: string,
    wanted: readonly string[],
    responseHeaders: Record<string, string>
  ): void {
    if (wanted.length === 0) return;

    const captured: Record<string, string> = {};
    for (const name of wanted) {
      const value = responseHeaders[name];
      if (value !== undefined) {
        captured[name] = value;
      }
    }
    if (Object.keys(captured).length === 0) return;

    let perSession = this.capturedHeaders.get(sessionId);
    if (!perSession) {
      perSession = new Map();
      this.capturedHeaders.set(sessionId, perSession);
    }
    perSession.set(providerName, { ...perSession.get(providerName), ...captured });

    this.logger?.debug("response_headers_captured", {
      sessionId,
      provider: providerName,
      headers: Object.keys(captured),
    });
  }

  private headersFor(sessionId: string, providerName: string): Record<string, string> {
    return { ...this.capturedHeaders.get(sessionId)?.get(providerName) };
  }

  private requireProvider(name: string): ProviderBinding {
    const provider = this.registry.get(name);
    if (!provider) {
      throw new GatewayError("UnknownProvider", `Unknown provider '${name}'`, { provider: name });
    }
    return provider;
  }
}

/**
 * Pull the tool list out of a backend result. Entries without a string
 * `name` are dropped; a result without `tools` is an empty catalog.
 */
export function extractCapabilities(result: unknown): CapabilityDescriptor[] {
  if (typeof result !== "object" || result === null || !("tools" in result)) {
    return [];
  }
  const tools: unknown = result.tools;
  if (!Array.isArray(tools)) {
    return [];
  }

  const capabilities: CapabilityDescriptor[] = [];
  for (const tool of tools.filter(isRecord)) {
    const name = tool["name"];
    if (typeof name === "string" && name !== "") {
      capabilities.push({ ...tool, name });
    }
  }
  return capabilities;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
