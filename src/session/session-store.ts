/**
 * Session Store
 *
 * Owns the table of session bindings. Handles:
 * - Session lifecycle (create, get, delete)
 * - Reload of persisted sessions at startup
 * - Write ordering: create/delete are serialized, and a session becomes
 *   visible to get() only after persistence has accepted it
 */

import { ulid } from "ulid";
import { z } from "zod";
import { GatewayError, errorMessage } from "../errors.js";
import type { StructuredLogger } from "../logging.js";
import type { ProviderRegistry } from "../registry/provider-registry.js";
import type { CredentialMaterial, SessionBinding } from "../types.js";
import type { SessionPersistence, StoredSession } from "./persistence.js";

export const CredentialMaterialSchema = z.object({
  token: z.string().optional(),
  key: z.string().optional(),
});

const PersistedSessionSchema = z.object({
  id: z.string().min(1),
  providers: z.array(z.string().min(1)).min(1),
  credentials: z.record(CredentialMaterialSchema),
  createdAt: z.string().datetime(),
});

type PersistedSession = z.infer<typeof PersistedSessionSchema>;

/**
 * Configuration for SessionStore
 */
export interface SessionStoreConfig {
  registry: ProviderRegistry;
  persistence: SessionPersistence;
  /** Logger for structured logging */
  logger?: StructuredLogger;
  /** Session id generator (default: ULID) */
  generateId?: () => string;
}

export type SessionDeletedListener = (sessionId: string) => void;

export class SessionStore {
  private readonly sessions = new Map<string, SessionBinding>();
  private readonly registry: ProviderRegistry;
  private readonly persistence: SessionPersistence;
  private readonly logger?: StructuredLogger;
  private readonly generateId: () => string;
  private readonly deletedListeners: SessionDeletedListener[] = [];
  private writeQueue: Promise<void> = Promise.resolve();
  private loaded = false;

  constructor(config: SessionStoreConfig) {
    this.registry = config.registry;
    this.persistence = config.persistence;
    this.logger = config.logger;
    this.generateId = config.generateId ?? ulid;
  }

  // ==================== Startup ====================

  /**
   * Reload persisted sessions. Best-effort: unreadable records and records
   * naming providers that are no longer registered are skipped with a
   * warning. Must be called at most once.
   *
   * @returns number of sessions restored
   */
  public async load(): Promise<number> {
    if (this.loaded) {
      throw new Error("SessionStore.load() may only be called once");
    }
    this.loaded = true;

    let records: StoredSession[];
    try {
      records = await this.persistence.loadAll();
    } catch (err) {
      this.logger?.error("session_reload_failed", { error: errorMessage(err) });
      return 0;
    }

    let restored = 0;
    for (const record of records) {
      const binding = this.restore(record.id, record.serialized);
      if (binding) {
        this.sessions.set(binding.id, binding);
        restored++;
      }
    }

    this.logger?.info("sessions_reloaded", {
      restored,
      skipped: records.length - restored,
    });
    return restored;
  }

  // ==================== Session Lifecycle ====================

  /**
   * Create a session bound to `providers`.
   *
   * @throws GatewayError: InvalidRequest for an empty provider list,
   *   UnknownProvider when any provider is not in the registry. Nothing is
   *   persisted or made visible in either case.
   */
  public create(
    providers: readonly string[],
    credentials: Readonly<Record<string, CredentialMaterial>> = {}
  ): Promise<string> {
    return this.withWriteLock(async () => {
      const ordered = Array.from(new Set(providers));
      if (ordered.length === 0) {
        throw new GatewayError("InvalidRequest", "A session needs at least one provider");
      }

      const unknown = ordered.filter((name) => !this.registry.has(name));
      if (unknown.length > 0) {
        throw new GatewayError(
          "UnknownProvider",
          `Unknown provider${unknown.length > 1 ? "s" : ""} ${unknown.map((n) => `'${n}'`).join(", ")}`,
          { data: { providers: unknown } }
        );
      }

      const binding: SessionBinding = {
        id: this.generateId(),
        providers: ordered,
        credentials: cloneCredentials(credentials),
        createdAt: new Date(),
      };

      await this.persistence.save(binding.id, serialize(binding));
      this.sessions.set(binding.id, binding);

      this.logger?.info("session_created", {
        sessionId: binding.id,
        providers: binding.providers,
      });
      return binding.id;
    });
  }

  /**
   * Get a session binding.
   *
   * @throws GatewayError (SessionNotFound)
   */
  public get(sessionId: string): SessionBinding {
    const binding = this.sessions.get(sessionId);
    if (!binding) {
      throw new GatewayError("SessionNotFound", `Unknown session ${sessionId}`, {
        data: { sessionId },
      });
    }
    return binding;
  }

  public has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Delete a session. Deleting an unknown session is not an error.
   */
  public delete(sessionId: string): Promise<void> {
    return this.withWriteLock(async () => {
      await this.persistence.delete(sessionId);
      const existed = this.sessions.delete(sessionId);
      if (!existed) return;

      this.logger?.info("session_deleted", { sessionId });
      for (const listener of this.deletedListeners) {
        listener(sessionId);
      }
    });
  }

  /**
   * Register a callback fired after a session is deleted.
   */
  public onDeleted(listener: SessionDeletedListener): void {
    this.deletedListeners.push(listener);
  }

  // ==================== Accessors ====================

  public list(): SessionBinding[] {
    return Array.from(this.sessions.values());
  }

  public get size(): number {
    return this.sessions.size;
  }

  // ==================== Internals ====================

  private withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(fn);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private restore(id: string, serialized: string): SessionBinding | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (err) {
      this.logger?.warn("session_reload_skipped", {
        sessionId: id,
        reason: "unparseable",
        error: errorMessage(err),
      });
      return undefined;
    }

    const parsed = PersistedSessionSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn("session_reload_skipped", {
        sessionId: id,
        reason: "invalid",
        error: parsed.error.issues[0]?.message,
      });
      return undefined;
    }

    const record = parsed.data;
    const missing = record.providers.filter((name) => !this.registry.has(name));
    if (missing.length > 0) {
      this.logger?.warn("session_reload_skipped", {
        sessionId: id,
        reason: "unknown_provider",
        providers: missing,
      });
      return undefined;
    }

    return {
      id: record.id,
      providers: record.providers,
      credentials: record.credentials,
      createdAt: new Date(record.createdAt),
    };
  }
}

function serialize(binding: SessionBinding): string {
  const record: PersistedSession = {
    id: binding.id,
    providers: [...binding.providers],
    credentials: cloneCredentials(binding.credentials),
    createdAt: binding.createdAt.toISOString(),
  };
  return JSON.stringify(record);
}

function cloneCredentials(
  credentials: Readonly<Record<string, CredentialMaterial>>
): Record<string, CredentialMaterial> {
  const copy: Record<string, CredentialMaterial> = {};
  for (const [provider, material] of Object.entries(credentials)) {
    copy[provider] = { ...material };
  }
  return copy;
}
