/**
 * Session Module
 *
 * Key exports:
 * - SessionStore: table of session bindings with durable create/delete
 * - NameMapper: per-session public name ↔ (provider, native name) map
 * - SessionPersistence: storage contract, in-memory and SQLite implementations
 */

// Session table
export {
  SessionStore,
  CredentialMaterialSchema,
  type SessionStoreConfig,
  type SessionDeletedListener,
} from "./session-store.js";

// Name mapping
export {
  NameMapper,
  PUBLIC_NAME_SEPARATOR,
  toPublicName,
  type CapabilityTarget,
  type NameMap,
  type BuiltCatalog,
} from "./name-mapper.js";

// Persistence
export {
  MemorySessionPersistence,
  type SessionPersistence,
  type StoredSession,
} from "./persistence.js";
export {
  SqliteSessionPersistence,
  type SqliteSessionPersistenceOptions,
} from "./sqlite-persistence.js";
