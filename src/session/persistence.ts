/**
 * Session persistence contract.
 *
 * The store serializes bindings itself; a persistence backend only keeps
 * opaque strings by session id. `save` must be durable when its promise
 * resolves.
 */

export interface StoredSession {
  id: string;
  serialized: string;
}

export interface SessionPersistence {
  save(id: string, serialized: string): Promise<void>;
  loadAll(): Promise<StoredSession[]>;
  delete(id: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Process-local persistence. Used by tests and when no database path is
 * configured.
 */
export class MemorySessionPersistence implements SessionPersistence {
  private readonly records = new Map<string, string>();

  constructor(initial: Iterable<StoredSession> = []) {
    for (const record of initial) {
      this.records.set(record.id, record.serialized);
    }
  }

  public save(id: string, serialized: string): Promise<void> {
    this.records.set(id, serialized);
    return Promise.resolve();
  }

  public loadAll(): Promise<StoredSession[]> {
    return Promise.resolve(
      Array.from(this.records.entries()).map(([id, serialized]) => ({ id, serialized }))
    );
  }

  public delete(id: string): Promise<void> {
    this.records.delete(id);
    return Promise.resolve();
  }

  public close(): Promise<void> {
    return Promise.resolve();
  }

  public get size(): number {
    return this.records.size;
  }
}
