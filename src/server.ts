#!/usr/bin/env node
/**
 * MCP Multiplexer
 *
 * Session-scoped gateway: each client session binds a set of registered
 * backend MCP servers and sees their tools merged behind one endpoint.
 */

import { BackendClient } from "./backend/backend-client.js";
import { RetryPolicy } from "./backend/retry-policy.js";
import { loadGatewayConfig, type GatewayConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createGatewayServer } from "./http-server.js";
import { createConsoleLogger } from "./logging.js";
import { Multiplexer } from "./multiplexer.js";
import { ProtocolHandler } from "./protocol-handler.js";
import { ProviderRegistry } from "./registry/provider-registry.js";
import {
  MemorySessionPersistence,
  NameMapper,
  SessionStore,
  SqliteSessionPersistence,
  type SessionPersistence,
} from "./session/index.js";

// Main entry point
async function main(): Promise<void> {
  let config: GatewayConfig;
  try {
    config = loadGatewayConfig();
  } catch (err) {
    console.error(`Invalid configuration: ${errorMessage(err)}`);
    process.exit(1);
  }

  const logger = createConsoleLogger(config.logLevel);

  let registry: ProviderRegistry;
  try {
    registry = ProviderRegistry.loadFile(config.registryPath, { logger });
  } catch (err) {
    logger.error("provider_registry_failed", {
      path: config.registryPath,
      error: errorMessage(err),
    });
    process.exit(1);
  }

  const persistence: SessionPersistence = config.databasePath
    ? new SqliteSessionPersistence({ dbPath: config.databasePath })
    : new MemorySessionPersistence();

  const sessions = new SessionStore({ registry, persistence, logger });
  await sessions.load();

  const backend = new BackendClient({
    retryPolicy: new RetryPolicy(config.retry, { logger }),
    timeoutMs: config.backendTimeoutMs,
    logger,
  });
  const multiplexer = new Multiplexer({
    sessions,
    registry,
    backend,
    names: new NameMapper(),
    toolsCacheTtlMs: config.toolsCacheTtlMs,
    logger,
  });
  const handler = new ProtocolHandler({ sessions, multiplexer, logger });

  const httpServer = createGatewayServer({ registry, sessions, handler, logger });

  // Handle shutdown
  const shutdown = (): void => {
    logger.info("gateway_shutting_down", {});
    httpServer.close(() => {
      persistence
        .close()
        .catch((err: unknown) => {
          logger.error("session_persistence_close_failed", { error: errorMessage(err) });
        })
        .finally(() => {
          process.exit(0);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // Start server
  httpServer.listen(config.port, () => {
    logger.info("gateway_listening", {
      url: `http://localhost:${String(config.port)}`,
      providers: registry.size,
      sessions: sessions.size,
      persistence: config.databasePath ?? "memory",
    });
  });
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
