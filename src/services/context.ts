/**
 * Application wiring shared by the HTTP server and the CLI.
 */

import { loadConfig, type AppConfig } from "../config.js";
import { checkConnection, db } from "../db/connection.js";
import { PostgresGraphStore } from "../graph/store.js";
import { HttpSourceClient } from "../source/client.js";
import { SchemaRegistry, SyncOrchestrator } from "./sync/index.js";

import type { GraphStore } from "../graph/store.js";
import type { SourceClient } from "../source/client.js";

export interface AppContext {
  config: AppConfig;
  registry: SchemaRegistry;
  store: GraphStore;
  client: SourceClient;
  orchestrator: SyncOrchestrator;
  checkDatabase: () => Promise<boolean>;
}

export function createAppContext(config: AppConfig = loadConfig()): AppContext {
  const registry = SchemaRegistry.fromFile(config.schemaMappingPath);
  const store = new PostgresGraphStore(db);
  const client = new HttpSourceClient({
    baseUrl: config.source.baseUrl,
    authUrl: config.source.authUrl,
    clientId: config.source.clientId,
    clientSecret: config.source.clientSecret,
    refreshToken: config.source.refreshToken,
    timeoutMs: config.source.timeoutMs,
    name: config.source.namespace,
  });

  const orchestrator = new SyncOrchestrator({
    registry,
    client,
    store,
    config: {
      namespace: config.source.namespace,
      pageSize: config.source.pageSize,
      maxPages: config.source.maxPages,
      rateLimitMs: config.source.rateLimitMs,
      sourceTimeoutMs: config.source.timeoutMs,
      retry: config.source.retry,
      concurrency: config.syncConcurrency,
      graph: config.graph,
    },
  });

  return {
    config,
    registry,
    store,
    client,
    orchestrator,
    checkDatabase: checkConnection,
  };
}
