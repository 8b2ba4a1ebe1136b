/**
 * Runtime configuration read from the environment.
 *
 * Every numeric setting falls back to its default when the variable is unset
 * or not a positive integer.
 */

import "dotenv/config";

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
}

function readOptionalInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 1 ? undefined : parsed;
}

function readString(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

export interface RetryConfig {
  maxAttempts: number;
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
}

export interface SourceConfig {
  namespace: string;
  baseUrl: string;
  authUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  rateLimitMs: number;
  pageSize: number;
  maxPages: number | undefined;
  timeoutMs: number;
  retry: RetryConfig;
}

export interface GraphConfig {
  batchSize: number;
  writeTimeoutMs: number;
  labelConcurrency: number;
}

export interface AppConfig {
  databaseUrl: string;
  schemaMappingPath: string;
  source: SourceConfig;
  graph: GraphConfig;
  syncConcurrency: number;
  server: { port: number; host: string };
}

export function loadConfig(): AppConfig {
  return {
    databaseUrl: readString(
      "DATABASE_URL",
      "postgresql://localhost:5432/crm_graph"
    ),
    schemaMappingPath: readString(
      "SCHEMA_MAPPING_PATH",
      "./config/schema-mapping.json"
    ),
    source: {
      namespace: readString("SOURCE_NAMESPACE", "crm"),
      baseUrl: readString("SOURCE_BASE_URL", "http://localhost:8080/api/v1"),
      authUrl: readString("SOURCE_AUTH_URL", "http://localhost:8080/oauth/token"),
      clientId: readString("SOURCE_CLIENT_ID", ""),
      clientSecret: readString("SOURCE_CLIENT_SECRET", ""),
      refreshToken: readString("SOURCE_REFRESH_TOKEN", ""),
      // 100 calls/min quota on the CRM side
      rateLimitMs: readInt("SOURCE_RATE_LIMIT_MS", 600),
      pageSize: readInt("SOURCE_PAGE_SIZE", 200),
      maxPages: readOptionalInt("SOURCE_MAX_PAGES"),
      timeoutMs: readInt("SOURCE_TIMEOUT_MS", 30_000),
      retry: {
        maxAttempts: readInt("SOURCE_RETRY_MAX_ATTEMPTS", 4),
        initialBackoffMs: readInt("SOURCE_RETRY_INITIAL_MS", 1000),
        backoffMultiplier: 2,
        maxBackoffMs: readInt("SOURCE_RETRY_MAX_MS", 30_000),
      },
    },
    graph: {
      batchSize: readInt("GRAPH_BATCH_SIZE", 1000),
      writeTimeoutMs: readInt("GRAPH_WRITE_TIMEOUT_MS", 60_000),
      labelConcurrency: readInt("GRAPH_LABEL_CONCURRENCY", 4),
    },
    syncConcurrency: readInt("SYNC_CONCURRENCY", 3),
    server: {
      port: readInt("PORT", 3000),
      host: readString("HOST", "0.0.0.0"),
    },
  };
}
