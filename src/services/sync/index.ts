// Sync Services - Re-exports
export { SchemaRegistry, SchemaSnapshot, buildSnapshot } from "./schema-registry.js";
export { PageFetcher, classifySourceError, backoffDelay } from "./page-fetcher.js";
export { RecordSanitizer, resolveDisplayName } from "./sanitizer.js";
export { EntityMapper } from "./entity-mapper.js";
export { BatchUpserter } from "./batch-upserter.js";
export { SyncOrchestrator, resolveStatus } from "./orchestrator.js";
export { SyncStatusTracker, type SyncStatusSnapshot } from "./status.js";
export * from "./errors.js";
export type { SyncOptions, SyncOrchestratorConfig } from "./orchestrator.js";
