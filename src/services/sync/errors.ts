/**
 * Sync error taxonomy
 *
 * Failures are isolated to the smallest unit able to fail on its own:
 * a record (MappingError), an entity type (AuthError, exhausted
 * TransientExternalError), or a write batch (StorageWriteError).
 */

import { syncLogger } from "../../logger.js";

// ============================================================================
// Error Classes
// ============================================================================

/** Source rate-limited, unavailable or timed out. Retried with backoff. */
export class TransientExternalError extends Error {
  code = "TRANSIENT_EXTERNAL" as const;
  retryAfterMs?: number;

  constructor(message: string, options?: { retryAfterMs?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "TransientExternalError";
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Credentials rejected. Fatal for the entity type, never retried. */
export class AuthError extends Error {
  code = "AUTH" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "AuthError";
  }
}

/** The source does not know the requested module. Fatal for the entity type. */
export class SourceNotFoundError extends Error {
  code = "SOURCE_NOT_FOUND" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "SourceNotFoundError";
  }
}

/** A record does not fit its mapping. The record is skipped. */
export class MappingError extends Error {
  code = "MAPPING" as const;
  entityType: string;

  constructor(entityType: string, message: string) {
    super(message);
    this.name = "MappingError";
    this.entityType = entityType;
  }
}

/** A batch write to the graph store failed or timed out. */
export class StorageWriteError extends Error {
  code = "STORAGE_WRITE" as const;
  group: string;
  batchSize: number;

  constructor(group: string, batchSize: number, options?: { cause?: unknown }) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Batch ${group} (${String(batchSize)} items) failed: ${reason}`, {
      cause: options?.cause,
    });
    this.name = "StorageWriteError";
    this.group = group;
    this.batchSize = batchSize;
  }
}

/** The schema mapping file is invalid. Carries every violation found. */
export class SchemaValidationError extends Error {
  code = "SCHEMA_VALIDATION" as const;
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid schema mapping: ${issues.join("; ")}`);
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}

export class UnknownEntityTypeError extends Error {
  code = "UNKNOWN_ENTITY_TYPE" as const;
  entityType: string;

  constructor(entityType: string) {
    super(`No schema mapping for entity type "${entityType}"`);
    this.name = "UnknownEntityTypeError";
    this.entityType = entityType;
  }
}

export class SyncInProgressError extends Error {
  code = "SYNC_IN_PROGRESS" as const;

  constructor(runId: string) {
    super(`Sync run ${runId} is still in progress`);
    this.name = "SyncInProgressError";
  }
}

export class SyncCancelledError extends Error {
  code = "SYNC_CANCELLED" as const;

  constructor() {
    super("Sync cancelled");
    this.name = "SyncCancelledError";
  }
}

/** A fired sanitizer fallback. Never affects the run status. */
export interface DataQualityWarning {
  field: string;
  message: string;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Error Tracker
// ============================================================================

export interface EntityErrorEntry {
  sourceId: string;
  label: string;
  error: string;
}

export interface BatchErrorEntry {
  batchType: string;
  batchSize: number;
  error: string;
}

const MAX_ENTITY_MESSAGES = 10;

/**
 * Collects record- and batch-level errors of one run and renders a bounded
 * list of messages for API responses.
 */
export class ErrorTracker {
  private readonly entityErrors: EntityErrorEntry[] = [];
  private readonly batchErrors: BatchErrorEntry[] = [];

  trackEntityError(sourceId: string, label: string, error: unknown): void {
    const entry = { sourceId, label, error: errorMessage(error) };
    this.entityErrors.push(entry);
    syncLogger.warn(entry, "Entity error");
  }

  trackBatchError(batchType: string, batchSize: number, error: unknown): void {
    const entry = { batchType, batchSize, error: errorMessage(error) };
    this.batchErrors.push(entry);
    syncLogger.error(entry, "Batch error");
  }

  hasErrors(): boolean {
    return this.entityErrors.length > 0 || this.batchErrors.length > 0;
  }

  get totals(): { entityErrors: number; batchErrors: number } {
    return {
      entityErrors: this.entityErrors.length,
      batchErrors: this.batchErrors.length,
    };
  }

  /**
   * Entity errors first (at most 10), batch errors fill the remaining space.
   */
  getMessages(limit = 15): string[] {
    const messages = this.entityErrors
      .slice(0, MAX_ENTITY_MESSAGES)
      .map((e) => `${e.label} ${e.sourceId}: ${e.error}`);

    const remaining = Math.max(limit - messages.length, 0);
    for (const e of this.batchErrors.slice(0, remaining)) {
      messages.push(
        `Batch ${e.batchType} (${String(e.batchSize)} items): ${e.error}`
      );
    }

    return messages.slice(0, limit);
  }
}
