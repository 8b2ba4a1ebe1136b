/**
 * Sync Orchestrator - runs one full synchronization of a set of entity types
 * from the source system into the graph.
 *
 * Phases: FETCHING (fetch + sanitize + map per type, bounded pool) ->
 * MAPPING (collect the run's entities) -> UPSERTING_NODES ->
 * UPSERTING_RELATIONSHIPS -> DONE | PARTIAL_FAILURE | FAILED.
 *
 * A failed entity type contributes nothing to the write phases. Node batch
 * failures are charged to the entity types that own the entities.
 */

import { randomUUID } from "node:crypto";

import { syncLogger } from "../../logger.js";
import { RateLimiter } from "../../source/rate-limiter.js";
import { mapWithConcurrency } from "../../utils/async.js";
import { BatchUpserter } from "./batch-upserter.js";
import { EntityMapper } from "./entity-mapper.js";
import {
  ErrorTracker,
  SyncCancelledError,
  SyncInProgressError,
  errorMessage,
} from "./errors.js";
import { PageFetcher } from "./page-fetcher.js";
import { RecordSanitizer } from "./sanitizer.js";
import { SyncStatusTracker } from "./status.js";

import type { BatchUpserterOptions } from "./batch-upserter.js";
import type { SchemaRegistry, SchemaSnapshot } from "./schema-registry.js";
import type { RetryConfig } from "../../config.js";
import type { GraphStore } from "../../graph/store.js";
import type { SourceClient } from "../../source/client.js";
import type { Sleep } from "../../source/rate-limiter.js";
import type {
  EntityTypeResult,
  GraphEntity,
  ProgressCallback,
  RelationCandidate,
  RelationshipSummary,
  SourceFilter,
  SyncPhase,
  SyncResult,
  SyncStatus,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncOrchestratorConfig {
  namespace: string;
  pageSize: number;
  maxPages?: number;
  rateLimitMs: number;
  sourceTimeoutMs: number;
  retry: RetryConfig;
  /** Entity types fetched in parallel */
  concurrency: number;
  graph: BatchUpserterOptions;
}

export interface SyncOrchestratorDeps {
  registry: SchemaRegistry;
  client: SourceClient;
  store: GraphStore;
  config: SyncOrchestratorConfig;
  statusTracker?: SyncStatusTracker;
  /** Injected for tests */
  sleep?: Sleep;
  now?: () => Date;
}

export interface SyncOptions {
  maxPages?: number;
  filter?: SourceFilter;
  signal?: AbortSignal;
}

interface TypeOutcome {
  result: EntityTypeResult;
  entities: GraphEntity[];
  relations: RelationCandidate[];
}

// Per-type error lists are capped; the run-level list is capped by the tracker
const MAX_TYPE_ERRORS = 10;
const MAX_RUN_ERRORS = 15;

function pushCapped(list: string[], message: string): void {
  if (list.length < MAX_TYPE_ERRORS && !list.includes(message)) {
    list.push(message);
  }
}

/**
 * Requested names resolved to their entity types (aliases included), each
 * once, in request order. Unknown names are kept so their type fails.
 */
export function uniqueEntityTypes(
  requested: readonly string[],
  snapshot: SchemaSnapshot
): string[] {
  const types = new Set<string>();
  for (const name of requested) {
    types.add(snapshot.has(name) ? snapshot.lookup(name).entityType : name);
  }
  return [...types];
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly fetcher: PageFetcher;
  private readonly sanitizer = new RecordSanitizer();
  private readonly mapper: EntityMapper;
  private readonly upserter: BatchUpserter;
  private readonly statusTracker: SyncStatusTracker;
  private readonly now: () => Date;
  private progressCallback: ProgressCallback | null = null;
  private activeRunId: string | null = null;

  constructor(private readonly deps: SyncOrchestratorDeps) {
    const { config } = deps;
    this.now = deps.now ?? (() => new Date());

    // One limiter for every worker of every run
    const rateLimiter = new RateLimiter(
      config.rateLimitMs,
      () => this.now().getTime(),
      deps.sleep
    );
    this.fetcher = new PageFetcher(deps.client, {
      rateLimiter,
      retry: config.retry,
      timeoutMs: config.sourceTimeoutMs,
      sleep: deps.sleep,
    });
    this.mapper = new EntityMapper(config.namespace);
    this.upserter = new BatchUpserter(deps.store, config.graph);
    this.statusTracker = deps.statusTracker ?? new SyncStatusTracker(this.now);
  }

  setProgressCallback(callback: ProgressCallback | null): void {
    this.progressCallback = callback;
  }

  get status(): SyncStatusTracker {
    return this.statusTracker;
  }

  isRunning(): boolean {
    return this.activeRunId !== null;
  }

  /**
   * Run a full sync of `entityTypes`. Only one run at a time.
   */
  async sync(entityTypes: string[], options: SyncOptions = {}): Promise<SyncResult> {
    if (this.activeRunId !== null) {
      throw new SyncInProgressError(this.activeRunId);
    }

    const runId = randomUUID();
    this.activeRunId = runId;
    const snapshot = this.deps.registry.snapshot();
    const types = uniqueEntityTypes(entityTypes, snapshot);
    this.statusTracker.start(runId, types);

    try {
      const result = await this.run(runId, types, snapshot, options);
      this.statusTracker.complete(result);
      return result;
    } catch (error) {
      this.statusTracker.abort(errorMessage(error));
      throw error;
    } finally {
      this.activeRunId = null;
    }
  }

  private async run(
    runId: string,
    entityTypes: string[],
    snapshot: SchemaSnapshot,
    options: SyncOptions
  ): Promise<SyncResult> {
    const startedAt = this.now();
    const tracker = new ErrorTracker();
    const { signal } = options;

    syncLogger.info(
      { runId, entityTypes, schemaVersion: snapshot.version },
      "Starting sync run"
    );

    // ========================================================================
    // Fetch + map per entity type
    // ========================================================================

    let typesDone = 0;
    this.report("FETCHING", 0, entityTypes.length);

    const outcomes = await mapWithConcurrency(
      entityTypes,
      this.deps.config.concurrency,
      async (entityType) => {
        const outcome = await this.syncEntityType(
          entityType,
          snapshot,
          startedAt,
          tracker,
          options
        );
        typesDone++;
        this.report("FETCHING", typesDone, entityTypes.length, entityType);
        return outcome;
      }
    );

    const results = outcomes.map((o) => o.result);

    // ========================================================================
    // Collect the run's entities
    // ========================================================================

    this.report("MAPPING", 0, outcomes.length);

    const owners = new Map<string, EntityTypeResult[]>();
    const entities: GraphEntity[] = [];
    const relations: RelationCandidate[] = [];
    for (const outcome of outcomes) {
      if (outcome.result.outcome === "FAILED") continue;
      for (const entity of outcome.entities) {
        const list = owners.get(entity.sourceId) ?? [];
        if (!list.includes(outcome.result)) list.push(outcome.result);
        owners.set(entity.sourceId, list);
        entities.push(entity);
      }
      relations.push(...outcome.relations);
    }

    this.report("MAPPING", outcomes.length, outcomes.length);

    let relationships: RelationshipSummary = {
      linked: 0,
      existing: 0,
      skipped: 0,
      failed: 0,
      byEdgeType: [],
    };
    const relationshipErrors: string[] = [];

    const anySucceeded = results.some((r) => r.outcome === "SUCCEEDED");
    const writesRun = anySucceeded || results.length === 0;

    if (!writesRun) {
      syncLogger.error({ runId }, "Every entity type failed, skipping writes");
    } else {
      // ======================================================================
      // Nodes
      // ======================================================================

      this.report("UPSERTING_NODES", 0, entities.length);
      const nodes = await this.upserter.upsertNodes(entities, { signal, tracker });

      for (const key of nodes.createdKeys) {
        for (const owner of owners.get(key) ?? []) owner.created++;
      }
      for (const key of nodes.updatedKeys) {
        for (const owner of owners.get(key) ?? []) owner.updated++;
      }
      for (const failure of nodes.failures) {
        for (const sourceId of failure.sourceIds) {
          for (const owner of owners.get(sourceId) ?? []) {
            owner.outcome = "FAILED";
            pushCapped(owner.errors, failure.error.message);
          }
        }
      }

      this.report("UPSERTING_NODES", entities.length, entities.length);

      // ======================================================================
      // Relationships (every node batch has settled)
      // ======================================================================

      this.report("UPSERTING_RELATIONSHIPS", 0, relations.length);
      const merged = await this.upserter.mergeRelationships(relations, {
        signal,
        tracker,
      });
      relationships = {
        linked: merged.linked,
        existing: merged.existing,
        skipped: merged.skipped,
        failed: merged.failed,
        byEdgeType: merged.byEdgeType,
      };
      relationshipErrors.push(...merged.errors);
      this.report("UPSERTING_RELATIONSHIPS", relations.length, relations.length);

      // A cancelled run did not see every record
      if (signal?.aborted !== true) {
        await this.recordSyncTime(startedAt);
      }
    }

    // ========================================================================
    // Result
    // ========================================================================

    const status = resolveStatus(results, relationshipErrors.length > 0);
    const completedAt = this.now();

    const typeErrors = results
      .filter((r) => r.outcome === "FAILED")
      .map((r) => `${r.entityType}: ${r.errors[0] ?? "failed"}`);
    const errors = [...typeErrors, ...tracker.getMessages(MAX_RUN_ERRORS)].slice(
      0,
      MAX_RUN_ERRORS
    );

    const result: SyncResult = {
      runId,
      status,
      cancelled: signal?.aborted === true,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      entityTypes: results,
      relationships,
      errors,
    };

    this.report(status, entityTypes.length, entityTypes.length);

    syncLogger.info(
      {
        runId,
        status,
        cancelled: result.cancelled,
        created: results.reduce((sum, r) => sum + r.created, 0),
        updated: results.reduce((sum, r) => sum + r.updated, 0),
        linked: relationships.linked,
        durationMs: result.durationMs,
      },
      "Sync run finished"
    );

    return result;
  }

  /**
   * Fetch, sanitize and map every record of one entity type. Never throws:
   * a fatal error marks the type failed and discards its records.
   */
  private async syncEntityType(
    entityType: string,
    snapshot: SchemaSnapshot,
    syncedAt: Date,
    tracker: ErrorTracker,
    options: SyncOptions
  ): Promise<TypeOutcome> {
    const result: EntityTypeResult = {
      entityType,
      label: null,
      outcome: "SUCCEEDED",
      fetched: 0,
      created: 0,
      updated: 0,
      skipped: 0,
      errors: [],
    };
    const entities: GraphEntity[] = [];
    const relations: RelationCandidate[] = [];

    try {
      const mapping = snapshot.lookup(entityType);
      result.label = mapping.nodeLabel;

      if (options.signal?.aborted === true) {
        throw new SyncCancelledError();
      }

      const records = this.fetcher.fetchAll(entityType, mapping, {
        filter: options.filter,
        pageSize: this.deps.config.pageSize,
        maxPages: options.maxPages ?? this.deps.config.maxPages,
        signal: options.signal,
      });

      for await (const record of records) {
        result.fetched++;

        // One bad record is skipped; it never fails its type
        try {
          const sanitized = this.sanitizer.sanitize(record, mapping);
          const mapped = this.mapper.map(sanitized, mapping, syncedAt);
          if (mapped === null) {
            result.skipped++;
            continue;
          }
          for (const warning of mapped.warnings) {
            syncLogger.warn(
              { entityType, sourceId: mapped.entity.sourceId, field: warning.field },
              warning.message
            );
          }
          entities.push(mapped.entity);
          relations.push(...mapped.relations);
        } catch (error) {
          result.skipped++;
          pushCapped(result.errors, errorMessage(error));
          tracker.trackEntityError(
            `record ${String(result.fetched)}`,
            mapping.nodeLabel,
            error
          );
        }
      }

      syncLogger.info(
        {
          entityType,
          fetched: result.fetched,
          mapped: entities.length,
          skipped: result.skipped,
        },
        "Entity type fetched"
      );

      return { result, entities, relations };
    } catch (error) {
      result.outcome = "FAILED";
      pushCapped(result.errors, errorMessage(error));
      syncLogger.error(
        { entityType, fetched: result.fetched, error: errorMessage(error) },
        "Entity type failed"
      );
      return { result, entities: [], relations: [] };
    }
  }

  private async recordSyncTime(at: Date): Promise<void> {
    try {
      await this.deps.store.setLastSyncTime(at);
    } catch (error) {
      syncLogger.warn(
        { error: errorMessage(error) },
        "Failed to record last sync time"
      );
    }
  }

  private report(
    phase: SyncPhase,
    current: number,
    total: number,
    currentItem?: string
  ): void {
    const progress = { phase, current, total, currentItem };
    this.statusTracker.update(progress);
    this.progressCallback?.(progress);
  }
}

/**
 * DONE when nothing failed; FAILED when no requested type succeeded;
 * PARTIAL_FAILURE otherwise.
 */
export function resolveStatus(
  results: readonly EntityTypeResult[],
  relationshipBatchFailed: boolean
): SyncStatus {
  const succeeded = results.filter((r) => r.outcome === "SUCCEEDED").length;
  if (results.length > 0 && succeeded === 0) {
    return "FAILED";
  }
  if (succeeded < results.length || relationshipBatchFailed) {
    return "PARTIAL_FAILURE";
  }
  return "DONE";
}
