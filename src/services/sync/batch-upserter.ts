/**
 * Batch Upserter - writes a whole run's nodes, then its relationships, to the
 * graph store in bounded chunks.
 *
 * A failed chunk is isolated to its label or edge type; the other chunks
 * still run. Relationship writes only start once every node chunk settled.
 */

import { graphLogger } from "../../logger.js";
import { chunk, mapWithConcurrency, withTimeout } from "../../utils/async.js";
import { StorageWriteError, SyncCancelledError, errorMessage } from "./errors.js";

import type { ErrorTracker } from "./errors.js";
import type { GraphStore } from "../../graph/store.js";
import type {
  EdgeTypeResult,
  GraphEntity,
  RelationCandidate,
  RelationshipSummary,
} from "../../types/index.js";

export interface BatchUpserterOptions {
  batchSize: number;
  writeTimeoutMs: number;
  /** Labels (and edge types) written in parallel */
  labelConcurrency: number;
}

export interface WriteOptions {
  signal?: AbortSignal;
  tracker?: ErrorTracker;
}

export interface NodeBatchFailure {
  label: string;
  sourceIds: string[];
  error: StorageWriteError | SyncCancelledError;
}

export interface NodePhaseResult {
  createdKeys: Set<string>;
  updatedKeys: Set<string>;
  failures: NodeBatchFailure[];
}

export interface RelationshipPhaseResult extends RelationshipSummary {
  /** One message per failed chunk */
  errors: string[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Last occurrence of a source id wins.
 */
export function dedupeEntities(entities: readonly GraphEntity[]): GraphEntity[] {
  return [...new Map(entities.map((e) => [e.sourceId, e])).values()];
}

/** Edge identity after resolving direction: (type, from, to) */
function edgeKey(c: RelationCandidate): string {
  const [from, to] =
    c.direction === "OUTGOING" ? [c.sourceId, c.targetId] : [c.targetId, c.sourceId];
  return `${c.edgeType}\u0000${from}\u0000${to}`;
}

export function dedupeCandidates(
  candidates: readonly RelationCandidate[]
): RelationCandidate[] {
  const seen = new Map<string, RelationCandidate>();
  for (const candidate of candidates) {
    const key = edgeKey(candidate);
    if (!seen.has(key)) {
      seen.set(key, candidate);
    }
  }
  return [...seen.values()];
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group === undefined) {
      groups.set(k, [item]);
    } else {
      group.push(item);
    }
  }
  return groups;
}

// ============================================================================
// Upserter
// ============================================================================

export class BatchUpserter {
  constructor(
    private readonly store: GraphStore,
    private readonly options: BatchUpserterOptions
  ) {}

  async upsertNodes(
    entities: readonly GraphEntity[],
    writeOptions: WriteOptions = {}
  ): Promise<NodePhaseResult> {
    const { signal, tracker } = writeOptions;
    const result: NodePhaseResult = {
      createdKeys: new Set(),
      updatedKeys: new Set(),
      failures: [],
    };

    const byLabel = groupBy(dedupeEntities(entities), (e) => e.label);
    graphLogger.info(
      { entities: entities.length, labels: byLabel.size },
      "Upserting nodes"
    );

    await mapWithConcurrency(
      [...byLabel.entries()],
      this.options.labelConcurrency,
      async ([label, labelEntities]) => {
        // Chunks of one label run sequentially
        for (const batch of chunk(labelEntities, this.options.batchSize)) {
          const sourceIds = batch.map((e) => e.sourceId);

          if (signal?.aborted === true) {
            result.failures.push({ label, sourceIds, error: new SyncCancelledError() });
            continue;
          }

          try {
            const written = await withTimeout(
              this.store.upsertNodes(label, batch),
              this.options.writeTimeoutMs,
              `Upsert ${label} batch`
            );
            for (const key of written.createdKeys) result.createdKeys.add(key);
            for (const key of written.updatedKeys) result.updatedKeys.add(key);
          } catch (error) {
            const failure = new StorageWriteError(label, batch.length, { cause: error });
            tracker?.trackBatchError(label, batch.length, error);
            graphLogger.error(
              { label, batchSize: batch.length, error: errorMessage(error) },
              "Node batch failed"
            );
            result.failures.push({ label, sourceIds, error: failure });
          }
        }
      }
    );

    graphLogger.info(
      {
        created: result.createdKeys.size,
        updated: result.updatedKeys.size,
        failedBatches: result.failures.length,
      },
      "Node upsert finished"
    );

    return result;
  }

  async mergeRelationships(
    candidates: readonly RelationCandidate[],
    writeOptions: WriteOptions = {}
  ): Promise<RelationshipPhaseResult> {
    const { signal, tracker } = writeOptions;
    const byEdgeType = groupBy(dedupeCandidates(candidates), (c) => c.edgeType);

    graphLogger.info(
      { candidates: candidates.length, edgeTypes: byEdgeType.size },
      "Merging relationships"
    );

    const errors: string[] = [];
    const perType = await mapWithConcurrency(
      [...byEdgeType.entries()],
      this.options.labelConcurrency,
      async ([edgeType, typeCandidates]): Promise<EdgeTypeResult> => {
        const counts: EdgeTypeResult = {
          edgeType,
          candidates: typeCandidates.length,
          linked: 0,
          existing: 0,
          skipped: 0,
          failed: 0,
        };

        for (const batch of chunk(typeCandidates, this.options.batchSize)) {
          if (signal?.aborted === true) {
            counts.failed += batch.length;
            continue;
          }

          try {
            const merged = await withTimeout(
              this.store.mergeRelationships(edgeType, batch),
              this.options.writeTimeoutMs,
              `Merge ${edgeType} batch`
            );
            counts.linked += merged.linkedCount;
            counts.existing += merged.existingCount;
            counts.skipped += merged.skippedCount;
          } catch (error) {
            const failure = new StorageWriteError(edgeType, batch.length, { cause: error });
            tracker?.trackBatchError(edgeType, batch.length, error);
            errors.push(failure.message);
            counts.failed += batch.length;
          }
        }

        return counts;
      }
    );

    const summary: RelationshipPhaseResult = {
      linked: 0,
      existing: 0,
      skipped: 0,
      failed: 0,
      byEdgeType: perType,
      errors,
    };
    for (const counts of perType) {
      summary.linked += counts.linked;
      summary.existing += counts.existing;
      summary.skipped += counts.skipped;
      summary.failed += counts.failed;
    }

    graphLogger.info(
      {
        linked: summary.linked,
        existing: summary.existing,
        skipped: summary.skipped,
        failed: summary.failed,
      },
      "Relationship merge finished"
    );

    return summary;
  }
}
