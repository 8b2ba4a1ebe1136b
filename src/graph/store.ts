/**
 * Graph Store - property graph persisted in PostgreSQL.
 *
 * Nodes are keyed by their namespaced source id and merged on every write;
 * edges are created only between nodes that already exist.
 */

import { sql, type Kysely } from "kysely";

import { graphLogger } from "../logger.js";
import { jsonb } from "../db/sql.js";
import { GENERIC_LABEL } from "../types/index.js";

import type { Database } from "../db/types.js";
import type { GraphEntity, RelationCandidate } from "../types/index.js";

// ============================================================================
// Contract
// ============================================================================

export interface NodeUpsertResult {
  createdKeys: string[];
  updatedKeys: string[];
}

export interface RelationshipMergeResult {
  /** New edges written */
  linkedCount: number;
  /** Both endpoints exist and the edge was already present */
  existingCount: number;
  /** At least one endpoint is missing (or has the wrong label) */
  skippedCount: number;
}

export interface GraphStats {
  totalNodes: number;
  totalEdges: number;
  nodesByLabel: { label: string; count: number }[];
  edgesByType: { edgeType: string; count: number }[];
  lastSyncAt: Date | null;
}

export const DEFAULT_SYNC_KEY = "crm_sync";

/**
 * Everything the sync engine needs from the graph. Accepts only typed
 * entities and candidates, never raw source records.
 */
export interface GraphStore {
  upsertNodes(label: string, entities: GraphEntity[]): Promise<NodeUpsertResult>;
  mergeRelationships(
    edgeType: string,
    candidates: RelationCandidate[]
  ): Promise<RelationshipMergeResult>;
  getLastSyncTime(syncKey?: string): Promise<Date | null>;
  setLastSyncTime(at: Date, syncKey?: string): Promise<void>;
  getStats(): Promise<GraphStats>;
}

// ============================================================================
// PostgreSQL Implementation
// ============================================================================

/** Namespace part of a source id ("crm:123" -> "crm") */
function sourceOf(sourceId: string): string {
  const separator = sourceId.indexOf(":");
  return separator > 0 ? sourceId.slice(0, separator) : "unknown";
}

export class PostgresGraphStore implements GraphStore {
  constructor(private readonly db: Kysely<Database>) {}

  /**
   * Upsert one batch of nodes of a single label.
   *
   * Existing nodes get their properties merged and `synced_at` refreshed;
   * the label column is never updated. xmax = 0 tells an insert from an
   * update.
   */
  async upsertNodes(
    label: string,
    entities: GraphEntity[]
  ): Promise<NodeUpsertResult> {
    // ON CONFLICT DO UPDATE cannot touch the same row twice in one statement
    const unique = [...new Map(entities.map((e) => [e.sourceId, e])).values()];
    if (unique.length === 0) {
      return { createdKeys: [], updatedKeys: [] };
    }

    const values = unique.map(
      (e) => sql`(
        ${e.sourceId},
        ${label},
        ${jsonb(e.properties)},
        ${sourceOf(e.sourceId)},
        ${e.syncedAt}
      )`
    );

    const result = await sql<{ source_id: string; xmax: string }>`
      INSERT INTO graph_nodes (source_id, label, properties, source, synced_at)
      VALUES ${sql.join(values, sql`, `)}
      ON CONFLICT (source_id) DO UPDATE SET
        properties = graph_nodes.properties || EXCLUDED.properties,
        source = EXCLUDED.source,
        synced_at = EXCLUDED.synced_at
      RETURNING source_id, xmax::text
    `.execute(this.db);

    const createdKeys: string[] = [];
    const updatedKeys: string[] = [];
    for (const row of result.rows) {
      if (row.xmax === "0") {
        createdKeys.push(row.source_id);
      } else {
        updatedKeys.push(row.source_id);
      }
    }

    graphLogger.debug(
      { label, created: createdKeys.length, updated: updatedKeys.length },
      "Upserted node batch"
    );

    return { createdKeys, updatedKeys };
  }

  /**
   * Create edges of one type for candidates whose endpoints both exist.
   * Never creates a node.
   */
  async mergeRelationships(
    edgeType: string,
    candidates: RelationCandidate[]
  ): Promise<RelationshipMergeResult> {
    if (candidates.length === 0) {
      return { linkedCount: 0, existingCount: 0, skippedCount: 0 };
    }

    const input = candidates.map(
      (c) =>
        sql`(${c.sourceId}::text, ${c.targetId}::text, ${c.targetLabel}::text, ${c.direction}::text)`
    );

    const result = await sql<{ matched: number; linked: number }>`
      WITH input (owner_id, target_id, target_label, direction) AS (
        VALUES ${sql.join(input, sql`, `)}
      ),
      matched AS (
        SELECT
          CASE WHEN i.direction = 'OUTGOING' THEN i.owner_id ELSE i.target_id END AS from_id,
          CASE WHEN i.direction = 'OUTGOING' THEN i.target_id ELSE i.owner_id END AS to_id
        FROM input i
        JOIN graph_nodes owner_node ON owner_node.source_id = i.owner_id
        JOIN graph_nodes target_node ON target_node.source_id = i.target_id
          AND (i.target_label = ${GENERIC_LABEL} OR target_node.label = i.target_label)
      ),
      inserted AS (
        INSERT INTO graph_edges (edge_type, from_id, to_id)
        SELECT ${edgeType}, from_id, to_id FROM matched
        ON CONFLICT (edge_type, from_id, to_id) DO NOTHING
        RETURNING 1
      )
      SELECT
        (SELECT COUNT(*)::int FROM matched) AS matched,
        (SELECT COUNT(*)::int FROM inserted) AS linked
    `.execute(this.db);

    const row = result.rows[0];
    const matched = row?.matched ?? 0;
    const linked = row?.linked ?? 0;

    const counts = {
      linkedCount: linked,
      existingCount: matched - linked,
      skippedCount: candidates.length - matched,
    };

    graphLogger.debug({ edgeType, ...counts }, "Merged relationship batch");

    return counts;
  }

  async getLastSyncTime(syncKey = DEFAULT_SYNC_KEY): Promise<Date | null> {
    const row = await this.db
      .selectFrom("sync_metadata")
      .select("last_sync_at")
      .where("sync_key", "=", syncKey)
      .executeTakeFirst();
    return row?.last_sync_at ?? null;
  }

  async setLastSyncTime(at: Date, syncKey = DEFAULT_SYNC_KEY): Promise<void> {
    await this.db
      .insertInto("sync_metadata")
      .values({ sync_key: syncKey, last_sync_at: at })
      .onConflict((oc) =>
        oc.column("sync_key").doUpdateSet({
          last_sync_at: at,
          updated_at: sql<Date>`NOW()`,
        })
      )
      .execute();
  }

  async getStats(): Promise<GraphStats> {
    const [nodesByLabel, edgesByType, lastSyncAt] = await Promise.all([
      this.db
        .selectFrom("graph_nodes")
        .select(["label", sql<number>`COUNT(*)::int`.as("count")])
        .groupBy("label")
        .orderBy("label")
        .execute(),
      this.db
        .selectFrom("graph_edges")
        .select(["edge_type", sql<number>`COUNT(*)::int`.as("count")])
        .groupBy("edge_type")
        .orderBy("edge_type")
        .execute(),
      this.getLastSyncTime(),
    ]);

    return {
      totalNodes: nodesByLabel.reduce((sum, row) => sum + row.count, 0),
      totalEdges: edgesByType.reduce((sum, row) => sum + row.count, 0),
      nodesByLabel,
      edgesByType: edgesByType.map((row) => ({
        edgeType: row.edge_type,
        count: row.count,
      })),
      lastSyncAt,
    };
  }
}
