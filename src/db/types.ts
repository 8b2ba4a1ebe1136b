import type {
  ColumnType,
  Generated,
  Insertable,
  Selectable,
} from "kysely";

import type { PropertyMap } from "../types/index.js";

// ============================================================================
// Table Interfaces
// ============================================================================

/**
 * One node of the property graph. `label` is written on insert only.
 */
export interface GraphNodesTable {
  source_id: string;
  label: string;
  properties: ColumnType<PropertyMap, string, string>;
  source: string;
  created_at: Generated<Date>;
  synced_at: Date;
}

export interface GraphEdgesTable {
  id: Generated<number>;
  edge_type: string;
  from_id: string;
  to_id: string;
  created_at: Generated<Date>;
}

export interface SyncMetadataTable {
  sync_key: string;
  last_sync_at: Date;
  updated_at: Generated<Date>;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  graph_nodes: GraphNodesTable;
  graph_edges: GraphEdgesTable;
  sync_metadata: SyncMetadataTable;
}

// ============================================================================
// Helper Types
// ============================================================================

export type GraphNode = Selectable<GraphNodesTable>;
export type NewGraphNode = Insertable<GraphNodesTable>;

export type GraphEdge = Selectable<GraphEdgesTable>;
export type NewGraphEdge = Insertable<GraphEdgesTable>;

export type SyncMetadata = Selectable<SyncMetadataTable>;
