// ============================================================================
// Source Records (ingestion boundary)
// ============================================================================

/**
 * A record as returned by the source system. Nothing about its shape is
 * trusted until it has gone through the sanitizer.
 */
export type RawRecord = unknown;

/** Filter forwarded verbatim to the source client */
export type SourceFilter = Record<string, string | number | boolean>;

// ============================================================================
// Graph Model
// ============================================================================

export type Scalar = string | number | boolean;

/**
 * Values the graph store accepts: scalars, JSON text (a string) or
 * homogeneous scalar sequences.
 */
export type PropertyValue = Scalar | string[] | number[] | boolean[];

export type PropertyMap = Record<string, PropertyValue>;

export type RelationDirection = "OUTGOING" | "INCOMING";

/** Label every node carries; a relation rule targeting it matches any node */
export const GENERIC_LABEL = "Entity";

export interface GraphEntity {
  /** Namespaced external id, e.g. "crm:12345" */
  sourceId: string;
  label: string;
  properties: PropertyMap;
  syncedAt: Date;
}

/**
 * A relationship to be written if both endpoints exist.
 * `direction` is relative to the record holding the foreign-key field
 * (`sourceId`).
 */
export interface RelationCandidate {
  sourceId: string;
  targetId: string;
  edgeType: string;
  targetLabel: string;
  direction: RelationDirection;
}

// ============================================================================
// Schema Mapping
// ============================================================================

export type FieldType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "date"
  | "datetime";

export interface RelationRule {
  field: string;
  edgeType: string;
  targetLabel: string;
  direction: RelationDirection;
}

export interface MappingEntry {
  entityType: string;
  nodeLabel: string;
  /** Module name on the source side; defaults to the entity type */
  sourceModule: string;
  idField: string;
  fields: ReadonlySet<string>;
  fieldTypes: Readonly<Record<string, FieldType>>;
  /** Property receiving the record's own display name, if any */
  nameProperty: string | null;
  relations: readonly RelationRule[];
  aliases: readonly string[];
  sharedLabel: boolean;
}

// ============================================================================
// Sync Results
// ============================================================================

export type SyncStatus = "DONE" | "PARTIAL_FAILURE" | "FAILED";

export type SyncPhase =
  | "IDLE"
  | "FETCHING"
  | "MAPPING"
  | "UPSERTING_NODES"
  | "UPSERTING_RELATIONSHIPS"
  | SyncStatus;

export type EntityTypeOutcome = "SUCCEEDED" | "FAILED";

export interface EntityTypeResult {
  entityType: string;
  label: string | null;
  outcome: EntityTypeOutcome;
  fetched: number;
  created: number;
  updated: number;
  skipped: number;
  errors: string[];
}

export interface EdgeTypeResult {
  edgeType: string;
  candidates: number;
  linked: number;
  existing: number;
  skipped: number;
  failed: number;
}

export interface RelationshipSummary {
  linked: number;
  existing: number;
  skipped: number;
  failed: number;
  byEdgeType: EdgeTypeResult[];
}

export interface SyncResult {
  runId: string;
  status: SyncStatus;
  cancelled: boolean;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  entityTypes: EntityTypeResult[];
  relationships: RelationshipSummary;
  errors: string[];
}

export interface SyncProgress {
  phase: SyncPhase;
  current: number;
  total: number;
  currentItem?: string;
}

export type ProgressCallback = (progress: SyncProgress) => void;
