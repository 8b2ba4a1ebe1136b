/**
 * API Request/Response Types
 */

import type { EntityTypeResult, RelationshipSummary, SyncStatus } from "./index.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sync Types
// ============================================================================

export interface SyncResponseDto {
  run_id: string;
  status: SyncStatus;
  cancelled: boolean;
  entities_synced: number;
  entities_created: number;
  entities_updated: number;
  relationships_linked: number;
  entity_types: string[];
  errors: string[];
  duration_ms: number;
  details: {
    entity_types: EntityTypeResult[];
    relationships: RelationshipSummary;
  };
}
