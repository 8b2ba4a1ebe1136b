/**
 * Common TypeBox schemas for API validation
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

// ============================================================================
// Sync Schemas
// ============================================================================

export const SyncStatusSchema = Type.Union([
  Type.Literal("DONE"),
  Type.Literal("PARTIAL_FAILURE"),
  Type.Literal("FAILED"),
]);

export const SyncPhaseSchema = Type.Union([
  Type.Literal("IDLE"),
  Type.Literal("FETCHING"),
  Type.Literal("MAPPING"),
  Type.Literal("UPSERTING_NODES"),
  Type.Literal("UPSERTING_RELATIONSHIPS"),
  Type.Literal("DONE"),
  Type.Literal("PARTIAL_FAILURE"),
  Type.Literal("FAILED"),
]);

export const EntityTypeResultSchema = Type.Object({
  entityType: Type.String(),
  label: Type.Union([Type.String(), Type.Null()]),
  outcome: Type.Union([Type.Literal("SUCCEEDED"), Type.Literal("FAILED")]),
  fetched: Type.Number(),
  created: Type.Number(),
  updated: Type.Number(),
  skipped: Type.Number(),
  errors: Type.Array(Type.String()),
});

export const EdgeTypeResultSchema = Type.Object({
  edgeType: Type.String(),
  candidates: Type.Number(),
  linked: Type.Number(),
  existing: Type.Number(),
  skipped: Type.Number(),
  failed: Type.Number(),
});

export const RelationshipSummarySchema = Type.Object({
  linked: Type.Number(),
  existing: Type.Number(),
  skipped: Type.Number(),
  failed: Type.Number(),
  byEdgeType: Type.Array(EdgeTypeResultSchema),
});

export const DateTimeOrNullSchema = Type.Union([
  Type.String({ format: "date-time" }),
  Type.Null(),
]);
