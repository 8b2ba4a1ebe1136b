/**
 * Sync API Routes
 *
 * Runs a synchronization synchronously and reports the outcome; a second
 * request while a run is active is rejected with 409.
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  ConflictError,
  SyncFailedError,
  ValidationError,
} from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  DateTimeOrNullSchema,
  EntityTypeResultSchema,
  RelationshipSummarySchema,
  SyncPhaseSchema,
  SyncStatusSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { AppContext } from "../../services/context.js";
import type { SyncResponseDto } from "../../types/api.js";
import type { SyncResult } from "../../types/index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SyncBodySchema = Type.Object({
  entity_types: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  max_pages: Type.Optional(Type.Integer({ minimum: 1 })),
});

type SyncBody = Static<typeof SyncBodySchema>;

const SyncResponseSchema = Type.Object(
  {
    run_id: Type.String(),
    status: SyncStatusSchema,
    cancelled: Type.Boolean(),
    entities_synced: Type.Number(),
    entities_created: Type.Number(),
    entities_updated: Type.Number(),
    relationships_linked: Type.Number(),
    entity_types: Type.Array(Type.String()),
    errors: Type.Array(Type.String()),
    duration_ms: Type.Number(),
    details: Type.Object({
      entity_types: Type.Array(EntityTypeResultSchema),
      relationships: RelationshipSummarySchema,
    }),
  },
  {
    examples: [
      {
        run_id: "5f0c7a9e-3c1b-4a53-9a65-0d2f1b9e7c41",
        status: "DONE",
        cancelled: false,
        entities_synced: 3,
        entities_created: 2,
        entities_updated: 1,
        relationships_linked: 2,
        entity_types: ["Users", "Accounts"],
        errors: [],
        duration_ms: 1840,
        details: {
          entity_types: [],
          relationships: {
            linked: 2,
            existing: 0,
            skipped: 0,
            failed: 0,
            byEdgeType: [],
          },
        },
      },
    ],
  }
);

const SyncStatusResponseSchema = createResponseSchema(
  Type.Object({
    isRunning: Type.Boolean(),
    runId: Type.Union([Type.String(), Type.Null()]),
    phase: SyncPhaseSchema,
    currentStep: Type.Union([Type.String(), Type.Null()]),
    entityTypes: Type.Array(Type.String()),
    progress: Type.Object({
      current: Type.Number(),
      total: Type.Number(),
    }),
    startedAt: DateTimeOrNullSchema,
    completedAt: DateTimeOrNullSchema,
    durationMs: Type.Union([Type.Number(), Type.Null()]),
    lastResult: Type.Union([SyncResponseSchema, Type.Null()]),
  })
);

// ============================================================================
// Helper Functions
// ============================================================================

export function toSyncResponseDto(result: SyncResult): SyncResponseDto {
  const created = result.entityTypes.reduce((sum, t) => sum + t.created, 0);
  const updated = result.entityTypes.reduce((sum, t) => sum + t.updated, 0);

  return {
    run_id: result.runId,
    status: result.status,
    cancelled: result.cancelled,
    entities_synced: created + updated,
    entities_created: created,
    entities_updated: updated,
    relationships_linked: result.relationships.linked,
    entity_types: result.entityTypes
      .filter((t) => t.outcome === "SUCCEEDED")
      .map((t) => t.entityType),
    errors: result.errors,
    duration_ms: result.durationMs,
    details: {
      entity_types: result.entityTypes,
      relationships: result.relationships,
    },
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export type SyncRouteDeps = Pick<AppContext, "orchestrator" | "registry">;

export function registerSyncRoutes(app: FastifyInstance, deps: SyncRouteDeps): void {
  const { orchestrator, registry } = deps;

  // POST /sync - Run a full sync of the given entity types
  app.post<{ Body: SyncBody }>(
    "/sync",
    {
      schema: {
        summary: "Run a sync",
        description:
          "Fetches every record of the requested entity types and upserts them into the graph. " +
          "Answers once the run has finished.",
        tags: ["Sync"],
        body: SyncBodySchema,
        response: {
          200: SyncResponseSchema,
          400: ApiErrorSchema,
          409: ApiErrorSchema,
          502: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const { entity_types: entityTypes, max_pages: maxPages } = request.body;

      const snapshot = registry.snapshot();
      const unknown = entityTypes.filter((type) => !snapshot.has(type));
      if (unknown.length > 0) {
        throw new ValidationError(
          `Unknown entity types: ${unknown.join(", ")}`,
          { unknown, known: snapshot.entityTypes() }
        );
      }

      if (orchestrator.isRunning()) {
        throw new ConflictError("A sync run is already in progress");
      }

      request.log.info({ entityTypes, maxPages }, "Sync requested");
      const result = await orchestrator.sync(entityTypes, { maxPages });
      const dto = toSyncResponseDto(result);

      if (result.status === "FAILED") {
        throw new SyncFailedError("Sync failed for every requested entity type", {
          run_id: dto.run_id,
          errors: dto.errors,
          entity_types: dto.details.entity_types,
        });
      }

      return dto;
    }
  );

  // GET /sync/status - Current or last run
  app.get(
    "/sync/status",
    {
      schema: {
        summary: "Get sync status",
        description: "Progress of the running sync, or the outcome of the last one",
        tags: ["Sync"],
        response: {
          200: SyncStatusResponseSchema,
        },
      },
    },
    () => {
      const status = orchestrator.status.getStatus();
      return {
        data: {
          isRunning: status.isRunning,
          runId: status.runId,
          phase: status.phase,
          currentStep: status.currentStep,
          entityTypes: status.entityTypes,
          progress: status.progress,
          startedAt: status.startedAt?.toISOString() ?? null,
          completedAt: status.completedAt?.toISOString() ?? null,
          durationMs: status.durationMs,
          lastResult:
            status.lastResult === null ? null : toSyncResponseDto(status.lastResult),
        },
      };
    }
  );
}
