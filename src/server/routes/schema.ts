/**
 * Schema API Routes - inspect and hot-reload the entity mapping
 */

import { Type } from "@sinclair/typebox";

import { ApiErrorSchema, createResponseSchema } from "../schemas/common.js";

import type { SchemaSnapshot } from "../../services/sync/schema-registry.js";
import type { AppContext } from "../../services/context.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const RelationRuleSchema = Type.Object({
  field: Type.String(),
  edgeType: Type.String(),
  targetLabel: Type.String(),
  direction: Type.Union([Type.Literal("OUTGOING"), Type.Literal("INCOMING")]),
});

const MappingEntrySchema = Type.Object({
  entityType: Type.String(),
  label: Type.String(),
  sourceModule: Type.String(),
  idField: Type.String(),
  fields: Type.Array(Type.String()),
  fieldTypes: Type.Record(Type.String(), Type.String()),
  nameProperty: Type.Union([Type.String(), Type.Null()]),
  relations: Type.Array(RelationRuleSchema),
  aliases: Type.Array(Type.String()),
});

const SchemaResponseSchema = createResponseSchema(
  Type.Object({
    version: Type.Number(),
    loadedAt: Type.String({ format: "date-time" }),
    labels: Type.Array(Type.String()),
    entities: Type.Array(MappingEntrySchema),
  })
);

const ReloadResponseSchema = createResponseSchema(
  Type.Object({
    version: Type.Number(),
    loadedAt: Type.String({ format: "date-time" }),
    entityTypes: Type.Array(Type.String()),
  })
);

// ============================================================================
// Helper Functions
// ============================================================================

function describeSnapshot(snapshot: SchemaSnapshot) {
  return {
    version: snapshot.version,
    loadedAt: snapshot.loadedAt.toISOString(),
    labels: snapshot.labels(),
    entities: [...snapshot.entries.values()].map((entry) => ({
      entityType: entry.entityType,
      label: entry.nodeLabel,
      sourceModule: entry.sourceModule,
      idField: entry.idField,
      fields: [...entry.fields],
      fieldTypes: { ...entry.fieldTypes },
      nameProperty: entry.nameProperty,
      relations: entry.relations.map((rule) => ({ ...rule })),
      aliases: [...entry.aliases],
    })),
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerSchemaRoutes(
  app: FastifyInstance,
  deps: Pick<AppContext, "registry">
): void {
  const { registry } = deps;

  app.get(
    "/schema",
    {
      schema: {
        summary: "Get the active mapping",
        description: "Entity types, node labels, whitelisted fields and relation rules",
        tags: ["Schema"],
        response: {
          200: SchemaResponseSchema,
        },
      },
    },
    () => ({ data: describeSnapshot(registry.snapshot()) })
  );

  // A failed reload keeps the previous mapping active and answers 422
  app.post(
    "/schema/reload",
    {
      schema: {
        summary: "Reload the mapping file",
        description:
          "Re-reads and validates the mapping file, then swaps it in. Runs already started keep their mapping.",
        tags: ["Schema"],
        response: {
          200: ReloadResponseSchema,
          422: ApiErrorSchema,
        },
      },
    },
    (request) => {
      const snapshot = registry.reload();
      request.log.info({ version: snapshot.version }, "Schema mapping reloaded");
      return {
        data: {
          version: snapshot.version,
          loadedAt: snapshot.loadedAt.toISOString(),
          entityTypes: snapshot.entityTypes(),
        },
      };
    }
  );
}
