/**
 * Graph API Routes
 */

import { Type } from "@sinclair/typebox";

import { DatabaseError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  DateTimeOrNullSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { AppContext } from "../../services/context.js";
import type { FastifyInstance } from "fastify";

const GraphStatsResponseSchema = createResponseSchema(
  Type.Object({
    totalNodes: Type.Number(),
    totalEdges: Type.Number(),
    nodesByLabel: Type.Array(
      Type.Object({ label: Type.String(), count: Type.Number() })
    ),
    edgesByType: Type.Array(
      Type.Object({ edgeType: Type.String(), count: Type.Number() })
    ),
    lastSyncAt: DateTimeOrNullSchema,
  })
);

export function registerGraphRoutes(
  app: FastifyInstance,
  deps: Pick<AppContext, "store">
): void {
  const { store } = deps;

  app.get(
    "/graph/stats",
    {
      schema: {
        summary: "Graph statistics",
        description: "Node counts per label, edge counts per type and the last sync time",
        tags: ["Graph"],
        response: {
          200: GraphStatsResponseSchema,
          503: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      try {
        const stats = await store.getStats();
        return {
          data: {
            ...stats,
            lastSyncAt: stats.lastSyncAt?.toISOString() ?? null,
          },
        };
      } catch (error) {
        request.log.error(error, "Failed to read graph statistics");
        throw new DatabaseError("Graph store is unavailable");
      }
    }
  );
}
