/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerGraphRoutes } from "./graph.js";
import { registerSchemaRoutes } from "./schema.js";
import { registerSyncRoutes } from "./sync.js";

import type { AppContext } from "../../services/context.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Union([Type.Literal("ok"), Type.Literal("degraded")]),
    database: Type.Boolean(),
    source: Type.Boolean(),
    sourceName: Type.String(),
  },
  {
    examples: [{ status: "ok", database: true, source: true, sourceName: "crm" }],
  }
);

export type ApiDeps = Pick<
  AppContext,
  "orchestrator" | "registry" | "store" | "client" | "checkDatabase"
>;

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description:
          "Returns the health status of the API, its database and the source system",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      const [database, source] = await Promise.all([
        deps.checkDatabase(),
        deps.client.checkConnection(),
      ]);
      return {
        status: database && source ? ("ok" as const) : ("degraded" as const),
        database,
        source,
        sourceName: deps.client.name,
      };
    }
  );

  // API v1 routes
  await app.register(
    (api) => {
      registerSyncRoutes(api, deps);
      registerSchemaRoutes(api, deps);
      registerGraphRoutes(api, deps);
    },
    { prefix: "/api/v1" }
  );
}
