/**
 * OpenAPI Plugin - serves the OpenAPI 3.0 document of the sync API
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "CRM Graph Sync API",
        description:
          "Triggers and monitors synchronization of CRM records into the property graph, " +
          "and exposes the active schema mapping and graph statistics.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Sync",
          description: "Run a synchronization and inspect its progress",
        },
        {
          name: "Schema",
          description: "Active entity mapping and hot reload",
        },
        {
          name: "Graph",
          description: "Node and edge counts of the synced graph",
        },
        {
          name: "Health",
          description: "Liveness and dependency checks",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
