import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTestApp, type TestApp } from "../../../mocks/app.js";

import type { ApiError } from "../../../../src/types/api.js";

describe("server/routes/graph", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  describe("GET /api/v1/graph/stats", () => {
    it("should report counts and the last sync time", async () => {
      const result = await ctx.orchestrator.sync(["Users", "Accounts"]);

      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/graph/stats" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: {
          totalNodes: 4,
          totalEdges: 3,
          nodesByLabel: [
            { label: "User", count: 2 },
            { label: "Account", count: 2 },
          ],
          edgesByType: [
            { edgeType: "HAS_OWNER", count: 2 },
            { edgeType: "PARENT_OF", count: 1 },
          ],
          lastSyncAt: result.startedAt.toISOString(),
        },
      });
    });

    it("should answer 503 when the store is unreachable", async () => {
      vi.spyOn(ctx.store, "getStats").mockRejectedValue(new Error("connection refused"));

      const response = await ctx.app.inject({ method: "GET", url: "/api/v1/graph/stats" });

      expect(response.statusCode).toBe(503);
      expect(response.json<ApiError>()).toMatchObject({
        error: "DATABASE_ERROR",
        message: "Graph store is unavailable",
      });
    });
  });

  describe("GET /health", () => {
    it("should report a healthy database and source", async () => {
      const response = await ctx.app.inject({ method: "GET", url: "/health" });

      expect(response.json()).toEqual({
        status: "ok",
        database: true,
        source: true,
        sourceName: "test-crm",
      });
    });

    it("should report a degraded service without a database", async () => {
      ctx.database.healthy = false;

      const response = await ctx.app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "degraded",
        database: false,
        source: true,
        sourceName: "test-crm",
      });
    });

    it("should report a degraded service when the source is unreachable", async () => {
      ctx.client.healthy = false;

      const response = await ctx.app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: "degraded",
        database: true,
        source: false,
        sourceName: "test-crm",
      });
    });
  });
});
