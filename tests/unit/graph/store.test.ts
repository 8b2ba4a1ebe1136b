import { beforeEach, describe, expect, it } from "vitest";

import { PostgresGraphStore } from "../../../src/graph/store.js";
import { RecordingDatabase } from "../../mocks/kysely.js";

import type { GraphEntity, RelationCandidate } from "../../../src/types/index.js";

const syncedAt = new Date("2025-06-01T12:00:00.000Z");

function account(id: string, name: string): GraphEntity {
  return { sourceId: `crm:${id}`, label: "Account", properties: { name }, syncedAt };
}

function owner(contactId: string, userId: string): RelationCandidate {
  return {
    sourceId: `crm:${contactId}`,
    targetId: `crm:${userId}`,
    edgeType: "HAS_OWNER",
    targetLabel: "User",
    direction: "OUTGOING",
  };
}

describe("graph/store", () => {
  let recorder: RecordingDatabase;
  let store: PostgresGraphStore;

  beforeEach(() => {
    recorder = new RecordingDatabase();
    store = new PostgresGraphStore(recorder.db);
  });

  describe("upsertNodes", () => {
    it("should merge properties on conflict and tell inserts from updates", async () => {
      recorder.respond("INSERT INTO graph_nodes", [
        { source_id: "crm:a1", xmax: "0" },
        { source_id: "crm:a2", xmax: "48213" },
      ]);

      const result = await store.upsertNodes("Account", [
        account("a1", "Acme Corp"),
        account("a2", "Acme Labs"),
      ]);

      expect(result).toEqual({ createdKeys: ["crm:a1"], updatedKeys: ["crm:a2"] });
      const query = recorder.queries[0];
      expect(query?.sql).toContain(
        "properties = graph_nodes.properties || EXCLUDED.properties"
      );
      expect(query?.sql).not.toContain("label = EXCLUDED.label");
      expect(query?.parameters).toEqual([
        "crm:a1",
        "Account",
        '{"name":"Acme Corp"}',
        "crm",
        syncedAt,
        "crm:a2",
        "Account",
        '{"name":"Acme Labs"}',
        "crm",
        syncedAt,
      ]);
    });

    it("should send each source id once per statement", async () => {
      await store.upsertNodes("Account", [account("a1", "Old"), account("a1", "New")]);

      expect(recorder.queries[0]?.parameters).toEqual([
        "crm:a1",
        "Account",
        '{"name":"New"}',
        "crm",
        syncedAt,
      ]);
    });

    it("should not query for an empty batch", async () => {
      const result = await store.upsertNodes("Account", []);

      expect(result).toEqual({ createdKeys: [], updatedKeys: [] });
      expect(recorder.queries).toEqual([]);
    });
  });

  describe("mergeRelationships", () => {
    it("should derive linked, existing and skipped counts", async () => {
      recorder.respond("INSERT INTO graph_edges", [{ matched: 3, linked: 2 }]);

      const result = await store.mergeRelationships("HAS_OWNER", [
        owner("c1", "u1"),
        owner("c2", "u1"),
        owner("c3", "u2"),
        owner("c4", "u404"),
      ]);

      expect(result).toEqual({ linkedCount: 2, existingCount: 1, skippedCount: 1 });
    });

    it("should match endpoints without creating nodes", async () => {
      await store.mergeRelationships("HAS_OWNER", [owner("c1", "u1")]);

      const query = recorder.queries[0];
      expect(query?.sql).not.toContain("INSERT INTO graph_nodes");
      expect(query?.sql).toContain("ON CONFLICT (edge_type, from_id, to_id) DO NOTHING");
      expect(query?.parameters).toEqual([
        "crm:c1",
        "crm:u1",
        "User",
        "OUTGOING",
        "Entity",
        "HAS_OWNER",
      ]);
    });

    it("should count every candidate as skipped when nothing matches", async () => {
      const result = await store.mergeRelationships("HAS_OWNER", [
        owner("c1", "u404"),
        owner("c2", "u405"),
      ]);

      expect(result).toEqual({ linkedCount: 0, existingCount: 0, skippedCount: 2 });
    });
  });

  describe("sync metadata", () => {
    it("should read the last sync time", async () => {
      recorder.respond('from "sync_metadata"', [{ last_sync_at: syncedAt }]);

      await expect(store.getLastSyncTime()).resolves.toEqual(syncedAt);
      expect(recorder.queries[0]?.parameters).toEqual(["crm_sync"]);
    });

    it("should return null before the first sync", async () => {
      await expect(store.getLastSyncTime("other")).resolves.toBeNull();
      expect(recorder.queries[0]?.parameters).toEqual(["other"]);
    });

    it("should upsert the last sync time", async () => {
      await store.setLastSyncTime(syncedAt);

      const query = recorder.queries[0];
      expect(query?.sql).toContain('insert into "sync_metadata"');
      expect(query?.sql).toContain('on conflict ("sync_key") do update set');
      expect(query?.parameters).toEqual(["crm_sync", syncedAt, syncedAt]);
    });
  });

  describe("getStats", () => {
    it("should aggregate counts per label and edge type", async () => {
      recorder.respond('from "graph_nodes"', [
        { label: "Account", count: 2 },
        { label: "User", count: 1 },
      ]);
      recorder.respond('from "graph_edges"', [{ edge_type: "HAS_OWNER", count: 2 }]);
      recorder.respond('from "sync_metadata"', [{ last_sync_at: syncedAt }]);

      const stats = await store.getStats();

      expect(stats).toEqual({
        totalNodes: 3,
        totalEdges: 2,
        nodesByLabel: [
          { label: "Account", count: 2 },
          { label: "User", count: 1 },
        ],
        edgesByType: [{ edgeType: "HAS_OWNER", count: 2 }],
        lastSyncAt: syncedAt,
      });
    });
  });
});
