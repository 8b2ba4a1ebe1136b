import { beforeEach, describe, expect, it } from "vitest";

import {
  BatchUpserter,
  dedupeCandidates,
  dedupeEntities,
} from "../../../../src/services/sync/batch-upserter.js";
import {
  ErrorTracker,
  StorageWriteError,
  SyncCancelledError,
} from "../../../../src/services/sync/errors.js";
import { InMemoryGraphStore } from "../../../mocks/graph-store.js";

import type { NodeUpsertResult } from "../../../../src/graph/store.js";
import type {
  GraphEntity,
  PropertyMap,
  RelationCandidate,
  RelationDirection,
} from "../../../../src/types/index.js";

const syncedAt = new Date("2025-06-01T12:00:00.000Z");

function entity(sourceId: string, label: string, properties: PropertyMap = {}): GraphEntity {
  return { sourceId, label, properties, syncedAt };
}

function candidate(
  sourceId: string,
  edgeType: string,
  targetId: string,
  targetLabel: string,
  direction: RelationDirection = "OUTGOING"
): RelationCandidate {
  return { sourceId, targetId, edgeType, targetLabel, direction };
}

class HangingGraphStore extends InMemoryGraphStore {
  override upsertNodes(): Promise<NodeUpsertResult> {
    return new Promise<NodeUpsertResult>(() => undefined);
  }
}

describe("services/sync/batch-upserter", () => {
  describe("dedupeEntities", () => {
    it("should keep the last occurrence of a source id", () => {
      const result = dedupeEntities([
        entity("crm:a1", "Account", { name: "Old" }),
        entity("crm:a2", "Account"),
        entity("crm:a1", "Account", { name: "New" }),
      ]);

      expect(result.map((e) => e.sourceId)).toEqual(["crm:a1", "crm:a2"]);
      expect(result[0]?.properties).toEqual({ name: "New" });
    });
  });

  describe("dedupeCandidates", () => {
    it("should treat both directions of the same edge as one", () => {
      const outgoing = candidate("crm:a1", "PARENT_OF", "crm:a2", "Account", "OUTGOING");
      const incoming = candidate("crm:a2", "PARENT_OF", "crm:a1", "Account", "INCOMING");

      expect(dedupeCandidates([outgoing, incoming, outgoing])).toEqual([outgoing]);
    });
  });

  describe("BatchUpserter", () => {
    let store: InMemoryGraphStore;
    let upserter: BatchUpserter;

    beforeEach(() => {
      store = new InMemoryGraphStore();
      upserter = new BatchUpserter(store, {
        batchSize: 2,
        writeTimeoutMs: 1000,
        labelConcurrency: 2,
      });
    });

    describe("upsertNodes", () => {
      const entities = [
        entity("crm:a1", "Account"),
        entity("crm:a2", "Account"),
        entity("crm:a3", "Account"),
        entity("crm:u1", "User"),
      ];

      it("should write chunks per label and report created keys", async () => {
        const result = await upserter.upsertNodes(entities);

        expect([...result.createdKeys].sort()).toEqual([
          "crm:a1",
          "crm:a2",
          "crm:a3",
          "crm:u1",
        ]);
        expect(result.updatedKeys.size).toBe(0);
        expect(result.failures).toEqual([]);
        expect(
          store.calls.filter((c) => c.group === "Account").map((c) => c.size)
        ).toEqual([2, 1]);
      });

      it("should report updates on a second run", async () => {
        await upserter.upsertNodes(entities);

        const result = await upserter.upsertNodes(entities);

        expect(result.createdKeys.size).toBe(0);
        expect(result.updatedKeys.size).toBe(4);
        expect(store.nodes.size).toBe(4);
      });

      it("should isolate a failing label", async () => {
        store.failingGroups.add("User");
        const tracker = new ErrorTracker();

        const result = await upserter.upsertNodes(entities, { tracker });

        expect(result.createdKeys.size).toBe(3);
        expect(result.failures).toHaveLength(1);
        expect(result.failures[0]?.label).toBe("User");
        expect(result.failures[0]?.sourceIds).toEqual(["crm:u1"]);
        expect(result.failures[0]?.error).toBeInstanceOf(StorageWriteError);
        expect(result.failures[0]?.error.message).toBe(
          "Batch User (1 items) failed: connection reset while writing User"
        );
        expect(tracker.totals.batchErrors).toBe(1);
      });

      it("should fail writes that exceed the timeout", async () => {
        const hanging = new BatchUpserter(new HangingGraphStore(), {
          batchSize: 10,
          writeTimeoutMs: 10,
          labelConcurrency: 1,
        });

        const result = await hanging.upsertNodes([entity("crm:a1", "Account")]);

        expect(result.failures[0]?.error.message).toBe(
          "Batch Account (1 items) failed: Upsert Account batch timed out after 10ms"
        );
      });

      it("should not write once cancelled", async () => {
        const controller = new AbortController();
        controller.abort();

        const result = await upserter.upsertNodes(entities, { signal: controller.signal });

        expect(store.calls).toEqual([]);
        expect(result.failures).toHaveLength(3);
        expect(result.failures.every((f) => f.error instanceof SyncCancelledError)).toBe(
          true
        );
      });
    });

    describe("mergeRelationships", () => {
      beforeEach(async () => {
        await store.upsertNodes("Account", [entity("crm:a1", "Account"), entity("crm:a2", "Account")]);
        await store.upsertNodes("User", [entity("crm:u1", "User")]);
        await store.upsertNodes("Contact", [entity("crm:c1", "Contact")]);
      });

      const candidates = [
        candidate("crm:c1", "WORKS_AT", "crm:a1", "Account"),
        candidate("crm:c1", "HAS_OWNER", "crm:u1", "User"),
        candidate("crm:c1", "HAS_OWNER", "crm:u404", "User"),
        candidate("crm:c1", "WORKS_AT", "crm:u1", "Account"),
        candidate("crm:c1", "WORKS_AT", "crm:a1", "Account"),
      ];

      it("should link existing endpoints and skip the rest", async () => {
        const result = await upserter.mergeRelationships(candidates);

        expect(result).toEqual({
          linked: 2,
          existing: 0,
          skipped: 2,
          failed: 0,
          errors: [],
          byEdgeType: [
            { edgeType: "WORKS_AT", candidates: 2, linked: 1, existing: 0, skipped: 1, failed: 0 },
            { edgeType: "HAS_OWNER", candidates: 2, linked: 1, existing: 0, skipped: 1, failed: 0 },
          ],
        });
        expect(store.hasEdge("WORKS_AT", "crm:c1", "crm:a1")).toBe(true);
        expect(store.edges).toHaveLength(2);
      });

      it("should count already present edges on a second run", async () => {
        await upserter.mergeRelationships(candidates);

        const result = await upserter.mergeRelationships(candidates);

        expect(result.linked).toBe(0);
        expect(result.existing).toBe(2);
        expect(store.edges).toHaveLength(2);
      });

      it("should orient incoming edges from the target", async () => {
        await upserter.mergeRelationships([
          candidate("crm:a2", "PARENT_OF", "crm:a1", "Account", "INCOMING"),
        ]);

        expect(store.hasEdge("PARENT_OF", "crm:a1", "crm:a2")).toBe(true);
      });

      it("should isolate a failing edge type", async () => {
        store.failingGroups.add("HAS_OWNER");

        const result = await upserter.mergeRelationships(candidates);

        expect(result.linked).toBe(1);
        expect(result.failed).toBe(2);
        expect(result.errors).toEqual([
          "Batch HAS_OWNER (2 items) failed: connection reset while writing HAS_OWNER",
        ]);
      });

      it("should count every candidate as failed once cancelled", async () => {
        const controller = new AbortController();
        controller.abort();

        const result = await upserter.mergeRelationships(candidates, {
          signal: controller.signal,
        });

        expect(result.failed).toBe(4);
        expect(store.edges).toEqual([]);
      });
    });
  });
});
