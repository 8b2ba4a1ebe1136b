import { afterEach, describe, expect, it } from "vitest";

import { buildSnapshot } from "../../../../src/services/sync/schema-registry.js";
import {
  RecordSanitizer,
  composeName,
  presentText,
  resolveDisplayName,
} from "../../../../src/services/sync/sanitizer.js";
import { accounts, contacts, testSchemaDocument } from "../../../fixtures/crm.js";

const snapshot = buildSnapshot(testSchemaDocument);

const itemsSnapshot = buildSnapshot({
  entities: {
    Items: {
      label: "Item",
      fields: [
        "id",
        "Tags",
        "Scores",
        "Flags",
        "Line_Items",
        "Meta",
        "Amount",
        "Created_Time",
      ],
    },
  },
});

describe("services/sync/sanitizer", () => {
  const sanitizer = new RecordSanitizer();

  afterEach(() => {
    // Nothing below may leak onto the shared prototype
    expect(Object.prototype).not.toHaveProperty("polluted");
  });

  describe("presentText", () => {
    it("should treat blank strings and the None literal as absent", () => {
      expect(presentText("None")).toBeNull();
      expect(presentText("  ")).toBeNull();
      expect(presentText(undefined)).toBeNull();
      expect(presentText(" Acme ")).toBe("Acme");
    });

    it("should render finite numbers as text", () => {
      expect(presentText(42)).toBe("42");
      expect(presentText(Number.NaN)).toBeNull();
    });
  });

  describe("composeName", () => {
    it("should leave out None components", () => {
      expect(composeName("None", "Hornak")).toBe("Hornak");
      expect(composeName("Ada", "")).toBe("Ada");
      expect(composeName("None", "None")).toBeNull();
    });
  });

  describe("resolveDisplayName", () => {
    it("should prefer an explicit name", () => {
      expect(resolveDisplayName({ name: "Acme", email: "x@example.com" })).toBe("Acme");
    });

    it("should fall back to first and last name, then email", () => {
      expect(resolveDisplayName({ first_name: "None", last_name: "Hornak" })).toBe("Hornak");
      expect(resolveDisplayName({ name: "None", email: "grace@example.com" })).toBe(
        "grace@example.com"
      );
    });

    it("should use a descriptive field last", () => {
      expect(resolveDisplayName({ Deal_Name: "Renewal" })).toBe("Renewal");
      expect(resolveDisplayName({ other: "value" })).toBeNull();
    });
  });

  describe("sanitize", () => {
    it("should return an empty result for null input", () => {
      const result = sanitizer.sanitize(null, snapshot.lookup("Accounts"));

      expect(result).toEqual({
        empty: true,
        recordId: null,
        properties: {},
        relations: [],
        warnings: [],
      });
    });

    it("should return an empty result for non-object input", () => {
      expect(sanitizer.sanitize("a1", snapshot.lookup("Accounts")).empty).toBe(true);
      expect(sanitizer.sanitize([], snapshot.lookup("Accounts")).empty).toBe(true);
    });

    it("should flatten lookups and resolve the display name", () => {
      const result = sanitizer.sanitize(accounts[1], snapshot.lookup("Accounts"));

      expect(result.empty).toBe(false);
      expect(result.recordId).toBe("a2");
      expect(result.properties).toEqual({
        id: "a2",
        account_name: "Acme Labs",
        industry: "None",
        owner_id: "u2",
        owner_name: "grace@example.com",
        parent_account_id: "a1",
        parent_account_name: "Acme Corp",
        name: "Acme Labs",
      });
      expect(result.relations).toEqual([
        { field: "Owner", targetId: "u2" },
        { field: "Parent_Account", targetId: "a1" },
      ]);
      expect(result.warnings).toEqual([]);
    });

    it("should compose a contact name without the None first name", () => {
      const result = sanitizer.sanitize(contacts[0], snapshot.lookup("Contacts"));

      expect(result.properties.first_name).toBe("None");
      expect(result.properties.name).toBe("Hornak");
      expect(result.properties.account_name_id).toBe("a1");
      expect(result.properties.account_name_name).toBe("Acme Corp");
    });

    it("should skip null fields and fields outside the whitelist", () => {
      const result = sanitizer.sanitize(
        { id: "a1", Account_Name: "Acme", Parent_Account: null, Secret: "s3cr3t" },
        snapshot.lookup("Accounts")
      );

      expect(result.properties).toEqual({
        id: "a1",
        account_name: "Acme",
        name: "Acme",
      });
      expect(result.relations).toEqual([]);
    });

    it("should drop reserved keys and report them", () => {
      const record: unknown = JSON.parse(
        '{"id":"a9","__proto__":{"polluted":true},"Account_Name":"Evil"}'
      );

      const result = sanitizer.sanitize(record, snapshot.lookup("Accounts"));

      expect(Object.keys(result.properties)).toEqual(["id", "account_name", "name"]);
      expect(result.warnings).toEqual([
        { field: "__proto__", message: "Dropped field with a reserved key" },
      ]);
    });

    it("should warn when no display name resolves", () => {
      const result = sanitizer.sanitize(
        { id: "u3", full_name: "None" },
        snapshot.lookup("Users")
      );

      expect(result.properties).toEqual({ id: "u3", full_name: "None" });
      expect(result.warnings).toEqual([
        { field: "name", message: "No display name could be resolved" },
      ]);
    });

    it("should read relations from scalar foreign keys", () => {
      const result = sanitizer.sanitize(
        { id: "n1", Note_Title: "Call notes", Parent_Id: "a1" },
        snapshot.lookup("Notes")
      );

      expect(result.properties.parent_id).toBe("a1");
      expect(result.relations).toEqual([{ field: "Parent_Id", targetId: "a1" }]);
    });

    it("should not create relations from None references", () => {
      const result = sanitizer.sanitize(
        { id: "n2", Parent_Id: "None" },
        snapshot.lookup("Notes")
      );

      expect(result.relations).toEqual([]);
    });

    it("should report a missing id as a null record id", () => {
      const result = sanitizer.sanitize({ Note_Title: "Orphan" }, snapshot.lookup("Notes"));

      expect(result.empty).toBe(false);
      expect(result.recordId).toBeNull();
    });

    describe("lists", () => {
      const items = itemsSnapshot.lookup("Items");

      it("should filter nulls before choosing the list form", () => {
        const result = sanitizer.sanitize(
          { id: "i1", Line_Items: [null, { id: "123" }] },
          items
        );

        expect(result.properties.line_items).toBe('[{"id":"123"}]');
      });

      it("should keep numeric lists typed", () => {
        const result = sanitizer.sanitize({ id: "i1", Scores: [1, 2.5] }, items);

        expect(result.properties.scores).toEqual([1, 2.5]);
      });

      it("should stringify mixed scalar lists and drop nested objects", () => {
        const result = sanitizer.sanitize(
          { id: "i1", Tags: ["vip", 1, null, { x: 1 }] },
          items
        );

        expect(result.properties.tags).toEqual(["vip", "1"]);
        expect(result.warnings).toEqual([
          { field: "Tags", message: "Dropped non-scalar entries from a scalar list" },
        ]);
      });

      it("should drop lists that only hold nulls", () => {
        const result = sanitizer.sanitize({ id: "i1", Flags: [null, null] }, items);

        expect(result.properties).toEqual({ id: "i1" });
      });

      it("should strip reserved keys from nested JSON text", () => {
        const record: unknown = JSON.parse(
          '{"id":"i1","Line_Items":[{"id":"1","__proto__":{"polluted":true}}]}'
        );

        const result = sanitizer.sanitize(record, items);

        expect(result.properties.line_items).toBe('[{"id":"1"}]');
        expect(result.warnings).toEqual([
          { field: "Line_Items", message: "Dropped nested reserved key __proto__" },
        ]);
      });
    });

    describe("other values", () => {
      const items = itemsSnapshot.lookup("Items");

      it("should store a lookup without id or name as JSON text", () => {
        const result = sanitizer.sanitize({ id: "i1", Meta: { foo: "bar" } }, items);

        expect(result.properties.meta).toBe('{"foo":"bar"}');
        expect(result.warnings).toEqual([
          { field: "Meta", message: "Lookup without id or name stored as JSON text" },
        ]);
      });

      it("should drop non-finite numbers", () => {
        const result = sanitizer.sanitize({ id: "i1", Amount: Number.NaN }, items);

        expect(result.properties).toEqual({ id: "i1" });
        expect(result.warnings).toEqual([
          { field: "Amount", message: "Dropped non-finite number" },
        ]);
      });

      it("should render nested bigints in JSON text as strings", () => {
        const list = sanitizer.sanitize({ id: "i9", Line_Items: [{ code: 10n }] }, items);
        const lookup = sanitizer.sanitize({ id: "i9", Meta: { size: 10n } }, items);

        expect(list.properties).toEqual({ id: "i9", line_items: '[{"code":"10"}]' });
        expect(list.warnings).toEqual([]);
        expect(lookup.properties.meta).toBe('{"size":"10"}');
      });

      it("should drop circular references from JSON text", () => {
        const meta: Record<string, unknown> = { label: "loop" };
        meta.self = meta;

        const result = sanitizer.sanitize({ id: "i9", Meta: meta }, items);

        expect(result.properties.meta).toBe('{"label":"loop","self":null}');
        expect(result.warnings).toEqual([
          { field: "Meta", message: "Dropped circular reference" },
          { field: "Meta", message: "Lookup without id or name stored as JSON text" },
        ]);
      });

      it("should keep a value shared by two siblings", () => {
        const shared = { code: "x" };

        const result = sanitizer.sanitize(
          { id: "i9", Line_Items: [{ a: shared }, { b: shared }] },
          items
        );

        expect(result.properties.line_items).toBe('[{"a":{"code":"x"}},{"b":{"code":"x"}}]');
        expect(result.warnings).toEqual([]);
      });

      it("should store dates as ISO text", () => {
        const result = sanitizer.sanitize(
          { id: "i1", Created_Time: new Date("2025-01-02T03:04:05.000Z") },
          items
        );

        expect(result.properties.created_time).toBe("2025-01-02T03:04:05.000Z");
      });
    });

    describe("text cleaning", () => {
      const items = itemsSnapshot.lookup("Items");

      it("should strip NUL characters from values and the display name", () => {
        const result = sanitizer.sanitize(
          { id: "u9", full_name: "Ada\u0000L" },
          snapshot.lookup("Users")
        );

        expect(result.properties).toEqual({ id: "u9", full_name: "AdaL", name: "AdaL" });
        expect(result.warnings).toEqual([
          { field: "full_name", message: "Removed NUL or unpaired surrogate characters" },
        ]);
      });

      it("should replace unpaired surrogates in scalar lists", () => {
        const result = sanitizer.sanitize({ id: "i9", Tags: ["ok", "x\uD800"] }, items);

        expect(result.properties.tags).toEqual(["ok", "x\uFFFD"]);
        expect(result.warnings).toEqual([
          { field: "tags", message: "Removed NUL or unpaired surrogate characters" },
        ]);
      });

      it("should keep surrogate pairs intact", () => {
        const result = sanitizer.sanitize({ id: "i9", Tags: ["\uD83D\uDE00"] }, items);

        expect(result.properties.tags).toEqual(["\uD83D\uDE00"]);
        expect(result.warnings).toEqual([]);
      });

      it("should clean strings inside JSON text", () => {
        const result = sanitizer.sanitize(
          { id: "i9", Line_Items: [{ note: "a\u0000" }] },
          items
        );

        expect(result.properties.line_items).toBe('[{"note":"a"}]');
        expect(result.warnings).toEqual([
          { field: "Line_Items", message: "Removed NUL or unpaired surrogate characters" },
        ]);
      });
    });

    it("should be deterministic for the same input", () => {
      const mapping = snapshot.lookup("Accounts");

      expect(sanitizer.sanitize(accounts[0], mapping)).toEqual(
        sanitizer.sanitize(accounts[0], mapping)
      );
    });
  });
});
