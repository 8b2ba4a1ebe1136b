/**
 * Schema Registry - declarative mapping from source entity types to graph
 * labels, whitelisted fields and relation rules.
 *
 * The registry holds one immutable snapshot. `reload()` validates a fresh
 * document and swaps the snapshot by reference; a run keeps the snapshot it
 * started with.
 */

import { readFileSync } from "node:fs";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { syncLogger } from "../../logger.js";
import { GENERIC_LABEL } from "../../types/index.js";
import { SchemaValidationError, UnknownEntityTypeError } from "./errors.js";
import { DANGEROUS_KEYS, toPropertyKey } from "./sanitizer.js";

import type {
  FieldType,
  MappingEntry,
  RelationRule,
} from "../../types/index.js";

// ============================================================================
// Document Schema
// ============================================================================

const FieldTypeSchema = Type.Union([
  Type.Literal("string"),
  Type.Literal("number"),
  Type.Literal("integer"),
  Type.Literal("boolean"),
  Type.Literal("date"),
  Type.Literal("datetime"),
]);

const RelationRuleSchema = Type.Object({
  field: Type.String({ minLength: 1 }),
  edge: Type.String({ minLength: 1 }),
  target_label: Type.String({ minLength: 1 }),
  direction: Type.Union([Type.Literal("OUTGOING"), Type.Literal("INCOMING")]),
});

const MappingEntrySchema = Type.Object({
  label: Type.String({ minLength: 1 }),
  module_name: Type.Optional(Type.String({ minLength: 1 })),
  id_field: Type.Optional(Type.String({ minLength: 1 })),
  fields: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  field_types: Type.Optional(Type.Record(Type.String(), FieldTypeSchema)),
  name_property: Type.Optional(Type.String({ minLength: 1 })),
  relations: Type.Optional(Type.Array(RelationRuleSchema)),
  aliases: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  shared_label: Type.Optional(Type.Boolean()),
});

export const SchemaDocumentSchema = Type.Object({
  entities: Type.Record(Type.String({ minLength: 1 }), MappingEntrySchema),
});

export type SchemaDocument = Static<typeof SchemaDocumentSchema>;

const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

// ============================================================================
// Snapshot
// ============================================================================

export class SchemaSnapshot {
  readonly entries: ReadonlyMap<string, MappingEntry>;
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(
    entries: Map<string, MappingEntry>,
    readonly version: number,
    readonly loadedAt: Date
  ) {
    const aliases = new Map<string, string>();
    for (const entry of entries.values()) {
      for (const alias of entry.aliases) {
        aliases.set(alias, entry.entityType);
      }
    }
    this.entries = entries;
    this.aliases = aliases;
    Object.freeze(this);
  }

  /**
   * Resolve an entity type (or one of its aliases) to its mapping.
   */
  lookup(entityType: string): MappingEntry {
    const entry =
      this.entries.get(entityType) ??
      this.entries.get(this.aliases.get(entityType) ?? "");
    if (entry === undefined) {
      throw new UnknownEntityTypeError(entityType);
    }
    return entry;
  }

  has(entityType: string): boolean {
    return this.entries.has(entityType) || this.aliases.has(entityType);
  }

  entityTypes(): string[] {
    return [...this.entries.keys()];
  }

  labels(): string[] {
    return [...new Set([...this.entries.values()].map((e) => e.nodeLabel))];
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a parsed document and build an immutable snapshot.
 * Collects every violation before failing.
 */
export function buildSnapshot(document: unknown, version = 1): SchemaSnapshot {
  if (!Value.Check(SchemaDocumentSchema, document)) {
    const issues = [...Value.Errors(SchemaDocumentSchema, document)].map(
      (e) => `${e.path === "" ? "/" : e.path}: ${e.message}`
    );
    throw new SchemaValidationError(issues);
  }

  const issues: string[] = [];
  const raw = Object.entries(document.entities);

  const definedLabels = new Set(raw.map(([, e]) => e.label));
  const labelOwners = new Map<string, string[]>();
  const knownNames = new Set(raw.map(([name]) => name));

  for (const [entityType, entry] of raw) {
    const owners = labelOwners.get(entry.label) ?? [];
    owners.push(entityType);
    labelOwners.set(entry.label, owners);

    if (!IDENTIFIER_PATTERN.test(entry.label)) {
      issues.push(`${entityType}: label "${entry.label}" is not a valid identifier`);
    }
    if (entry.label === GENERIC_LABEL) {
      issues.push(`${entityType}: label "${GENERIC_LABEL}" is reserved`);
    }

    // Property keys are lower-cased, so fields differing only in case collide
    const fieldsByKey = new Map<string, string>();
    for (const field of entry.fields) {
      const key = toPropertyKey(field);
      if (DANGEROUS_KEYS.has(field) || DANGEROUS_KEYS.has(key)) {
        issues.push(`${entityType}: field "${field}" is not allowed`);
      }
      const other = fieldsByKey.get(key);
      if (other === undefined) {
        fieldsByKey.set(key, field);
      } else if (other !== field) {
        issues.push(
          `${entityType}: fields "${other}" and "${field}" share property key "${key}"`
        );
      }
    }

    if (
      entry.name_property !== undefined &&
      DANGEROUS_KEYS.has(entry.name_property)
    ) {
      issues.push(`${entityType}: name_property "${entry.name_property}" is not allowed`);
    }

    const fields = new Set(entry.fields);
    for (const typedField of Object.keys(entry.field_types ?? {})) {
      if (!fields.has(typedField)) {
        issues.push(
          `${entityType}: field_types references "${typedField}" which is not in fields`
        );
      }
    }

    for (const rule of entry.relations ?? []) {
      if (!IDENTIFIER_PATTERN.test(rule.edge)) {
        issues.push(`${entityType}: edge type "${rule.edge}" is not a valid identifier`);
      }
      if (rule.target_label !== GENERIC_LABEL && !definedLabels.has(rule.target_label)) {
        issues.push(
          `${entityType}: relation ${rule.edge} targets undefined label "${rule.target_label}"`
        );
      }
    }

    for (const alias of entry.aliases ?? []) {
      if (knownNames.has(alias)) {
        issues.push(`${entityType}: alias "${alias}" collides with another entity type or alias`);
      }
      knownNames.add(alias);
    }
  }

  for (const [label, owners] of labelOwners) {
    if (owners.length < 2) continue;
    const allShared = owners.every(
      (owner) => document.entities[owner]?.shared_label === true
    );
    if (!allShared) {
      issues.push(
        `label "${label}" is mapped by ${owners.join(", ")} without shared_label`
      );
    }
  }

  if (issues.length > 0) {
    throw new SchemaValidationError(issues);
  }

  const entries = new Map<string, MappingEntry>();
  for (const [entityType, entry] of raw) {
    entries.set(entityType, toMappingEntry(entityType, entry));
  }

  return new SchemaSnapshot(entries, version, new Date());
}

function toMappingEntry(
  entityType: string,
  entry: SchemaDocument["entities"][string]
): MappingEntry {
  const relations: RelationRule[] = (entry.relations ?? []).map((rule) =>
    Object.freeze({
      field: rule.field,
      edgeType: rule.edge,
      targetLabel: rule.target_label,
      direction: rule.direction,
    })
  );

  const fieldTypes: Record<string, FieldType> = { ...entry.field_types };

  return Object.freeze({
    entityType,
    nodeLabel: entry.label,
    sourceModule: entry.module_name ?? entityType,
    idField: entry.id_field ?? "id",
    fields: new Set(entry.fields),
    fieldTypes: Object.freeze(fieldTypes),
    nameProperty: entry.name_property ?? null,
    relations: Object.freeze(relations),
    aliases: Object.freeze([...(entry.aliases ?? [])]),
    sharedLabel: entry.shared_label ?? false,
  });
}

// ============================================================================
// Registry
// ============================================================================

export type SchemaSource = () => unknown;

export function readSchemaFile(path: string): SchemaSource {
  return () => {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaValidationError([`cannot read ${path}: ${reason}`]);
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaValidationError([`${path} is not valid JSON: ${reason}`]);
    }
  };
}

export class SchemaRegistry {
  private current: SchemaSnapshot;

  constructor(private readonly source: SchemaSource) {
    this.current = buildSnapshot(source(), 1);
    syncLogger.info(
      { version: 1, entityTypes: this.current.entityTypes().length },
      "Schema mapping loaded"
    );
  }

  static fromFile(path: string): SchemaRegistry {
    return new SchemaRegistry(readSchemaFile(path));
  }

  static fromDocument(document: unknown): SchemaRegistry {
    return new SchemaRegistry(() => document);
  }

  lookup(entityType: string): MappingEntry {
    return this.current.lookup(entityType);
  }

  snapshot(): SchemaSnapshot {
    return this.current;
  }

  /**
   * Re-read the source and swap in a new snapshot. On failure the previous
   * snapshot stays active and the error is rethrown.
   */
  reload(): SchemaSnapshot {
    const version = this.current.version + 1;
    try {
      const next = buildSnapshot(this.source(), version);
      this.current = next;
      syncLogger.info(
        { version, entityTypes: next.entityTypes().length },
        "Schema mapping reloaded"
      );
      return next;
    } catch (error) {
      syncLogger.error(
        { version: this.current.version, error: error instanceof Error ? error.message : String(error) },
        "Schema reload failed, keeping previous mapping"
      );
      throw error;
    }
  }
}
