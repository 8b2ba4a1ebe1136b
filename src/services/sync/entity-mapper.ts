/**
 * Entity Mapper - applies a mapping entry to a sanitized record, producing the
 * typed node and its relation candidates.
 */

import { MappingError } from "./errors.js";
import { toPropertyKey } from "./sanitizer.js";

import type { DataQualityWarning } from "./errors.js";
import type { SanitizedRecord } from "./sanitizer.js";
import type {
  FieldType,
  GraphEntity,
  MappingEntry,
  PropertyMap,
  PropertyValue,
  RelationCandidate,
} from "../../types/index.js";

export interface MappedRecord {
  entity: GraphEntity;
  relations: RelationCandidate[];
  warnings: DataQualityWarning[];
}

export function namespacedId(namespace: string, externalId: string): string {
  return `${namespace}:${externalId}`;
}

export class EntityMapper {
  constructor(private readonly namespace = "crm") {}

  /**
   * Returns null for an empty record; throws MappingError when the record
   * carries no id.
   */
  map(
    sanitized: SanitizedRecord,
    mapping: MappingEntry,
    syncedAt: Date
  ): MappedRecord | null {
    if (sanitized.empty) {
      return null;
    }
    if (sanitized.recordId === null) {
      throw new MappingError(
        mapping.entityType,
        `Record has no "${mapping.idField}" value`
      );
    }

    const warnings: DataQualityWarning[] = [];
    const properties = this.coerceProperties(sanitized.properties, mapping, warnings);
    const sourceId = namespacedId(this.namespace, sanitized.recordId);

    const rulesByField = new Map(mapping.relations.map((r) => [r.field, r]));
    const relations: RelationCandidate[] = [];
    for (const descriptor of sanitized.relations) {
      const rule = rulesByField.get(descriptor.field);
      if (rule === undefined) continue;
      relations.push({
        sourceId,
        targetId: namespacedId(this.namespace, descriptor.targetId),
        edgeType: rule.edgeType,
        targetLabel: rule.targetLabel,
        direction: rule.direction,
      });
    }

    return {
      entity: {
        sourceId,
        label: mapping.nodeLabel,
        properties,
        syncedAt,
      },
      relations,
      warnings,
    };
  }

  private coerceProperties(
    properties: PropertyMap,
    mapping: MappingEntry,
    warnings: DataQualityWarning[]
  ): PropertyMap {
    const typed = new Map<string, FieldType>();
    for (const [field, type] of Object.entries(mapping.fieldTypes)) {
      typed.set(toPropertyKey(field), type);
    }

    const result: PropertyMap = {};
    for (const [key, value] of Object.entries(properties)) {
      const type = typed.get(key);
      if (type === undefined) {
        result[key] = value;
        continue;
      }
      const coerced = coerceValue(value, type);
      if (coerced === null) {
        warnings.push({
          field: key,
          message: `Dropped value that is not a valid ${type}`,
        });
        continue;
      }
      result[key] = coerced;
    }
    return result;
  }
}

// ============================================================================
// Coercion
// ============================================================================

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Coerce a scalar to the declared field type. Lists are left untouched;
 * null means the value cannot be coerced.
 */
export function coerceValue(value: PropertyValue, type: FieldType): PropertyValue | null {
  if (Array.isArray(value)) {
    return value;
  }

  switch (type) {
    case "string":
      return String(value);

    case "number":
      return toNumber(value);

    case "integer": {
      const n = toNumber(value);
      return n === null ? null : Math.trunc(n);
    }

    case "boolean": {
      if (typeof value === "boolean") return value;
      if (typeof value === "number") return value !== 0;
      const text = value.trim().toLowerCase();
      if (text === "true" || text === "1" || text === "yes") return true;
      if (text === "false" || text === "0" || text === "no") return false;
      return null;
    }

    case "date": {
      if (typeof value === "string" && DATE_ONLY.test(value.trim())) {
        return value.trim();
      }
      const date = toDate(value);
      return date === null ? null : date.toISOString().slice(0, 10);
    }

    case "datetime": {
      const date = toDate(value);
      return date === null ? null : date.toISOString();
    }
  }
}

function toNumber(value: string | number | boolean): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value.trim() === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function toDate(value: string | number | boolean): Date | null {
  if (typeof value === "boolean") return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
