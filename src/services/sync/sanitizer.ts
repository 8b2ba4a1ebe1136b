/**
 * Record Sanitizer - turns one untrusted source record into a property map
 * the graph store accepts, plus relation descriptors.
 *
 * Never throws: every branch has a fallback, and fired fallbacks are
 * reported as data quality warnings.
 */

import { syncLogger } from "../../logger.js";

import type { DataQualityWarning } from "./errors.js";
import type {
  MappingEntry,
  PropertyMap,
  PropertyValue,
  Scalar,
} from "../../types/index.js";

// ============================================================================
// Constants
// ============================================================================

/** Keys that reach the prototype chain once a property map is re-parsed */
export const DANGEROUS_KEYS: ReadonlySet<string> = new Set([
  "__proto__",
  "constructor",
  "prototype",
  "__defineGetter__",
  "__defineSetter__",
]);

// Ordered fallback chain for lookup names
const DISPLAY_NAME_KEYS = ["name", "full_name", "Full_Name", "display_name"];
const FIRST_NAME_KEYS = ["first_name", "First_Name"];
const LAST_NAME_KEYS = ["last_name", "Last_Name"];
const EMAIL_KEYS = ["email", "Email"];
const DESCRIPTIVE_KEYS = ["Account_Name", "Deal_Name", "Subject", "title"];

// The source emits the literal string "None" for empty fields
const NONE_LITERAL = "None";

// PostgreSQL text and jsonb reject NUL; lone surrogates are not valid UTF-8
const NUL_CHARS = /\u0000/g;
const LONE_SURROGATES =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;
const REPLACEMENT_CHAR = "\uFFFD";

// ============================================================================
// Types
// ============================================================================

export interface RelationDescriptor {
  field: string;
  /** Raw (un-namespaced) id of the referenced record */
  targetId: string;
}

export interface SanitizedRecord {
  /** True when the input was absent, null or not an object */
  empty: boolean;
  recordId: string | null;
  properties: PropertyMap;
  relations: RelationDescriptor[];
  warnings: DataQualityWarning[];
}

type PlainObject = Record<string, unknown>;

// ============================================================================
// Value Helpers
// ============================================================================

export function toPropertyKey(field: string): string {
  return field.toLowerCase();
}

/**
 * Drop NUL characters and replace unpaired surrogates with U+FFFD.
 */
export function cleanText(value: string): string {
  return value.replace(NUL_CHARS, "").replace(LONE_SURROGATES, REPLACEMENT_CHAR);
}

function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

/**
 * A usable text value: non-blank, not the "None" literal. Numbers count.
 */
export function presentText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = cleanText(value).trim();
  return trimmed === "" || trimmed === NONE_LITERAL ? null : trimmed;
}

function firstPresent(source: PlainObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    if (!Object.hasOwn(source, key)) continue;
    const text = presentText(source[key]);
    if (text !== null) return text;
  }
  return null;
}

/**
 * Join first and last name, leaving out absent or "None" components.
 */
export function composeName(first: unknown, last: unknown): string | null {
  const parts = [presentText(first), presentText(last)].filter(
    (part): part is string => part !== null
  );
  return parts.length > 0 ? parts.join(" ") : null;
}

/**
 * Display name of a lookup object or record: explicit name, then
 * first + last, then email, then another descriptive field.
 */
export function resolveDisplayName(source: PlainObject): string | null {
  return (
    firstPresent(source, DISPLAY_NAME_KEYS) ??
    composeName(
      firstPresent(source, FIRST_NAME_KEYS),
      firstPresent(source, LAST_NAME_KEYS)
    ) ??
    firstPresent(source, EMAIL_KEYS) ??
    firstPresent(source, DESCRIPTIVE_KEYS)
  );
}

// ============================================================================
// Sanitizer
// ============================================================================

export class RecordSanitizer {
  sanitize(record: unknown, mapping: MappingEntry): SanitizedRecord {
    if (!isPlainObject(record)) {
      syncLogger.debug(
        { entityType: mapping.entityType, received: describe(record) },
        "Skipping empty record"
      );
      return {
        empty: true,
        recordId: null,
        properties: {},
        relations: [],
        warnings: [],
      };
    }

    const warnings: DataQualityWarning[] = [];
    const warn = (field: string, message: string): void => {
      warnings.push({ field, message });
      syncLogger.warn(
        { entityType: mapping.entityType, field },
        message
      );
    };

    const properties: PropertyMap = {};
    const put = (key: string, value: PropertyValue): void => {
      if (DANGEROUS_KEYS.has(key)) {
        warn(key, "Dropped property with a reserved key");
        return;
      }
      const cleaned = cleanValue(value);
      if (cleaned !== value) {
        warn(key, "Removed NUL or unpaired surrogate characters");
      }
      properties[key] = cleaned;
    };

    for (const field of Object.keys(record)) {
      if (DANGEROUS_KEYS.has(field)) {
        warn(field, "Dropped field with a reserved key");
        continue;
      }
      if (!mapping.fields.has(field)) {
        continue;
      }

      const value = record[field];
      if (value === null || value === undefined) {
        continue;
      }

      const key = toPropertyKey(field);

      if (Array.isArray(value)) {
        const list = this.normalizeList(value, field, warn);
        if (list !== null) put(key, list);
      } else if (isPlainObject(value)) {
        this.flattenLookup(value, field, put, warn);
      } else if (isScalar(value)) {
        put(key, value);
      } else if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) {
          warn(field, "Dropped invalid date");
        } else {
          put(key, value.toISOString());
        }
      } else if (typeof value === "number") {
        warn(field, "Dropped non-finite number");
      } else if (typeof value === "bigint") {
        put(key, value.toString());
      } else {
        warn(field, `Dropped value of unsupported type ${typeof value}`);
      }
    }

    if (mapping.nameProperty !== null) {
      const whitelisted: PlainObject = {};
      for (const field of mapping.fields) {
        if (Object.hasOwn(record, field) && !DANGEROUS_KEYS.has(field)) {
          whitelisted[field] = record[field];
        }
      }
      const displayName = resolveDisplayName(whitelisted);
      if (displayName !== null) {
        put(mapping.nameProperty, displayName);
      } else {
        warn(mapping.nameProperty, "No display name could be resolved");
      }
    }

    return {
      empty: false,
      recordId: Object.hasOwn(record, mapping.idField)
        ? presentText(record[mapping.idField])
        : null,
      properties,
      relations: this.extractRelations(record, mapping),
      warnings,
    };
  }

  /**
   * `{field}_id` and `{field}_name` from a nested lookup object; the whole
   * object as JSON text when it carries neither.
   */
  private flattenLookup(
    value: PlainObject,
    field: string,
    put: (key: string, value: PropertyValue) => void,
    warn: (field: string, message: string) => void
  ): void {
    const key = toPropertyKey(field);
    const id = Object.hasOwn(value, "id") ? presentText(value.id) : null;
    const name = resolveDisplayName(value);

    if (id !== null) put(`${key}_id`, id);
    if (name !== null) put(`${key}_name`, name);

    if (id === null && name === null) {
      const text = toJsonText(value, field, warn);
      if (text !== null) {
        warn(field, "Lookup without id or name stored as JSON text");
        put(key, text);
      }
    }
  }

  /**
   * Null entries are dropped first; the first surviving element decides
   * between JSON text (objects) and a scalar sequence.
   */
  private normalizeList(
    value: unknown[],
    field: string,
    warn: (field: string, message: string) => void
  ): PropertyValue | null {
    const items = value.filter((item) => item !== null && item !== undefined);
    const first = items[0];
    if (first === undefined) {
      return null;
    }

    if (isPlainObject(first) || Array.isArray(first)) {
      return toJsonText(items, field, warn);
    }

    const scalars = items.filter(isScalar);
    if (scalars.length < items.length) {
      warn(field, "Dropped non-scalar entries from a scalar list");
    }

    if (scalars.every((item) => typeof item === "number")) {
      return scalars.filter((item): item is number => typeof item === "number");
    }
    if (scalars.every((item) => typeof item === "boolean")) {
      return scalars.filter((item): item is boolean => typeof item === "boolean");
    }
    return scalars.map((item) => String(item));
  }

  private extractRelations(
    record: PlainObject,
    mapping: MappingEntry
  ): RelationDescriptor[] {
    const relations: RelationDescriptor[] = [];

    for (const rule of mapping.relations) {
      if (!Object.hasOwn(record, rule.field)) continue;
      const value = record[rule.field];

      let targetId: string | null = null;
      if (isPlainObject(value)) {
        targetId = Object.hasOwn(value, "id") ? presentText(value.id) : null;
      } else {
        targetId = presentText(value);
      }

      if (targetId !== null) {
        relations.push({ field: rule.field, targetId });
      }
    }

    return relations;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function cleanValue(value: PropertyValue): PropertyValue {
  if (typeof value === "string") {
    return cleanText(value);
  }
  if (isStringList(value)) {
    const cleaned = value.map(cleanText);
    return cleaned.every((item, i) => item === value[i]) ? value : cleaned;
  }
  return value;
}

function isStringList(value: PropertyValue): value is string[] {
  if (!Array.isArray(value)) return false;
  const items: readonly unknown[] = value;
  return items.every((item) => typeof item === "string");
}

/**
 * Nested value as JSON text, or null (with a warning) when it cannot be
 * serialized.
 */
function toJsonText(
  value: unknown,
  field: string,
  warn: (field: string, message: string) => void
): string | null {
  try {
    return JSON.stringify(toJsonSafe(value, field, warn, new WeakSet<object>()));
  } catch (error) {
    warn(
      field,
      `Dropped value that cannot be serialized: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return null;
  }
}

/**
 * Deep copy for JSON text: reserved keys and cycles dropped, bigint as a
 * string, strings cleaned.
 */
function toJsonSafe(
  value: unknown,
  field: string,
  warn: (field: string, message: string) => void,
  ancestors: WeakSet<object>
): unknown {
  if (typeof value === "string") {
    const cleaned = cleanText(value);
    if (cleaned !== value) {
      warn(field, "Removed NUL or unpaired surrogate characters");
    }
    return cleaned;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value !== "object" || value === null || value instanceof Date) {
    return value;
  }

  if (ancestors.has(value)) {
    warn(field, "Dropped circular reference");
    return null;
  }
  ancestors.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => toJsonSafe(item, field, warn, ancestors));
    }

    const copy: PlainObject = {};
    for (const [rawKey, item] of Object.entries(value)) {
      const key = cleanText(rawKey);
      if (DANGEROUS_KEYS.has(key)) {
        warn(field, `Dropped nested reserved key ${key}`);
        continue;
      }
      copy[key] = toJsonSafe(item, field, warn, ancestors);
    }
    return copy;
  } finally {
    ancestors.delete(value);
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
