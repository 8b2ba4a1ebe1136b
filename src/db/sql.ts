import { sql, type RawBuilder } from "kysely";

/**
 * JSONB literal for inserts; Kysely does not serialize objects by itself.
 */
export function jsonb<T>(value: T): RawBuilder<T> {
  return sql<T>`${JSON.stringify(value)}::jsonb`;
}
