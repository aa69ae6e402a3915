import type { SourceDefinition } from "../types/index.js";

/**
 * Check a source definition for internal consistency and freeze it.
 * Throws when a primary-key column is not part of the column schema or
 * an enrichment column shadows a source column.
 */
export function defineSource(definition: SourceDefinition): SourceDefinition {
  const names = new Set(definition.columns.map((c) => c.name));

  if (definition.primaryKey.length === 0) {
    throw new Error(`Source ${definition.name} has no primary key`);
  }
  for (const key of definition.primaryKey) {
    if (!names.has(key)) {
      throw new Error(
        `Source ${definition.name}: primary key column "${key}" is not in its columns`
      );
    }
  }
  for (const column of definition.enrichmentColumns ?? []) {
    if (names.has(column.name)) {
      throw new Error(
        `Source ${definition.name}: enrichment column "${column.name}" duplicates a source column`
      );
    }
  }

  return Object.freeze({
    ...definition,
    columns: Object.freeze(definition.columns.map((c) => Object.freeze({ ...c }))),
    primaryKey: Object.freeze([...definition.primaryKey]),
    enrichmentColumns:
      definition.enrichmentColumns === undefined
        ? undefined
        : Object.freeze(
            definition.enrichmentColumns.map((c) => Object.freeze({ ...c }))
          ),
    fullSync: Object.freeze({ ...definition.fullSync }),
  });
}
