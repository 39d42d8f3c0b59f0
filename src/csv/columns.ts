// ══ Column Mapping: source headers → canonical fields ═════════════════════

import { COLUMN_SCHEMAS, type ColumnSchema, type SchemaFields, type SourceSchema } from '../config/aliases';
import { MappingError } from '../types/errors';
import type { RawRow } from './decoder';

/** Canonical field → the header actually present in the file. */
export type ColumnMap<F extends string> = Partial<Record<F, string>>;

export type ExtraAliases = {
  [S in SourceSchema]?: Partial<Record<SchemaFields[S], readonly string[]>>;
};

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * Ordered aliases for one field: built-ins first, caller extensions after.
 */
export function aliasesFor<S extends SourceSchema>(
  schema: S,
  field: SchemaFields[S],
  extra: ExtraAliases = {}
): string[] {
  const builtIn = COLUMN_SCHEMAS[schema].columns.find((c) => c.field === field)?.aliases ?? [];
  const extension: Partial<Record<SchemaFields[S], readonly string[]>> = extra[schema] ?? {};
  return [...builtIn, ...(extension[field] ?? []).map(normalizeHeader)];
}

/**
 * Resolve a file's headers against a schema. Checked once per file.
 * Throws MappingError when a required field has no matching header.
 */
export function mapColumns<S extends SourceSchema>(
  schema: S,
  headers: readonly string[],
  fileName: string,
  extra: ExtraAliases = {}
): ColumnMap<SchemaFields[S]> {
  const byNormalized = new Map<string, string>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    if (!byNormalized.has(key)) byNormalized.set(key, header);
  }

  const definition: ColumnSchema<SchemaFields[S]> = COLUMN_SCHEMAS[schema];
  const map: ColumnMap<SchemaFields[S]> = {};

  for (const { field } of definition.columns) {
    for (const alias of aliasesFor(schema, field, extra)) {
      const header = byNormalized.get(alias);
      if (header !== undefined) {
        map[field] = header;
        break;
      }
    }
  }

  const missing = definition.required.filter((field) => map[field] === undefined);
  if (missing.length > 0) {
    throw new MappingError(fileName, missing, [...headers]);
  }
  return map;
}

/** Cell of a mapped field; '' when the column is absent from the file. */
export function readField<F extends string>(row: RawRow, map: ColumnMap<F>, field: F): string {
  const header = map[field];
  if (header === undefined) return '';
  return row.get(header) ?? '';
}
