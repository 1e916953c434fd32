// src/io/classification_table.ts
// Flatten classification records back into the input table's rows.

import type { ClassificationRecord, Table } from '../classification/schemas.js';

export const CLASSIFICATION_COLUMNS = [
  'target_id',
  'family_id',
  'type',
  'class',
  'subclass',
  'family_chain_ids',
  'family_chain_names',
  'full_id_path',
  'full_name_path',
  'resolution_method',
  'matched',
  'truncated',
  'error'
] as const;

export function flattenRecord(rec: ClassificationRecord, listSeparator = '>'): Record<string, string> {
  return {
    target_id: rec.target_id ?? '',
    family_id: rec.family_id ?? '',
    type: rec.type,
    class: rec.class,
    subclass: rec.subclass,
    family_chain_ids: rec.family_chain_ids.join(listSeparator),
    family_chain_names: rec.family_chain_names.join(listSeparator),
    full_id_path: rec.full_id_path,
    full_name_path: rec.full_name_path,
    resolution_method: rec.resolution_method,
    matched: String(rec.matched),
    truncated: String(rec.truncated),
    error: rec.error ? `${rec.error.code}: ${rec.error.message}` : ''
  };
}

/**
 * Input columns followed by the classification columns. A classification
 * column that already exists in the input is overwritten in place.
 */
export function mergeClassification(
  input: Table,
  records: readonly ClassificationRecord[],
  listSeparator = '>'
): Table {
  if (records.length !== input.rows.length) {
    throw new Error(`row count mismatch: ${input.rows.length} input rows, ${records.length} records`);
  }
  const columns = [...input.columns];
  for (const c of CLASSIFICATION_COLUMNS) if (!columns.includes(c)) columns.push(c);
  const rows = input.rows.map((row, i) => ({ ...row, ...flattenRecord(records[i], listSeparator) }));
  return { columns, rows };
}
