// src/classification/reference_store.ts
// Loads the targets and families tables into frozen, validated records.

import { z } from 'zod';
import {
  TargetRecord,
  FamilyRecord,
  type TargetRecordT,
  type FamilyRecordT,
  type Table
} from './schemas.js';
import { DuplicateKeyError, SchemaError } from './errors.js';
import { normalizeHeader, idKey, splitList } from './keys.js';
import { parseEcNumbers } from './ec_number.js';

export const REQUIRED_TARGET_COLUMNS = [
  'target_id',
  'uniprot_id',
  'hgnc_name',
  'hgnc_id',
  'gene_name',
  'synonyms',
  'family_id'
] as const;

export const REQUIRED_FAMILY_COLUMNS = ['family_id', 'parent_family_id', 'name'] as const;

// Legacy and vendor spellings, applied after normalizeHeader().
const TARGET_ALIASES: Record<string, string> = {
  swissprot: 'uniprot_id',
  uniprot: 'uniprot_id',
  uniprot_accession: 'uniprot_id',
  ec_number: 'ec_numbers',
  name: 'target_name',
  iuphar_type: 'type',
  iuphar_class: 'class',
  iuphar_subclass: 'subclass'
};

const FAMILY_ALIASES: Record<string, string> = {
  family_name: 'name',
  parent_id: 'parent_family_id',
  class: 'class_name',
  subclass: 'subclass_name',
  ec_number: 'ec_numbers',
  target_id: 'target_ids'
};

/** Raw header -> canonical column, for every header of the table. */
export function canonicalColumns(columns: string[], aliases: Record<string, string>): Map<string, string> {
  const out = new Map<string, string>();
  for (const raw of columns) {
    const h = normalizeHeader(raw);
    out.set(raw, aliases[h] ?? h);
  }
  return out;
}

function requireColumns(table: string, present: Iterable<string>, required: readonly string[]): void {
  const have = new Set(present);
  const missing = required.filter(c => !have.has(c));
  if (missing.length) throw new SchemaError(table, missing);
}

/** Re-key a row by canonical column; cells trimmed, blanks as "". First raw column wins. */
function canonicalRow(row: Record<string, string>, cols: Map<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [raw, canon] of cols) {
    const v = String(row[raw] ?? '').trim();
    if (out[canon] === undefined || (!out[canon] && v)) out[canon] = v;
  }
  return out;
}

function isBlank(row: Record<string, string>): boolean {
  return Object.values(row).every(v => !v);
}

function validated<S extends z.ZodTypeAny>(schema: S, table: string, rowNo: number, value: unknown): z.infer<S> {
  const r = schema.safeParse(value);
  if (!r.success) {
    const fields = r.error.issues.map(i => i.path.join('.'));
    throw new SchemaError(table, fields, `${table}: row ${rowNo}: ${r.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return r.data;
}

export class ReferenceStore {
  readonly targets: ReadonlyArray<Readonly<TargetRecordT>>;
  readonly families: ReadonlyArray<Readonly<FamilyRecordT>>;
  private readonly targetById: ReadonlyMap<string, Readonly<TargetRecordT>>;
  private readonly familyById: ReadonlyMap<string, Readonly<FamilyRecordT>>;

  constructor(targets: TargetRecordT[], families: FamilyRecordT[]) {
    const fById = new Map<string, Readonly<FamilyRecordT>>();
    for (const f of families) {
      const k = idKey(f.family_id);
      if (fById.has(k)) throw new DuplicateKeyError('families', f.family_id);
      fById.set(k, Object.freeze({ ...f }));
    }

    // Membership listed on the family side fills targets that carry no family_id
    const memberOf = new Map<string, string[]>();
    for (const f of fById.values()) {
      for (const tid of f.target_ids) {
        const k = idKey(tid);
        const list = memberOf.get(k) ?? [];
        list.push(f.family_id);
        memberOf.set(k, list);
      }
    }

    const tById = new Map<string, Readonly<TargetRecordT>>();
    for (const t of targets) {
      const k = idKey(t.target_id);
      if (tById.has(k)) throw new DuplicateKeyError('targets', t.target_id);
      const listed = memberOf.get(k);
      const family_id = t.family_id || (listed && listed.length === 1 ? listed[0] : '');
      tById.set(k, Object.freeze({ ...t, family_id }));
    }

    this.targetById = tById;
    this.familyById = fById;
    this.targets = Object.freeze([...tById.values()]);
    this.families = Object.freeze([...fById.values()]);
    Object.freeze(this);
  }

  getTarget(targetId: string | undefined): Readonly<TargetRecordT> | undefined {
    return targetId ? this.targetById.get(idKey(targetId)) : undefined;
  }

  getFamily(familyId: string | undefined): Readonly<FamilyRecordT> | undefined {
    return familyId ? this.familyById.get(idKey(familyId)) : undefined;
  }

  familyOfTarget(targetId: string): Readonly<FamilyRecordT> | undefined {
    return this.getFamily(this.getTarget(targetId)?.family_id);
  }
}

/* =========================
 * Table -> records
 * ========================= */

export function parseTargetTable(table: Table): TargetRecordT[] {
  const cols = canonicalColumns(table.columns, TARGET_ALIASES);
  requireColumns('targets', cols.values(), REQUIRED_TARGET_COLUMNS);

  const out: TargetRecordT[] = [];
  table.rows.forEach((raw, i) => {
    const r = canonicalRow(raw, cols);
    if (isBlank(r)) return;
    const rowNo = i + 2; // 1-based, after the header line
    if (!r.target_id) throw new SchemaError('targets', ['target_id'], `targets: row ${rowNo}: empty target_id`);
    out.push(validated(TargetRecord, 'targets', rowNo, {
      target_id: r.target_id,
      uniprot_id: r.uniprot_id ?? '',
      hgnc_name: r.hgnc_name ?? '',
      hgnc_id: r.hgnc_id ?? '',
      gene_name: r.gene_name ?? '',
      synonyms: splitList(r.synonyms),
      family_id: r.family_id ?? '',
      ec_numbers: parseEcNumbers(r.ec_numbers),
      target_name: r.target_name ?? '',
      type: r.type ?? '',
      class: r.class ?? '',
      subclass: r.subclass ?? ''
    }));
  });
  return out;
}

export function parseFamilyTable(table: Table): FamilyRecordT[] {
  const cols = canonicalColumns(table.columns, FAMILY_ALIASES);
  requireColumns('families', cols.values(), REQUIRED_FAMILY_COLUMNS);

  const out: FamilyRecordT[] = [];
  table.rows.forEach((raw, i) => {
    const r = canonicalRow(raw, cols);
    if (isBlank(r)) return;
    const rowNo = i + 2;
    if (!r.family_id) throw new SchemaError('families', ['family_id'], `families: row ${rowNo}: empty family_id`);
    out.push(validated(FamilyRecord, 'families', rowNo, {
      family_id: r.family_id,
      parent_family_id: r.parent_family_id ?? '',
      name: r.name ?? '',
      type: r.type ?? '',
      class_name: r.class_name ?? '',
      subclass_name: r.subclass_name ?? '',
      ec_numbers: parseEcNumbers(r.ec_numbers),
      target_ids: splitList(r.target_ids)
    }));
  });
  return out;
}

/** Validate both tables and build the store. Throws SchemaError / DuplicateKeyError. */
export function loadReferenceStore(targetTable: Table, familyTable: Table): ReferenceStore {
  return new ReferenceStore(parseTargetTable(targetTable), parseFamilyTable(familyTable));
}
