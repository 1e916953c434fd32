// src/classification/index_builder.ts
// Reverse-lookup indices over the ReferenceStore, built once per process.

import type { ReferenceStore } from './reference_store.js';
import type { TargetRecordT } from './schemas.js';
import type { ClassificationWarning } from './errors.js';
import { idKey, nameKey, hgncIdKey, splitList, tierFromLabels } from './keys.js';
import { ecPrefix } from './ec_number.js';

export type IndexKind = 'uniprot_id' | 'hgnc_name' | 'hgnc_id' | 'gene_name' | 'synonym';

/** An EC-prefix hit: a family, or a target that sits outside the hierarchy. */
export type EcCandidate =
  | { kind: 'family'; familyId: string }
  | { kind: 'target'; targetId: string };

export type IndexSet = {
  readonly byUniprot: ReadonlyMap<string, string>;
  readonly byHgncName: ReadonlyMap<string, string>;
  readonly byHgncId: ReadonlyMap<string, string>;
  readonly byGeneName: ReadonlyMap<string, string>;
  readonly bySynonym: ReadonlyMap<string, string>;
  /** Target name or synonym -> every target carrying it, in reference order. */
  readonly byName: ReadonlyMap<string, readonly string[]>;
  /** Lowercased type label -> families declaring that type. */
  readonly familiesByType: ReadonlyMap<string, readonly string[]>;
  /** EC prefix at `ecPrecision` -> candidates in reference order. */
  readonly byEcPrefix: ReadonlyMap<string, readonly EcCandidate[]>;
  readonly ecPrecision: number;
  readonly warnings: readonly ClassificationWarning[];
};

export function ecCandidateKey(c: EcCandidate): string {
  return c.kind === 'family' ? `family:${idKey(c.familyId)}` : `target:${idKey(c.targetId)}`;
}

type KeySpec = {
  kind: IndexKind;
  keys: (t: Readonly<TargetRecordT>) => string[];
};

const KEY_SPECS: KeySpec[] = [
  { kind: 'uniprot_id', keys: t => [idKey(t.uniprot_id)] },
  { kind: 'hgnc_name', keys: t => [nameKey(t.hgnc_name)] },
  { kind: 'hgnc_id', keys: t => [hgncIdKey(t.hgnc_id)] },
  { kind: 'gene_name', keys: t => splitList(t.gene_name).map(nameKey) },
  { kind: 'synonym', keys: t => t.synonyms.map(nameKey) }
];

function buildOne(store: ReferenceStore, spec: KeySpec, warnings: ClassificationWarning[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const t of store.targets) {
    for (const key of spec.keys(t)) {
      if (!key) continue;
      const owner = map.get(key);
      if (owner === undefined) {
        map.set(key, t.target_id);
        continue;
      }
      if (owner === t.target_id) continue;
      // first-seen wins
      const message = `${spec.kind} "${key}" is shared by ${owner} and ${t.target_id}; keeping ${owner}`;
      warnings.push(
        spec.kind === 'synonym'
          ? { kind: 'SynonymCollisionWarning', key, keptTargetId: owner, droppedTargetId: t.target_id, message }
          : { kind: 'IndexCollisionWarning', index: spec.kind, key, keptTargetId: owner, droppedTargetId: t.target_id, message }
      );
    }
  }
  return map;
}

function buildEcIndex(store: ReferenceStore, precision: number): Map<string, EcCandidate[]> {
  const out = new Map<string, EcCandidate[]>();
  const seen = new Set<string>();
  const add = (ec: string, c: EcCandidate) => {
    const prefix = ecPrefix(ec, precision);
    if (!prefix) return;
    const dedup = `${prefix}\u0000${ecCandidateKey(c)}`;
    if (seen.has(dedup)) return;
    seen.add(dedup);
    const list = out.get(prefix) ?? [];
    list.push(c);
    out.set(prefix, list);
  };

  for (const f of store.families) {
    for (const ec of f.ec_numbers) add(ec, { kind: 'family', familyId: f.family_id });
  }
  for (const t of store.targets) {
    const fam = store.getFamily(t.family_id);
    const c: EcCandidate = fam
      ? { kind: 'family', familyId: fam.family_id }
      : { kind: 'target', targetId: t.target_id };
    for (const ec of t.ec_numbers) add(ec, c);
  }
  return out;
}

function pushUnique(map: Map<string, string[]>, key: string, value: string): void {
  if (!key) return;
  const list = map.get(key) ?? [];
  if (!list.includes(value)) list.push(value);
  map.set(key, list);
}

function buildNameIndex(store: ReferenceStore): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const t of store.targets) {
    for (const n of [t.target_name, ...t.synonyms]) pushUnique(out, nameKey(n), t.target_id);
  }
  return out;
}

function buildTypeIndex(store: ReferenceStore): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const f of store.families) {
    pushUnique(out, nameKey(tierFromLabels(f.type, f.class_name, f.subclass_name).type), f.family_id);
  }
  return out;
}

export function buildIndexSet(store: ReferenceStore, opts: { ecPrecision?: number } = {}): IndexSet {
  const ecPrecision = opts.ecPrecision ?? 2;
  const warnings: ClassificationWarning[] = [];
  const [byUniprot, byHgncName, byHgncId, byGeneName, bySynonym] = KEY_SPECS.map(s => buildOne(store, s, warnings));

  return Object.freeze({
    byUniprot,
    byHgncName,
    byHgncId,
    byGeneName,
    bySynonym,
    byName: buildNameIndex(store),
    familiesByType: buildTypeIndex(store),
    byEcPrefix: buildEcIndex(store, ecPrecision),
    ecPrecision,
    warnings: Object.freeze(warnings)
  });
}

export function indexSizes(ix: IndexSet): Record<IndexKind | 'target_name' | 'ec_prefix', number> {
  return {
    uniprot_id: ix.byUniprot.size,
    hgnc_name: ix.byHgncName.size,
    hgnc_id: ix.byHgncId.size,
    gene_name: ix.byGeneName.size,
    synonym: ix.bySynonym.size,
    target_name: ix.byName.size,
    ec_prefix: ix.byEcPrefix.size
  };
}
