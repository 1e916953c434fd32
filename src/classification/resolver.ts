// src/classification/resolver.ts
// Ordered, first-match resolution of an input row to a target, family or EC class.

import type { ReferenceStore } from './reference_store.js';
import type { IndexSet, EcCandidate } from './index_builder.js';
import type { InputRowT, ResolutionMethod, Tier } from './schemas.js';
import { ecCandidateKey } from './index_builder.js';
import { AmbiguousECMatchError, type ClassificationError, type ClassificationWarning } from './errors.js';
import { normalizeHeader, idKey, nameKey, hgncIdKey, splitList, firstToken, tierFromLabels } from './keys.js';
import { parseEcNumbers, ecPrefix, ecClassType } from './ec_number.js';
import { DEFAULT_OPTIONS, type ClassifierOptionsT } from './config.js';

/** Identifier fields read from an input row, normalized to comparison keys. */
export type InputIdentifiers = {
  target_id: string;
  uniprot_id: string;
  hgnc_name: string;
  hgnc_id: string;
  gene_name: string;
  synonyms: string[];
  target_name: string;
  family_id: string;
  ec_numbers: string[];
};

const INPUT_ALIASES: Record<string, keyof InputIdentifiers> = {
  target_id: 'target_id',
  guidetopharmacology: 'target_id',
  guidetopharmacology_id: 'target_id',
  iuphar_target_id: 'target_id',
  uniprot_id: 'uniprot_id',
  uniprot: 'uniprot_id',
  swissprot: 'uniprot_id',
  accession: 'uniprot_id',
  hgnc_name: 'hgnc_name',
  hgnc_id: 'hgnc_id',
  gene_name: 'gene_name',
  gene: 'gene_name',
  synonyms: 'synonyms',
  synonym: 'synonyms',
  target_name: 'target_name',
  name: 'target_name',
  iuphar_name: 'target_name',
  chembl_component_description: 'target_name',
  family_id: 'family_id',
  guidetopharmacology_family: 'family_id',
  iuphar_family_id: 'family_id',
  ec_number: 'ec_numbers',
  ec_numbers: 'ec_numbers'
};

function cellText(v: InputRowT[string]): string {
  if (v === undefined || v === null) return '';
  return String(v).trim();
}

export function readIdentifiers(row: InputRowT): InputIdentifiers {
  const raw: Partial<Record<keyof InputIdentifiers, string>> = {};
  for (const [col, v] of Object.entries(row)) {
    const field = INPUT_ALIASES[normalizeHeader(col)];
    const text = cellText(v);
    // first non-empty column wins when aliases collide
    if (field && text && !raw[field]) raw[field] = text;
  }
  return {
    target_id: idKey(raw.target_id),
    uniprot_id: idKey(raw.uniprot_id),
    hgnc_name: nameKey(raw.hgnc_name),
    hgnc_id: hgncIdKey(raw.hgnc_id),
    gene_name: nameKey(firstToken(raw.gene_name)),
    synonyms: splitList(raw.synonyms).map(nameKey),
    target_name: nameKey(raw.target_name),
    family_id: idKey(raw.family_id),
    ec_numbers: parseEcNumbers(raw.ec_numbers)
  };
}

export type Resolution = {
  method: ResolutionMethod;
  targetId: string | null;
  familyId: string | null;
  /** Set when the tier comes from the match itself rather than the family chain. */
  tier?: Tier;
  error?: ClassificationError;
  warnings: ClassificationWarning[];
};

export type ResolveOptions = Pick<ClassifierOptionsT, 'minSynonymLength' | 'ecClassFallback'>;

type Ctx = {
  indices: IndexSet;
  store: ReferenceStore;
  opts: ResolveOptions;
  warnings: ClassificationWarning[];
};

type Strategy = {
  method: ResolutionMethod;
  apply: (ids: InputIdentifiers, ctx: Ctx) => Omit<Resolution, 'warnings' | 'method'> | undefined;
};

function toTarget(ctx: Ctx, targetId: string | undefined) {
  const t = ctx.store.getTarget(targetId);
  return t ? { targetId: t.target_id, familyId: t.family_id || null } : undefined;
}

/** (key extractor, index) -> candidate */
function lookup(
  method: ResolutionMethod,
  key: (ids: InputIdentifiers) => string,
  index: (ix: IndexSet) => ReadonlyMap<string, string>
): Strategy {
  return {
    method,
    apply: (ids, ctx) => {
      const k = key(ids);
      return k ? toTarget(ctx, index(ctx.indices).get(k)) : undefined;
    }
  };
}

const byTargetId: Strategy = {
  method: 'target_id',
  apply: (ids, ctx) => (ids.target_id ? toTarget(ctx, ids.target_id) : undefined)
};

const bySynonyms: Strategy = {
  method: 'synonym',
  apply: (ids, ctx) => {
    const tokens = ids.synonyms.filter(s => s.length >= ctx.opts.minSynonymLength);
    const hits = new Map<string, string[]>();
    for (const tok of tokens) {
      const tid = ctx.indices.bySynonym.get(tok);
      if (!tid) continue;
      hits.set(tid, [...(hits.get(tid) ?? []), tok]);
    }
    if (hits.size === 1) return toTarget(ctx, [...hits.keys()][0]);
    if (hits.size > 1) {
      const targetIds = [...hits.keys()];
      ctx.warnings.push({
        kind: 'AmbiguousSynonymWarning',
        synonyms: [...hits.values()].flat(),
        targetIds,
        message: `synonyms point at ${targetIds.length} targets: ${targetIds.join(', ')}`
      });
    }
    return undefined;
  }
};

const byName: Strategy = {
  method: 'target_name',
  apply: (ids, ctx) => {
    if (!ids.target_name) return undefined;
    const hits = ctx.indices.byName.get(ids.target_name) ?? [];
    if (hits.length === 1) return toTarget(ctx, hits[0]);
    if (hits.length > 1) {
      ctx.warnings.push({
        kind: 'AmbiguousNameWarning',
        name: ids.target_name,
        targetIds: [...hits],
        message: `name "${ids.target_name}" points at ${hits.length} targets: ${hits.join(', ')}`
      });
    }
    return undefined;
  }
};

const byFamilyId: Strategy = {
  method: 'family_id',
  apply: (ids, ctx) => {
    const f = ctx.store.getFamily(ids.family_id);
    return f ? { targetId: null, familyId: f.family_id } : undefined;
  }
};

const byEcPrefix: Strategy = {
  method: 'ec_number',
  apply: (ids, ctx) => {
    const prefixes: string[] = [];
    const candidates = new Map<string, EcCandidate>();
    for (const ec of ids.ec_numbers) {
      const p = ecPrefix(ec, ctx.indices.ecPrecision);
      if (!p || prefixes.includes(p)) continue;
      prefixes.push(p);
      for (const c of ctx.indices.byEcPrefix.get(p) ?? []) candidates.set(ecCandidateKey(c), c);
    }
    if (candidates.size === 0) return undefined;
    if (candidates.size > 1) {
      const labels = [...candidates.values()].map(c => (c.kind === 'family' ? c.familyId : c.targetId));
      return { targetId: null, familyId: null, error: new AmbiguousECMatchError(prefixes, labels) };
    }
    const [only] = [...candidates.values()];
    if (only.kind === 'family') return { targetId: null, familyId: only.familyId };
    const t = ctx.store.getTarget(only.targetId);
    return {
      targetId: null,
      familyId: null,
      tier: t ? tierFromLabels(t.type, t.class, t.subclass) : undefined
    };
  }
};

const byEcClass: Strategy = {
  method: 'ec_class',
  apply: (ids, ctx) => {
    if (!ctx.opts.ecClassFallback) return undefined;
    const type = ecClassType(ids.ec_numbers);
    if (!type) return undefined;
    // the chain comes from the one family declaring this type, if there is exactly one
    const families = ctx.indices.familiesByType.get(nameKey(type)) ?? [];
    return {
      targetId: null,
      familyId: families.length === 1 ? families[0] : null,
      tier: tierFromLabels(type)
    };
  }
};

/** Precedence order. The first strategy that returns an outcome ends resolution. */
export const STRATEGIES: readonly Strategy[] = [
  byTargetId,
  lookup('uniprot_id', ids => ids.uniprot_id, ix => ix.byUniprot),
  lookup('hgnc_name', ids => ids.hgnc_name, ix => ix.byHgncName),
  lookup('hgnc_id', ids => ids.hgnc_id, ix => ix.byHgncId),
  lookup('gene_name', ids => ids.gene_name, ix => ix.byGeneName),
  bySynonyms,
  byName,
  byFamilyId,
  byEcPrefix,
  byEcClass
];

export function resolve(
  row: InputRowT,
  indices: IndexSet,
  store: ReferenceStore,
  opts: ResolveOptions = DEFAULT_OPTIONS
): Resolution {
  const ids = readIdentifiers(row);
  const ctx: Ctx = { indices, store, opts, warnings: [] };

  for (const s of STRATEGIES) {
    const hit = s.apply(ids, ctx);
    if (!hit) continue;
    if (hit.error) return { ...hit, method: 'ambiguous_ec', warnings: ctx.warnings };
    return { ...hit, method: s.method, warnings: ctx.warnings };
  }
  return { method: 'unresolved', targetId: null, familyId: null, warnings: ctx.warnings };
}
