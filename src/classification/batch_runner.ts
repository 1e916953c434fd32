// src/classification/batch_runner.ts

import type { ReferenceStore } from './reference_store.js';
import type { IndexSet } from './index_builder.js';
import { InputRow, type ClassificationRecord, type ResolutionMethod, type Tier } from './schemas.js';
import { resolve, type Resolution } from './resolver.js';
import { buildChain, formatPath, type FamilyChain } from './chain_builder.js';
import { InvalidInputError, UnresolvedRecordError, errorCode, errorMessage, type ClassificationWarning } from './errors.js';
import { EMPTY_TIER, isEmptyTier, nameKey, tierFromLabels } from './keys.js';
import { DEFAULT_OPTIONS, type ClassifierOptionsT } from './config.js';

const FAILED: ReadonlySet<ResolutionMethod> = new Set(['unresolved', 'ambiguous_ec', 'error']);

export function isMatched(method: ResolutionMethod): boolean {
  return !FAILED.has(method);
}

/**
 * Type / class / subclass for a resolution: the target's own labels first,
 * then each family of the chain leaf to root.
 */
export function deriveTier(
  res: Resolution,
  chain: FamilyChain | undefined,
  store: ReferenceStore,
  defaultType: string
): Tier {
  if (!isMatched(res.method)) return EMPTY_TIER;
  if (res.tier && !isEmptyTier(res.tier)) return res.tier;

  const t = store.getTarget(res.targetId ?? undefined);
  if (t) {
    const own = tierFromLabels(t.type, t.class, t.subclass);
    if (!isEmptyTier(own)) return own;
  }
  for (const fid of chain?.ids ?? []) {
    const f = store.getFamily(fid);
    if (!f) continue;
    const tier = tierFromLabels(f.type, f.class_name, f.subclass_name);
    if (!isEmptyTier(tier)) return tier;
  }
  return tierFromLabels(defaultType);
}

function emptyRecord(method: ResolutionMethod, warnings: string[] = []): ClassificationRecord {
  return {
    target_id: null,
    family_id: null,
    ...EMPTY_TIER,
    family_chain_ids: [],
    family_chain_names: [],
    full_id_path: '',
    full_name_path: '',
    resolution_method: method,
    matched: false,
    truncated: false,
    warnings
  };
}

// Umbrella family names that say nothing beyond the class column.
const GENERIC_FAMILY_NAMES: ReadonlySet<string> = new Set(['enzyme']);

function messages(ws: ClassificationWarning[]): string[] {
  return ws.map(w => w.message);
}

/** Resolve one row and build its classification. Throws on malformed rows. */
export function classifyRow(
  row: unknown,
  store: ReferenceStore,
  indices: IndexSet,
  opts: ClassifierOptionsT = DEFAULT_OPTIONS
): ClassificationRecord {
  const parsed = InputRow.safeParse(row);
  if (!parsed.success) {
    throw new InvalidInputError(`row is not a flat record of text cells: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }

  const res = resolve(parsed.data, indices, store, opts);
  const warnings = [...res.warnings];

  if (res.error) {
    return { ...emptyRecord(res.method, messages(warnings)), error: { code: res.error.code, message: res.error.message } };
  }
  if (!isMatched(res.method)) {
    const e = new UnresolvedRecordError();
    return { ...emptyRecord(res.method, messages(warnings)), error: { code: e.code, message: e.message } };
  }

  const chain = res.familyId ? buildChain(res.familyId, store, opts.maxChainDepth) : undefined;
  if (chain) warnings.push(...chain.warnings);

  const tier = deriveTier(res, chain, store, opts.defaultType);
  const target = store.getTarget(res.targetId ?? undefined);
  const ids = chain?.ids ?? [];
  const names = chain?.names ?? [];

  return {
    target_id: res.targetId,
    family_id: res.familyId,
    ...tier,
    family_chain_ids: ids,
    family_chain_names: names,
    full_id_path: formatPath(ids, res.targetId, opts),
    full_name_path: formatPath(names.filter(n => !GENERIC_FAMILY_NAMES.has(nameKey(n))), target?.target_name, opts),
    resolution_method: res.method,
    matched: true,
    truncated: chain?.truncated ?? false,
    warnings: messages(warnings)
  };
}

/**
 * Classify every row independently. N rows in, N records out, same order;
 * a failing row becomes `matched=false` with an error annotation.
 */
export function runBatch(
  rows: readonly unknown[],
  store: ReferenceStore,
  indices: IndexSet,
  opts: ClassifierOptionsT = DEFAULT_OPTIONS
): ClassificationRecord[] {
  return rows.map(row => {
    try {
      return classifyRow(row, store, indices, opts);
    } catch (e: unknown) {
      return { ...emptyRecord('error'), error: { code: errorCode(e), message: errorMessage(e) } };
    }
  });
}

export type BatchSummary = {
  total: number;
  matched: number;
  unmatched: number;
  truncated: number;
  byMethod: Partial<Record<ResolutionMethod, number>>;
};

export function summarizeBatch(records: readonly ClassificationRecord[]): BatchSummary {
  const byMethod: Partial<Record<ResolutionMethod, number>> = {};
  let matched = 0;
  let truncated = 0;
  for (const r of records) {
    byMethod[r.resolution_method] = (byMethod[r.resolution_method] ?? 0) + 1;
    if (r.matched) matched++;
    if (r.truncated) truncated++;
  }
  return { total: records.length, matched, unmatched: records.length - matched, truncated, byMethod };
}
