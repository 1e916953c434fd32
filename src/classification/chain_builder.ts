// src/classification/chain_builder.ts

import type { ReferenceStore } from './reference_store.js';
import type { ChainTruncatedWarning, MissingFamilyWarning } from './errors.js';
import { idKey } from './keys.js';

export type FamilyChain = {
  ids: string[];
  names: string[];
  truncated: boolean;
  warnings: Array<ChainTruncatedWarning | MissingFamilyWarning>;
};

export const DEFAULT_MAX_DEPTH = 50;

/**
 * Follow parent_family_id links from `familyId` to a root, leaf first.
 * Stops on a repeated id (cycle) or after `maxDepth` families, marking the
 * chain truncated. A dangling pointer ends the walk with a warning.
 */
export function buildChain(familyId: string, store: ReferenceStore, maxDepth = DEFAULT_MAX_DEPTH): FamilyChain {
  const chain: FamilyChain = { ids: [], names: [], truncated: false, warnings: [] };
  const visited = new Set<string>();
  let current = familyId.trim();

  while (current) {
    const key = idKey(current);
    if (visited.has(key)) {
      chain.truncated = true;
      chain.warnings.push({
        kind: 'ChainTruncatedWarning',
        familyId: current,
        reason: 'cycle',
        message: `family ${current} repeats in the chain from ${familyId}`
      });
      break;
    }
    if (chain.ids.length >= maxDepth) {
      chain.truncated = true;
      chain.warnings.push({
        kind: 'ChainTruncatedWarning',
        familyId: current,
        reason: 'depth',
        message: `chain from ${familyId} exceeds ${maxDepth} families`
      });
      break;
    }

    const fam = store.getFamily(current);
    if (!fam) {
      chain.warnings.push({
        kind: 'MissingFamilyWarning',
        familyId: current,
        message: `family ${current} is not in the reference table`
      });
      break;
    }

    visited.add(key);
    chain.ids.push(fam.family_id);
    chain.names.push(fam.name);
    current = fam.parent_family_id.trim();
  }
  return chain;
}

export type PathSeparators = { pathSeparator: string; ownerSeparator: string };

/** "T1#F3>F2>F1"; just "F3>F2>F1" without an owner, "" for an empty chain. */
export function formatPath(parts: string[], owner: string | null | undefined, seps: PathSeparators): string {
  if (!parts.length) return '';
  const path = parts.join(seps.pathSeparator);
  return owner ? `${owner}${seps.ownerSeparator}${path}` : path;
}
