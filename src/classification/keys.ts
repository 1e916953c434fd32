// src/classification/keys.ts
// Key normalization shared by the loader, the indices and the resolver.

import type { Tier } from './schemas.js';

/** "  Target ID " -> "target_id" */
export function normalizeHeader(h: string): string {
  return String(h ?? '')
    .replace(/^\uFEFF/, '')
    .trim()
    .toLowerCase()
    .replace(/[\s\-.]+/g, '_');
}

/** Comparison key for identifiers: trimmed, uppercase. */
export function idKey(x: string | undefined): string {
  return String(x ?? '').trim().toUpperCase();
}

/** Comparison key for names: trimmed, lowercase. */
export function nameKey(x: string | undefined): string {
  return String(x ?? '').trim().toLowerCase();
}

/** "HGNC:1234", "HGNC: 1234" and "1234" share a key. */
export function hgncIdKey(x: string | undefined): string {
  return idKey(x).replace(/^HGNC:\s*/, '');
}

/**
 * Split `|`-separated cells into unique trimmed tokens, keeping first-seen order.
 * A leading `synonyms=` tag is dropped from each token.
 */
export function splitList(...cells: Array<string | undefined>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const cell of cells) {
    if (!cell) continue;
    for (const raw of String(cell).split('|')) {
      const tok = raw.trim().replace(/^synonyms=/, '').trim();
      if (!tok || seen.has(tok)) continue;
      seen.add(tok);
      out.push(tok);
    }
  }
  return out;
}

/** First token of a `|`-separated cell (ChEMBL "gene" cells list several symbols). */
export function firstToken(cell: string | undefined): string {
  return splitList(cell)[0] ?? '';
}

export const EMPTY_TIER: Tier = { type: '', class: '', subclass: '' };

/**
 * Build a tier from a dotted type label plus optional explicit class/subclass.
 * "Enzyme.Lyase" -> { class: "Enzyme", subclass: "Lyase" }
 */
export function tierFromLabels(type: string, cls = '', subclass = ''): Tier {
  const t = type.trim();
  const dot = t.indexOf('.');
  const head = dot >= 0 ? t.slice(0, dot) : t;
  const tail = dot >= 0 ? t.slice(dot + 1) : '';
  const c = cls.trim() || head;
  const s = subclass.trim() || tail;
  return {
    type: t || (c ? (s ? `${c}.${s}` : c) : ''),
    class: c,
    subclass: s
  };
}

export function isEmptyTier(t: Tier): boolean {
  return !t.type && !t.class && !t.subclass;
}
