// src/classification/ec_number.ts

import { splitList } from './keys.js';

/** EC numbers in a cell: "1.1.1.1|EC 2.7.11.1" -> ["1.1.1.1", "2.7.11.1"] */
export function parseEcNumbers(cell: string | undefined): string[] {
  return splitList(cell)
    .map(tok => tok.replace(/^EC[\s:]*/i, '').trim())
    .filter(tok => tok && tok.toUpperCase() !== 'EC-NOT-ASSIGNED' && tok.includes('.'));
}

/**
 * Leading `precision` components of an EC number, or undefined when the
 * number is less specific than that ("3.-.-.-" has one concrete component).
 */
export function ecPrefix(ec: string, precision: number): string | undefined {
  const parts: string[] = [];
  for (const p of ec.split('.')) {
    const t = p.trim();
    if (!t || t === '-' || !/^n?\d+$/.test(t)) break;
    parts.push(t);
    if (parts.length === precision) break;
  }
  return parts.length === precision ? parts.join('.') : undefined;
}

/** Enzyme subclass by top-level EC code. */
export const EC_CLASS_SUBCLASS: Readonly<Record<string, string>> = {
  '1': 'Oxidoreductase',
  '2': 'Transferase',
  '3': 'Hydrolase',
  '4': 'Lyase',
  '5': 'Isomerase',
  '6': 'Ligase',
  '7': 'Translocase'
};

/**
 * Coarse enzyme type from EC numbers: one known top-level code gives
 * "Enzyme.<Subclass>", several distinct codes give "Enzyme.Multifunctional".
 */
export function ecClassType(ecNumbers: string[]): string | undefined {
  const codes = new Set<string>();
  for (const ec of ecNumbers) {
    const top = ecPrefix(ec, 1);
    if (top) codes.add(top);
  }
  if (codes.size === 0) return undefined;
  if (codes.size > 1) return 'Enzyme.Multifunctional';
  const [code] = [...codes];
  const sub = EC_CLASS_SUBCLASS[code];
  return sub ? `Enzyme.${sub}` : undefined;
}
