// src/classification/schemas.ts

import { z } from 'zod';

/* =========================
 * Zod Schemas (Reference)
 * ========================= */

export const TargetRecord = z.object({
  target_id: z.string().min(1),        // zero-padded in the official files; never coerced
  uniprot_id: z.string(),
  hgnc_name: z.string(),
  hgnc_id: z.string(),
  gene_name: z.string(),
  synonyms: z.array(z.string()),
  family_id: z.string(),               // "" when the target sits outside the hierarchy
  ec_numbers: z.array(z.string()),
  target_name: z.string(),
  type: z.string(),                    // dotted "Class.Subclass"
  class: z.string(),
  subclass: z.string()
});

export type TargetRecordT = z.infer<typeof TargetRecord>;

export const FamilyRecord = z.object({
  family_id: z.string().min(1),
  parent_family_id: z.string(),        // "" at hierarchy roots
  name: z.string(),
  type: z.string(),
  class_name: z.string(),
  subclass_name: z.string(),
  ec_numbers: z.array(z.string()),
  target_ids: z.array(z.string())
});

export type FamilyRecordT = z.infer<typeof FamilyRecord>;

/** A parsed delimited table: every cell a string. */
export type Table = {
  columns: string[];
  rows: Array<Record<string, string>>;
};

/* =========================
 * Input rows
 * ========================= */

// Cells may arrive as numbers or booleans from JSON callers; they are read back as text.
const Cell = z.union([z.string(), z.number(), z.boolean(), z.null()]).optional();

export const InputRow = z.record(z.string(), Cell);

export type InputRowT = z.infer<typeof InputRow>;

/* =========================
 * Output
 * ========================= */

export const RESOLUTION_METHODS = [
  'target_id',
  'uniprot_id',
  'hgnc_name',
  'hgnc_id',
  'gene_name',
  'synonym',
  'target_name',
  'family_id',
  'ec_number',
  'ec_class',
  'ambiguous_ec',
  'unresolved',
  'error'
] as const;

export type ResolutionMethod = typeof RESOLUTION_METHODS[number];

export type Tier = {
  type: string;
  class: string;
  subclass: string;
};

export type ClassificationRecord = {
  target_id: string | null;
  family_id: string | null;
  type: string;
  class: string;
  subclass: string;
  family_chain_ids: string[];
  family_chain_names: string[];
  full_id_path: string;
  full_name_path: string;
  resolution_method: ResolutionMethod;
  matched: boolean;
  truncated: boolean;
  error?: { code: string; message: string };
  warnings: string[];
};
