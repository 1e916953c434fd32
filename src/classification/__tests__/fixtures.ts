import type { Table } from '../schemas.js';

/** Build a Table from a header and positional rows. */
export function table(columns: string[], rows: string[][]): Table {
  return {
    columns,
    rows: rows.map(r => Object.fromEntries(columns.map((c, i) => [c, r[i] ?? ''])))
  };
}

export const TARGET_COLUMNS = [
  'target_id', 'swissprot', 'hgnc_name', 'hgnc_id', 'gene_name', 'synonyms',
  'family_id', 'target_name', 'type', 'ec_number'
];

export const FAMILY_COLUMNS = ['family_id', 'family_name', 'parent_family_id', 'type', 'ec_number', 'target_id'];

export function targets(): Table {
  return table(TARGET_COLUMNS, [
    ['T1', 'Q11111', 'ADRB1', 'HGNC:285', 'ADRB1', 'beta1-adrenoceptor|ABC1', 'F3', 'beta-1 adrenoceptor', '', ''],
    ['T2', 'P22222', 'EGFR', '3236', 'EGFR', 'ERBB1|ABC1', 'F5', 'EGF receptor', 'Receptor.Catalytic receptor', ''],
    ['T3', 'P33333', 'HMGCR', '5006', 'HMGCR', 'HMG-CoA reductase', '', 'HMG-CoA reductase', 'Enzyme.Oxidoreductase', '1.1.1.34'],
    ['T4', '', '', '', '', '', '', 'Orphan kinase', '', '']
  ]);
}

export function families(): Table {
  return table(FAMILY_COLUMNS, [
    ['F1', 'GPCRs', '', 'Receptor.G protein-coupled receptor', '', ''],
    ['F2', 'Class A', 'F1', '', '', ''],
    ['F3', 'Adrenoceptors', 'F2', '', '', ''],
    ['F5', 'Receptor kinases', '', 'Receptor.Catalytic receptor', '', 'T2|T4'],
    ['F7', 'Kinases', '', 'Enzyme.Transferase', '2.7.11.1', ''],
    ['F8', 'Serine proteases', '', 'Enzyme.Hydrolase', '3.4.21.5', ''],
    ['F9', 'Cysteine proteases', '', 'Enzyme.Hydrolase', '3.4.22.1', '']
  ]);
}
