import { describe, it, expect } from 'vitest';
import { loadReferenceStore } from '../reference_store.js';
import { SchemaError, DuplicateKeyError } from '../errors.js';
import { table, targets, families, TARGET_COLUMNS, FAMILY_COLUMNS } from './fixtures.js';

describe('loadReferenceStore', () => {
  it('loads both tables and keeps ids as text', () => {
    const store = loadReferenceStore(
      table(TARGET_COLUMNS, [['0001', 'Q12345', 'GeneX', '1', 'GENE1', 'Syn1|Syn2', '0100', 'TargetX', 'Enzyme.Lyase', '']]),
      table(FAMILY_COLUMNS, [['0100', 'FamilyX', '', 'Enzyme.Lyase', '', '0001']])
    );
    const t = store.getTarget('0001');
    expect(t?.target_id).toBe('0001');
    expect(t?.family_id).toBe('0100');
    expect(t?.synonyms).toEqual(['Syn1', 'Syn2']);
    expect(store.getFamily('0100')?.name).toBe('FamilyX');
    expect(store.getTarget('1')).toBeUndefined();
  });

  it('normalizes header case and whitespace', () => {
    const store = loadReferenceStore(
      table([' Target_ID ', 'SwissProt', 'HGNC_NAME', 'HGNC_ID', 'Gene Name', 'SYNONYMS', 'Family_ID'], [
        ['T1', 'Q11111', 'ADRB1', '285', 'ADRB1', '', 'F1']
      ]),
      table(['FAMILY_ID', 'Family_Name', 'Parent_Family_ID'], [['F1', 'GPCRs', '']])
    );
    expect(store.getTarget('T1')?.uniprot_id).toBe('Q11111');
    expect(store.getTarget('T1')?.gene_name).toBe('ADRB1');
    expect(store.familyOfTarget('T1')?.name).toBe('GPCRs');
  });

  it('fills a missing family_id from the family membership list', () => {
    const store = loadReferenceStore(targets(), families());
    expect(store.getTarget('T4')?.family_id).toBe('F5');
    expect(store.getTarget('T3')?.family_id).toBe('');
  });

  it('drops the synonyms= tag and duplicate tokens', () => {
    const store = loadReferenceStore(
      table(TARGET_COLUMNS, [['T1', '', '', '', '', 'synonyms=Alpha| Beta |Alpha', '', '', '', '']]),
      table(FAMILY_COLUMNS, [])
    );
    expect(store.getTarget('T1')?.synonyms).toEqual(['Alpha', 'Beta']);
  });

  it('skips fully blank rows', () => {
    const store = loadReferenceStore(
      table(TARGET_COLUMNS, [['T1'], ['', '', ''], ['T2']]),
      table(FAMILY_COLUMNS, [])
    );
    expect(store.targets.map(t => t.target_id)).toEqual(['T1', 'T2']);
  });

  it('raises SchemaError naming the missing columns', () => {
    const cols = TARGET_COLUMNS.filter(c => c !== 'family_id' && c !== 'hgnc_id');
    const load = () => loadReferenceStore(table(cols, [['T1']]), families());
    expect(load).toThrow(SchemaError);
    let caught: unknown;
    try {
      load();
    } catch (e) {
      caught = e;
    }
    expect(caught).toMatchObject({ code: 'SCHEMA', table: 'targets', missing: ['hgnc_id', 'family_id'] });
  });

  it('raises SchemaError when the family table lacks parent_family_id', () => {
    expect(() => loadReferenceStore(targets(), table(['family_id', 'family_name'], [['F1', 'GPCRs']])))
      .toThrow('families: missing required columns: parent_family_id');
  });

  it('raises SchemaError on a row with an empty key', () => {
    expect(() => loadReferenceStore(table(TARGET_COLUMNS, [['', 'Q11111']]), families()))
      .toThrow('targets: row 2: empty target_id');
  });

  it('raises DuplicateKeyError on a repeated target_id', () => {
    const t = table(TARGET_COLUMNS, [['T1', 'Q11111'], ['T2'], ['T1', 'Q99999']]);
    expect(() => loadReferenceStore(t, families())).toThrow(DuplicateKeyError);
    expect(() => loadReferenceStore(t, families())).toThrow('targets: duplicate key "T1"');
  });

  it('raises DuplicateKeyError on a repeated family_id', () => {
    const f = table(FAMILY_COLUMNS, [['F1', 'A'], ['F1', 'B']]);
    expect(() => loadReferenceStore(targets(), f)).toThrow('families: duplicate key "F1"');
  });

  it('is read-only after construction', () => {
    const store = loadReferenceStore(targets(), families());
    expect(Object.isFrozen(store)).toBe(true);
    expect(Object.isFrozen(store.getTarget('T1'))).toBe(true);
    expect(Object.isFrozen(store.targets)).toBe(true);
  });
});
