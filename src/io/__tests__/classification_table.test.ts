import { describe, it, expect } from 'vitest';
import { flattenRecord, mergeClassification, CLASSIFICATION_COLUMNS } from '../classification_table.js';
import type { ClassificationRecord } from '../../classification/schemas.js';

const matched: ClassificationRecord = {
  target_id: '0001',
  family_id: '100',
  type: 'Enzyme.Lyase',
  class: 'Enzyme',
  subclass: 'Lyase',
  family_chain_ids: ['100', '10'],
  family_chain_names: ['FamilyX', 'Enzymes'],
  full_id_path: '0001#100>10',
  full_name_path: 'TargetX#FamilyX>Enzymes',
  resolution_method: 'uniprot_id',
  matched: true,
  truncated: false,
  warnings: []
};

const unresolved: ClassificationRecord = {
  target_id: null,
  family_id: null,
  type: '',
  class: '',
  subclass: '',
  family_chain_ids: [],
  family_chain_names: [],
  full_id_path: '',
  full_name_path: '',
  resolution_method: 'unresolved',
  matched: false,
  truncated: false,
  error: { code: 'UNRESOLVED', message: 'no match' },
  warnings: []
};

describe('flattenRecord', () => {
  it('renders lists, flags and errors as text', () => {
    expect(flattenRecord(matched)).toMatchObject({
      target_id: '0001',
      family_chain_ids: '100>10',
      matched: 'true',
      truncated: 'false',
      error: ''
    });
    expect(flattenRecord(unresolved, '|')).toMatchObject({
      target_id: '',
      family_chain_ids: '',
      matched: 'false',
      error: 'UNRESOLVED: no match'
    });
  });
});

describe('mergeClassification', () => {
  it('appends classification columns after the input columns', () => {
    const input = {
      columns: ['swissprot', 'note'],
      rows: [{ swissprot: 'Q12345', note: 'a' }, { swissprot: 'Q99999', note: 'b' }]
    };
    const out = mergeClassification(input, [matched, unresolved]);
    expect(out.columns).toEqual(['swissprot', 'note', ...CLASSIFICATION_COLUMNS]);
    expect(out.rows[0]).toMatchObject({ swissprot: 'Q12345', note: 'a', full_id_path: '0001#100>10' });
    expect(out.rows[1]).toMatchObject({ note: 'b', resolution_method: 'unresolved' });
  });

  it('overwrites a classification column already in the input', () => {
    const input = { columns: ['type', 'swissprot'], rows: [{ type: 'stale', swissprot: 'Q12345' }] };
    const out = mergeClassification(input, [matched]);
    expect(out.columns.slice(0, 3)).toEqual(['type', 'swissprot', 'target_id']);
    expect(out.columns.filter(c => c === 'type')).toHaveLength(1);
    expect(out.rows[0].type).toBe('Enzyme.Lyase');
  });

  it('rejects a record count that differs from the row count', () => {
    expect(() => mergeClassification({ columns: ['a'], rows: [{ a: '1' }] }, []))
      .toThrow('row count mismatch: 1 input rows, 0 records');
  });
});
