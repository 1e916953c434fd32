import { describe, it, expect } from 'vitest';
import { loadReferenceStore } from '../reference_store.js';
import { buildChain, formatPath } from '../chain_builder.js';
import { table, FAMILY_COLUMNS, TARGET_COLUMNS } from './fixtures.js';

const noTargets = table(TARGET_COLUMNS, []);

function storeOf(rows: string[][]) {
  return loadReferenceStore(noTargets, table(FAMILY_COLUMNS, rows));
}

const seps = { pathSeparator: '>', ownerSeparator: '#' };

describe('buildChain', () => {
  it('walks from the leaf family to the root', () => {
    const store = storeOf([
      ['F1', 'Root', ''],
      ['F2', 'Middle', 'F1'],
      ['F3', 'Leaf', 'F2']
    ]);
    const chain = buildChain('F3', store);
    expect(chain.ids).toEqual(['F3', 'F2', 'F1']);
    expect(chain.names).toEqual(['Leaf', 'Middle', 'Root']);
    expect(chain.truncated).toBe(false);
    expect(chain.warnings).toEqual([]);
  });

  it('stops on a self-parent with a chain of length 1', () => {
    const store = storeOf([['F9', 'Loop', 'F9']]);
    const chain = buildChain('F9', store);
    expect(chain.ids).toEqual(['F9']);
    expect(chain.truncated).toBe(true);
    expect(chain.warnings).toEqual([
      { kind: 'ChainTruncatedWarning', familyId: 'F9', reason: 'cycle', message: 'family F9 repeats in the chain from F9' }
    ]);
  });

  it('terminates on a two-family cycle', () => {
    const store = storeOf([
      ['A', 'Alpha', 'B'],
      ['B', 'Beta', 'A']
    ]);
    const chain = buildChain('A', store, 50);
    expect(chain.ids).toEqual(['A', 'B']);
    expect(chain.truncated).toBe(true);
    expect(chain.warnings[0]).toMatchObject({ reason: 'cycle', familyId: 'A' });
  });

  it('stops after maxDepth families', () => {
    const store = storeOf([
      ['L1', 'one', 'L2'],
      ['L2', 'two', 'L3'],
      ['L3', 'three', 'L4'],
      ['L4', 'four', 'L5'],
      ['L5', 'five', '']
    ]);
    const short = buildChain('L1', store, 3);
    expect(short.ids).toEqual(['L1', 'L2', 'L3']);
    expect(short.truncated).toBe(true);
    expect(short.warnings[0]).toMatchObject({ reason: 'depth', familyId: 'L4' });

    const exact = buildChain('L1', store, 5);
    expect(exact.ids).toHaveLength(5);
    expect(exact.truncated).toBe(false);
  });

  it('ends at a dangling parent without truncating', () => {
    const store = storeOf([['M1', 'Orphan', 'GONE']]);
    const chain = buildChain('M1', store);
    expect(chain.ids).toEqual(['M1']);
    expect(chain.truncated).toBe(false);
    expect(chain.warnings).toEqual([
      { kind: 'MissingFamilyWarning', familyId: 'GONE', message: 'family GONE is not in the reference table' }
    ]);
  });

  it('returns an empty chain for an unknown start family', () => {
    const chain = buildChain('NOPE', storeOf([]));
    expect(chain.ids).toEqual([]);
    expect(chain.warnings.map(w => w.kind)).toEqual(['MissingFamilyWarning']);
  });
});

describe('formatPath', () => {
  it('prefixes the owner', () => {
    expect(formatPath(['F3', 'F2', 'F1'], 'T1', seps)).toBe('T1#F3>F2>F1');
  });

  it('omits a missing owner', () => {
    expect(formatPath(['F2', 'F1'], null, seps)).toBe('F2>F1');
  });

  it('is empty for an empty chain', () => {
    expect(formatPath([], 'T1', seps)).toBe('');
  });

  it('uses the given separators', () => {
    expect(formatPath(['a', 'b'], 'x', { pathSeparator: ' / ', ownerSeparator: ': ' })).toBe('x: a / b');
  });
});
