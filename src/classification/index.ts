// src/classification/index.ts

import type { ClassificationRecord, Table } from './schemas.js';
import { loadReferenceStore, type ReferenceStore } from './reference_store.js';
import { buildIndexSet, type IndexSet } from './index_builder.js';
import { classifyRow, runBatch } from './batch_runner.js';
import { DEFAULT_OPTIONS, type ClassifierOptionsT } from './config.js';

export * from './schemas.js';
export * from './errors.js';
export * from './config.js';
export * from './reference_store.js';
export * from './index_builder.js';
export * from './resolver.js';
export * from './chain_builder.js';
export * from './batch_runner.js';
export { parseEcNumbers, ecPrefix, ecClassType } from './ec_number.js';

export type Classifier = {
  store: ReferenceStore;
  indices: IndexSet;
  options: ClassifierOptionsT;
  classify: (row: unknown) => ClassificationRecord;
  classifyAll: (rows: readonly unknown[]) => ClassificationRecord[];
};

/** Load both reference tables once and bind the engine to them. */
export function createClassifier(
  targets: Table,
  families: Table,
  options: ClassifierOptionsT = DEFAULT_OPTIONS
): Classifier {
  const store = loadReferenceStore(targets, families);
  const indices = buildIndexSet(store, { ecPrecision: options.ecPrecision });
  return {
    store,
    indices,
    options,
    classify: row => classifyRow(row, store, indices, options),
    classifyAll: rows => runBatch(rows, store, indices, options)
  };
}
