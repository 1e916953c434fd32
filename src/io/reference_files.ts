// src/io/reference_files.ts

import { createClassifier, type Classifier, type ClassifierOptionsT } from '../classification/index.js';
import { readTable, type DelimitedOptions } from './delimited.js';
import { createLogger } from '../log.js';

const log = createLogger('reference');

/**
 * Read the targets and families tables and build the engine over them.
 * Load-time integrity errors propagate: nothing can be classified without a
 * consistent reference store.
 */
export async function loadClassifierFromFiles(
  targetsPath: string,
  familiesPath: string,
  io: DelimitedOptions,
  options: ClassifierOptionsT
): Promise<Classifier> {
  log.info(`Reading targets from ${targetsPath}`);
  const targets = await readTable(targetsPath, io);
  log.info(`Reading families from ${familiesPath}`);
  const families = await readTable(familiesPath, io);

  const classifier = createClassifier(targets, families, options);
  log.info(`Loaded ${classifier.store.targets.length} targets, ${classifier.store.families.length} families`);
  for (const w of classifier.indices.warnings) log.warn(w.message);
  return classifier;
}
