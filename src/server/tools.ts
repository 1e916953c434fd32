// src/server/tools.ts
// Classification engine exposed as MCP-style tools.

import { z } from 'zod';
import type { Tool } from '../../registerGetWrapper.js';
import {
  InputRow,
  buildChain,
  formatPath,
  indexSizes,
  summarizeBatch,
  type Classifier
} from '../classification/index.js';

// -------- Schemas --------
const ClassifyRecordInput = z.object({
  row: InputRow                                // e.g. { uniprot_id: "P00533" }
});

const ClassifyBatchInput = z.object({
  rows: z.array(InputRow).min(1).max(5000)
});

const ClassifyChainInput = z.object({
  family_id: z.string().min(1),                // kept as text: ids are zero-padded
  max_depth: z.number().int().min(1).max(10_000).optional()
});

const ReferenceInfoInput = z.object({});

// -------- Tool implementations --------
export function buildTools(classifier: Classifier): Tool[] {
  const { store, indices, options } = classifier;
  const tools: Tool[] = [];

  tools.push({
    name: 'classify.record',
    description: 'Resolve one row of target identifiers to its classification path',
    inputSchema: ClassifyRecordInput,
    handler: async (input: unknown) => {
      const p = ClassifyRecordInput.parse(input);
      return classifier.classify(p.row);
    }
  });

  tools.push({
    name: 'classify.batch',
    description: 'Resolve many rows; one classification per row, in input order',
    inputSchema: ClassifyBatchInput,
    handler: async (input: unknown) => {
      const p = ClassifyBatchInput.parse(input);
      const records = classifier.classifyAll(p.rows);
      return { records, summary: summarizeBatch(records) };
    }
  });

  tools.push({
    name: 'classify.chain',
    description: 'Walk the family hierarchy from a family id to its root',
    inputSchema: ClassifyChainInput,
    handler: async (input: unknown) => {
      const p = ClassifyChainInput.parse(input);
      const chain = buildChain(p.family_id, store, p.max_depth ?? options.maxChainDepth);
      return {
        family_id: p.family_id,
        ids: chain.ids,
        names: chain.names,
        truncated: chain.truncated,
        full_id_path: formatPath(chain.ids, null, options),
        full_name_path: formatPath(chain.names, null, options),
        warnings: chain.warnings.map(w => w.message)
      };
    }
  });

  tools.push({
    name: 'reference.info',
    description: 'Reference table sizes, index sizes and load warnings',
    inputSchema: ReferenceInfoInput,
    handler: async () => ({
      targets: store.targets.length,
      families: store.families.length,
      indices: indexSizes(indices),
      ec_precision: indices.ecPrecision,
      warnings: indices.warnings.map(w => w.message)
    })
  });

  return tools;
}
