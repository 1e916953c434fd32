import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { handleRpc, describeSchema } from '../rpc.js';
import { buildTools } from '../tools.js';
import { createClassifier } from '../../classification/index.js';
import type { Tool } from '../../../registerGetWrapper.js';
import { targets, families } from '../../classification/__tests__/fixtures.js';

const tools = buildTools(createClassifier(targets(), families()));

function call(name: string, args: unknown) {
  return handleRpc(tools, { jsonrpc: '2.0', id: 7, method: 'tools/call', params: { name, arguments: args } });
}

describe('describeSchema', () => {
  it('lists top-level fields and which are required', () => {
    const schema = z.object({ family_id: z.string(), max_depth: z.number().optional(), rows: z.array(z.string()) });
    expect(describeSchema(schema)).toEqual({
      type: 'object',
      properties: { family_id: { type: 'string' }, max_depth: { type: 'number' }, rows: { type: 'array' } },
      required: ['family_id', 'rows']
    });
  });

  it('falls back to a bare object for other schemas', () => {
    expect(describeSchema(z.string())).toEqual({ type: 'object' });
  });
});

describe('handleRpc', () => {
  it('lists the classification tools', async () => {
    const { status, body } = await handleRpc(tools, { jsonrpc: '2.0', id: 1, method: 'tools/list' });
    expect(status).toBe(200);
    expect('result' in body && body.result).toMatchObject({
      tools: [
        { name: 'classify.record' },
        { name: 'classify.batch' },
        { name: 'classify.chain' },
        { name: 'reference.info' }
      ]
    });
  });

  it('classifies a single row', async () => {
    const { body } = await call('classify.record', { row: { uniprot_id: 'Q11111' } });
    expect(body).toMatchObject({
      jsonrpc: '2.0',
      id: 7,
      result: { content: { target_id: 'T1', full_id_path: 'T1#F3>F2>F1' } }
    });
  });

  it('classifies a batch with a summary', async () => {
    const { body } = await call('classify.batch', { rows: [{ hgnc_name: 'EGFR' }, { gene_name: 'nope' }] });
    expect(body).toMatchObject({
      result: {
        content: {
          records: [{ target_id: 'T2' }, { resolution_method: 'unresolved' }],
          summary: { total: 2, matched: 1, unmatched: 1 }
        }
      }
    });
  });

  it('walks a family chain', async () => {
    const { body } = await call('classify.chain', { family_id: 'F3', max_depth: 2 });
    expect(body).toMatchObject({
      result: {
        content: {
          family_id: 'F3',
          ids: ['F3', 'F2'],
          truncated: true,
          full_id_path: 'F3>F2',
          full_name_path: 'Adrenoceptors>Class A',
          warnings: ['chain from F3 exceeds 2 families']
        }
      }
    });
  });

  it('reports reference sizes', async () => {
    const { body } = await call('reference.info', {});
    expect(body).toMatchObject({
      result: { content: { targets: 4, families: 7, ec_precision: 2, warnings: ['synonym "abc1" is shared by T1 and T2; keeping T1'] } }
    });
  });

  it('rejects invalid arguments with -32602', async () => {
    const { body } = await call('classify.batch', { rows: [] });
    expect(body).toMatchObject({ id: 7, error: { code: -32602 } });
  });

  it('rejects an unknown tool and method', async () => {
    expect((await call('classify.nothing', {})).body).toMatchObject({ error: { code: -32601, message: 'Unknown tool: classify.nothing' } });
    const { body } = await handleRpc(tools, { id: 'x', method: 'resources/list' });
    expect(body).toEqual({ jsonrpc: '2.0', id: 'x', error: { code: -32601, message: 'Method not found: resources/list' } });
  });

  it('answers 400 to a malformed request', async () => {
    expect(await handleRpc(tools, { method: 'tools/list' })).toEqual({
      status: 400,
      body: { jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } }
    });
  });

  it('maps a handler failure to -32000', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: Tool = {
      name: 'boom',
      description: 'always fails',
      inputSchema: z.object({}),
      handler: async () => { throw new Error('exploded'); }
    };
    const { body } = await handleRpc([failing], { id: 1, method: 'tools/call', params: { name: 'boom' } });
    expect(body).toEqual({ jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'exploded' } });
    vi.restoreAllMocks();
  });
});
