/*
 * registerGetWrapper.ts
 *
 * Adds a REST-style GET route for the classification tools next to the
 * JSON-RPC endpoint. `/mcp/:toolName` takes query parameters, coerces
 * them (numbers, booleans, arrays via comma-separated values or `[]`
 * suffixes, objects via `row[col]=value`), validates them against the
 * tool's zod schema and answers JSON.
 *
 *   http://localhost:8788/mcp/classify.chain?family_id=0690-2
 *   http://localhost:8788/mcp/reference.info
 *
 * Identifier-like parameters (ids, accessions) are kept as strings: a
 * zero-padded family id such as "0690" must not become 690.
 */

import type { Request, Response, Express } from 'express';
import { z } from 'zod';

export type Tool = {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  handler: (args: unknown) => Promise<unknown>;
};

type Coerced = string | number | boolean | Coerced[] | { [key: string]: Coerced };

// Parameters whose values are identifiers and must stay text.
const TEXT_PARAM = /(^|_)(id|ids|accession|name|synonyms|ec_number|row|rows)$/;

function coerceValue(value: unknown, keepText: boolean): Coerced | undefined {
  if (Array.isArray(value)) {
    return value.map(v => coerceValue(v, keepText)).filter((v): v is Coerced => v !== undefined);
  }
  if (value !== null && typeof value === 'object') {
    // row[uniprot_id]=P12345 arrives as a nested object; its cells are text
    const out: { [key: string]: Coerced } = {};
    for (const [k, v] of Object.entries(value)) {
      const c = coerceValue(v, true);
      if (c !== undefined) out[k] = c;
    }
    return out;
  }
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (keepText) return trimmed;
  if (trimmed.includes(',')) {
    return trimmed.split(',').map(v => coerceValue(v, keepText)).filter((v): v is Coerced => v !== undefined);
  }
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  return trimmed;
}

/** Express req.query -> argument object. Keys ending with [] are arrays. */
export function parseQuery(query: Request['query']): Record<string, Coerced> {
  const result: Record<string, Coerced> = {};
  for (const [key, value] of Object.entries(query)) {
    const isArray = key.endsWith('[]');
    const cleanKey = isArray ? key.slice(0, -2) : key;
    const coerced = coerceValue(value, TEXT_PARAM.test(cleanKey));
    if (coerced === undefined) continue;
    result[cleanKey] = isArray && !Array.isArray(coerced) ? [coerced] : coerced;
  }
  return result;
}

export function zodMessage(e: z.ZodError): string {
  return e.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Register a GET route on the Express app to call tools by name.
 */
export function registerGetWrapper(app: Express, tools: Tool[]): void {
  app.get('/mcp/:toolName', async (req: Request, res: Response) => {
    const { toolName } = req.params;
    const tool = tools.find(t => t.name === toolName);
    if (!tool) {
      return res.status(404).json({ error: `Unknown tool: ${toolName}` });
    }
    const parsed = tool.inputSchema.safeParse(parseQuery(req.query));
    if (!parsed.success) {
      return res.status(400).json({ error: zodMessage(parsed.error) });
    }
    try {
      return res.json(await tool.handler(parsed.data));
    } catch (e: unknown) {
      return res.status(500).json({ error: e instanceof Error ? e.message : 'Tool error' });
    }
  });
}
