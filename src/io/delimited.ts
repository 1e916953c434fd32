// src/io/delimited.ts
// Delimited text tables (CSV, TSV, ';'-separated). Every cell stays a string.

import * as fs from 'fs';
import * as path from 'path';
import type { Table } from '../classification/schemas.js';

export type DelimitedOptions = {
  sep?: string;
  encoding?: BufferEncoding;
};

/** Accept "utf-8", "UTF8", "latin1" ... as given on a command line. */
export function toBufferEncoding(x: string | undefined): BufferEncoding {
  const s = String(x ?? 'utf-8').trim().toLowerCase();
  if (s === 'utf8' || s === 'utf-8') return 'utf-8';
  if (s === 'latin1' || s === 'iso-8859-1' || s === 'cp1252' || s === 'windows-1252') return 'latin1';
  if (Buffer.isEncoding(s)) return s;
  throw new Error(`Unsupported encoding: ${x}`);
}

/** "\t" typed on a shell arrives as two characters. */
export function toSeparator(x: string | undefined): string {
  if (!x) return ',';
  if (x === '\\t' || x.toLowerCase() === 'tab') return '\t';
  return x;
}

/** Split text into records of fields. Quotes may wrap separators and newlines. */
export function parseRecords(text: string, sep = ','): string[][] {
  const src = text.replace(/^\uFEFF/, '');
  const records: string[][] = [];
  let field = '';
  let record: string[] = [];
  let quoted = false;
  let i = 0;

  const endField = () => { record.push(field); field = ''; };
  const endRecord = () => { endField(); records.push(record); record = []; };

  while (i < src.length) {
    const ch = src[i];
    if (quoted) {
      if (ch === '"') {
        if (src[i + 1] === '"') { field += '"'; i += 2; continue; }
        quoted = false; i++; continue;
      }
      field += ch; i++; continue;
    }
    if (ch === '"' && field === '') { quoted = true; i++; continue; }
    if (src.startsWith(sep, i)) { endField(); i += sep.length; continue; }
    if (ch === '\r' && src[i + 1] === '\n') { endRecord(); i += 2; continue; }
    if (ch === '\n' || ch === '\r') { endRecord(); i++; continue; }
    field += ch; i++;
  }
  if (field !== '' || record.length) endRecord();
  return records;
}

export function parseDelimited(text: string, opts: DelimitedOptions = {}): Table {
  const [header, ...body] = parseRecords(text, opts.sep ?? ',');
  if (!header) return { columns: [], rows: [] };
  const columns = header.map(h => h.trim());
  const rows = body
    .filter(r => !(r.length === 1 && r[0] === ''))
    .map(r => {
      const row: Record<string, string> = {};
      columns.forEach((c, j) => {
        if (row[c] === undefined) row[c] = r[j] ?? '';
      });
      return row;
    });
  return { columns, rows };
}

function escapeCell(v: string, sep: string): string {
  if (v.includes(sep) || v.includes('"') || v.includes('\n') || v.includes('\r')) {
    return `"${v.replace(/"/g, '""')}"`;
  }
  return v;
}

export function formatDelimited(columns: string[], rows: Array<Record<string, string>>, opts: DelimitedOptions = {}): string {
  const sep = opts.sep ?? ',';
  const lines = [columns.map(c => escapeCell(c, sep)).join(sep)];
  for (const r of rows) lines.push(columns.map(c => escapeCell(r[c] ?? '', sep)).join(sep));
  return lines.join('\n') + '\n';
}

export async function readTable(file: string, opts: DelimitedOptions = {}): Promise<Table> {
  const text = await fs.promises.readFile(file, { encoding: opts.encoding ?? 'utf-8' });
  return parseDelimited(text, opts);
}

export async function writeTable(file: string, table: Table, opts: DelimitedOptions = {}): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.promises.writeFile(file, formatDelimited(table.columns, table.rows, opts), { encoding: opts.encoding ?? 'utf-8' });
}
