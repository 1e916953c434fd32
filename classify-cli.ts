#!/usr/bin/env node
/**
 * Target classification CLI
 * -------------------------
 * Reads a delimited input table of target identifiers, resolves each row
 * against the targets/families reference tables and writes the input
 * columns followed by the classification columns.
 *
 *   classify-targets --targets target.csv --families family.csv \
 *     --input input.csv --output output.csv [--sep ';'] [--reference-sep ',']
 *     [--encoding utf-8] [--log-level debug] [--ec-precision 2] [--max-depth 50]
 *
 * Environment variables (CLASSIFY_*, LOG_LEVEL) supply defaults; flags win.
 */

import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { loadConfig, ClassificationError, summarizeBatch } from './src/classification/index.js';
import { readTable, writeTable, toBufferEncoding, toSeparator } from './src/io/delimited.js';
import { mergeClassification } from './src/io/classification_table.js';
import { loadClassifierFromFiles } from './src/io/reference_files.js';
import { createLogger, setLogLevel } from './src/log.js';

const log = createLogger('classify');

const USAGE = 'Usage: classify-targets --targets <file> --families <file> --input <file> --output <file> ' +
  '[--sep ,] [--reference-sep <sep>] [--encoding utf-8] [--log-level info] [--ec-precision 2] [--max-depth 50]';

class UsageError extends Error {}

export type CliArgs = {
  targets: string;
  families: string;
  input: string;
  output: string;
  sep?: string;
  referenceSep?: string;
  encoding?: string;
  logLevel?: string;
  ecPrecision?: string;
  maxDepth?: string;
};

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      targets: { type: 'string' },
      families: { type: 'string' },
      input: { type: 'string' },
      output: { type: 'string' },
      sep: { type: 'string' },
      'reference-sep': { type: 'string' },
      encoding: { type: 'string' },
      'log-level': { type: 'string' },
      'ec-precision': { type: 'string' },
      'max-depth': { type: 'string' }
    },
    strict: true,
    allowPositionals: false
  });

  const missing = (['targets', 'families', 'input', 'output'] as const).filter(k => !values[k]);
  if (missing.length) throw new UsageError(`Missing required option(s): ${missing.map(m => `--${m}`).join(', ')}`);

  return {
    targets: values.targets ?? '',
    families: values.families ?? '',
    input: values.input ?? '',
    output: values.output ?? '',
    sep: values.sep,
    referenceSep: values['reference-sep'],
    encoding: values.encoding,
    logLevel: values['log-level'],
    ecPrecision: values['ec-precision'],
    maxDepth: values['max-depth']
  };
}

/** Flags replace their environment variables before anything is validated. */
export function withCliOverrides(
  args: CliArgs,
  env: Record<string, string | undefined>
): Record<string, string | undefined> {
  const flags: Record<string, string | undefined> = {
    CLASSIFY_EC_PRECISION: args.ecPrecision,
    CLASSIFY_MAX_CHAIN_DEPTH: args.maxDepth,
    CLASSIFY_SEP: args.sep,
    CLASSIFY_ENCODING: args.encoding,
    LOG_LEVEL: args.logLevel
  };
  const out = { ...env };
  for (const [k, v] of Object.entries(flags)) if (v !== undefined) out[k] = v;
  return out;
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    console.error(USAGE);
    return 2;
  }

  try {
    const cfg = loadConfig(withCliOverrides(args, process.env));
    setLogLevel(cfg.server.logLevel);
    const options = cfg.classifier;
    const io = {
      sep: toSeparator(cfg.server.sep),
      encoding: toBufferEncoding(cfg.server.encoding)
    };
    const referenceIo = { ...io, sep: args.referenceSep ? toSeparator(args.referenceSep) : io.sep };

    const classifier = await loadClassifierFromFiles(args.targets, args.families, referenceIo, options);

    log.info(`Reading input data from ${args.input}`);
    const input = await readTable(args.input, io);
    log.info(`Classifying ${input.rows.length} rows`);
    const records = classifier.classifyAll(input.rows);
    records.forEach((r, i) => {
      if (r.error) log.debug(`row ${i + 1}: ${r.resolution_method}: ${r.error.message}`);
    });

    const s = summarizeBatch(records);
    log.info(`Matched ${s.matched}/${s.total} rows (${s.truncated} truncated chains)`, s.byMethod);

    log.info(`Writing output to ${args.output}`);
    await writeTable(args.output, mergeClassification(input, records, options.pathSeparator), io);
    return 0;
  } catch (e: unknown) {
    if (e instanceof ClassificationError) log.error(`${e.code}: ${e.message}`);
    else log.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;
if (invokedDirectly) {
  main(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    (e: unknown) => { console.error(e); process.exitCode = 1; }
  );
}
