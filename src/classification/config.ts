// src/classification/config.ts

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

// Env values are strings; "" falls back to the default like an unset variable.
const envInt = (def: number, min: number, max: number) =>
  z.preprocess(
    v => (v === undefined || v === '' ? def : Number(v)),
    z.number().int().min(min).max(max)
  );

const envBool = (def: boolean) =>
  z.preprocess(v => {
    if (v === undefined || v === '') return def;
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(s)) return true;
    if (['0', 'false', 'no', 'off'].includes(s)) return false;
    return v;
  }, z.boolean());

const envStr = (def: string) =>
  z.preprocess(v => (v === undefined || v === '' ? def : v), z.string().min(1));

export const ClassifierOptions = z.object({
  ecPrecision: envInt(2, 1, 4),
  maxChainDepth: envInt(50, 1, 10_000),
  minSynonymLength: envInt(4, 1, 64),
  ecClassFallback: envBool(true),
  pathSeparator: envStr('>'),
  ownerSeparator: envStr('#'),
  defaultType: envStr('Other Protein Target.Other Protein Target')
});

export type ClassifierOptionsT = z.infer<typeof ClassifierOptions>;

export const DEFAULT_OPTIONS: ClassifierOptionsT = ClassifierOptions.parse({});

export const ServerSettings = z.object({
  port: envInt(8788, 1, 65_535),
  targetsPath: z.string().optional(),
  familiesPath: z.string().optional(),
  sep: envStr(','),
  encoding: envStr('utf-8'),
  logLevel: z.preprocess(
    v => (v === undefined || v === '' ? 'info' : String(v).toLowerCase()),
    z.enum(LOG_LEVELS)
  )
});

export type ServerSettingsT = z.infer<typeof ServerSettings>;

export type AppConfig = {
  classifier: ClassifierOptionsT;
  server: ServerSettingsT;
};

type Env = Record<string, string | undefined>;

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.infer<S> {
  const r = schema.safeParse(raw);
  if (!r.success) {
    const msg = r.error.issues.map(i => `${i.path.join('.') || what}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid ${what} configuration: ${msg}`);
  }
  return r.data;
}

/** Merge partial overrides (e.g. CLI flags) over validated defaults. */
export function classifierOptions(overrides: Partial<Record<keyof ClassifierOptionsT, unknown>> = {}): ClassifierOptionsT {
  return parseOrThrow(ClassifierOptions, overrides, 'classifier');
}

export function loadConfig(env: Env = process.env): AppConfig {
  const classifier = parseOrThrow(ClassifierOptions, {
    ecPrecision: env.CLASSIFY_EC_PRECISION,
    maxChainDepth: env.CLASSIFY_MAX_CHAIN_DEPTH,
    minSynonymLength: env.CLASSIFY_MIN_SYNONYM_LENGTH,
    ecClassFallback: env.CLASSIFY_EC_CLASS_FALLBACK,
    pathSeparator: env.CLASSIFY_PATH_SEPARATOR,
    ownerSeparator: env.CLASSIFY_OWNER_SEPARATOR,
    defaultType: env.CLASSIFY_DEFAULT_TYPE
  }, 'classifier');

  const server = parseOrThrow(ServerSettings, {
    port: env.PORT,
    targetsPath: env.CLASSIFY_TARGETS_PATH || undefined,
    familiesPath: env.CLASSIFY_FAMILIES_PATH || undefined,
    sep: env.CLASSIFY_SEP,
    encoding: env.CLASSIFY_ENCODING,
    logLevel: env.LOG_LEVEL
  }, 'server');

  return { classifier, server };
}
