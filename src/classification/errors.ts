// src/classification/errors.ts

export type ClassificationErrorCode =
  | "SCHEMA"
  | "DUPLICATE_KEY"
  | "UNRESOLVED"
  | "AMBIGUOUS_EC"
  | "INVALID_INPUT"
  | "CONFIG";

export class ClassificationError extends Error {
  readonly code: ClassificationErrorCode;

  constructor(code: ClassificationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A reference table is missing a required column, or a row has no key. Fatal. */
export class SchemaError extends ClassificationError {
  readonly table: string;
  readonly missing: string[];

  constructor(table: string, missing: string[], message?: string) {
    super("SCHEMA", message ?? `${table}: missing required columns: ${missing.join(", ")}`);
    this.table = table;
    this.missing = missing;
  }
}

/** A primary key repeats inside a reference table. Fatal. */
export class DuplicateKeyError extends ClassificationError {
  readonly table: string;
  readonly key: string;

  constructor(table: string, key: string) {
    super("DUPLICATE_KEY", `${table}: duplicate key "${key}"`);
    this.table = table;
    this.key = key;
  }
}

export class UnresolvedRecordError extends ClassificationError {
  constructor(message = "No identifier matched a known target, family or EC class") {
    super("UNRESOLVED", message);
  }
}

export class AmbiguousECMatchError extends ClassificationError {
  readonly prefixes: string[];
  readonly candidates: string[];

  constructor(prefixes: string[], candidates: string[]) {
    super(
      "AMBIGUOUS_EC",
      `EC prefix ${prefixes.join("|")} matches ${candidates.length} candidates: ${candidates.join(", ")}`
    );
    this.prefixes = prefixes;
    this.candidates = candidates;
  }
}

export class InvalidInputError extends ClassificationError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export class ConfigError extends ClassificationError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function errorCode(e: unknown): string {
  return e instanceof ClassificationError ? e.code : "INTERNAL";
}

/* =========================
 * Warnings (never thrown)
 * ========================= */

export type ChainTruncatedWarning = {
  kind: "ChainTruncatedWarning";
  familyId: string;
  reason: "cycle" | "depth";
  message: string;
};

export type MissingFamilyWarning = {
  kind: "MissingFamilyWarning";
  familyId: string;
  message: string;
};

export type SynonymCollisionWarning = {
  kind: "SynonymCollisionWarning";
  key: string;
  keptTargetId: string;
  droppedTargetId: string;
  message: string;
};

export type IndexCollisionWarning = {
  kind: "IndexCollisionWarning";
  index: string;
  key: string;
  keptTargetId: string;
  droppedTargetId: string;
  message: string;
};

export type AmbiguousSynonymWarning = {
  kind: "AmbiguousSynonymWarning";
  synonyms: string[];
  targetIds: string[];
  message: string;
};

export type AmbiguousNameWarning = {
  kind: "AmbiguousNameWarning";
  name: string;
  targetIds: string[];
  message: string;
};

export type ClassificationWarning =
  | ChainTruncatedWarning
  | MissingFamilyWarning
  | SynonymCollisionWarning
  | IndexCollisionWarning
  | AmbiguousSynonymWarning
  | AmbiguousNameWarning;
