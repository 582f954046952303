import type { CategoryKey, LoadFailureKind } from "./types";

/** The page could not be loaded at all. Fatal for that site's audit. */
export class LoadError extends Error {
  readonly kind: LoadFailureKind;
  readonly statusCode: number | null;

  constructor(kind: LoadFailureKind, message: string, statusCode: number | null = null) {
    super(message);
    this.name = "LoadError";
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

/** One signal source failed; the audit continues with that sub-check scored 0. */
export class ExtractorError extends Error {
  readonly category: CategoryKey;
  readonly check: string;

  constructor(category: CategoryKey, check: string, message: string) {
    super(message);
    this.name = "ExtractorError";
    this.category = category;
    this.check = check;
  }
}

export class JudgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JudgeError";
  }
}

export class AggregationInvariantError extends Error {
  readonly missing: CategoryKey[];

  constructor(missing: CategoryKey[]) {
    super(`Aggregation requires all five categories; missing: ${missing.join(", ")}`);
    this.name = "AggregationInvariantError";
    this.missing = missing;
  }
}

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal audit state transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
