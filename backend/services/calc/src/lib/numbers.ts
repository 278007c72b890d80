// backend/services/calc/src/lib/numbers.ts
/**
 * Integer-list coercion + aggregates (sum, mean).
 *
 * Coercion rules per element, in order:
 *   1) integer (number or bigint)  → as-is
 *   2) float with zero fraction    → integer; any other float fails
 *   3) "[+-]digits" string         → integer; any other string fails
 *   4) anything else               → fails
 * Values are bigint and must fit a signed 64-bit integer. A JSON number past
 * ±(2^53 − 1) already lost digits when parsed, so it fails; the same value as
 * a digit string is accepted.
 *
 * Invariants:
 * - Input is never mutated; output is a new array.
 * - Non-array input → InputTypeError; element or emptiness failures →
 *   InputValueError. No arithmetic runs on an un-coerced value.
 * - Sums are exact (bigint), whatever the intermediate totals.
 */

import { z } from "zod";

export type NumericList = readonly bigint[];
export type Operation = "sum" | "mean";

export const COERCION_RULES = [
  "not_a_list",
  "empty_list",
  "fractional",
  "not_finite",
  "unsafe_integer",
  "out_of_range",
  "not_digits",
  "unsupported_type",
] as const;
export type CoercionRule = (typeof COERCION_RULES)[number];

export type CoercionIssue = {
  /** Zero-based element index; absent for list-level failures. */
  index?: number;
  rule: CoercionRule;
  message: string;
};

export class CoercionError extends Error {
  public readonly issues: readonly CoercionIssue[];

  constructor(message: string, issues: readonly CoercionIssue[]) {
    super(message);
    this.name = "CoercionError";
    this.issues = issues;
  }
}

/** The input is not a list at all. */
export class InputTypeError extends CoercionError {
  constructor(message: string, issues: readonly CoercionIssue[]) {
    super(message, issues);
    this.name = "InputTypeError";
  }
}

/** The list is empty where that is not allowed, or an element is not an integer. */
export class InputValueError extends CoercionError {
  constructor(message: string, issues: readonly CoercionIssue[]) {
    super(message, issues);
    this.name = "InputValueError";
  }
}

// ─────────────────────────────── Element rules ───────────────────────────────

const DIGITS_RE = /^[+-]?\d+$/;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

type ElementOutcome =
  | { ok: true; value: bigint }
  | { ok: false; rule: CoercionRule; reason: string };

function kindOf(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

function show(v: unknown): string {
  if (typeof v === "string") return JSON.stringify(v);
  if (typeof v === "number" || typeof v === "bigint") return String(v);
  return kindOf(v);
}

function inInt64(value: bigint): ElementOutcome {
  if (value < INT64_MIN || value > INT64_MAX) {
    return {
      ok: false,
      rule: "out_of_range",
      reason: "is outside the signed 64-bit integer range",
    };
  }
  return { ok: true, value };
}

function coerceElement(item: unknown): ElementOutcome {
  if (typeof item === "bigint") return inInt64(item);

  if (typeof item === "number") {
    if (!Number.isFinite(item)) {
      return { ok: false, rule: "not_finite", reason: "is not a finite number" };
    }
    if (!Number.isInteger(item)) {
      return {
        ok: false,
        rule: "fractional",
        reason: "has a fractional part and cannot become an integer without loss",
      };
    }
    if (!Number.isSafeInteger(item)) {
      return {
        ok: false,
        rule: "unsafe_integer",
        reason: "is too large to be exact as a JSON number; send it as a digit string",
      };
    }
    return { ok: true, value: BigInt(item) };
  }

  if (typeof item === "string") {
    if (!DIGITS_RE.test(item)) {
      return {
        ok: false,
        rule: "not_digits",
        reason: "is not an optionally signed string of digits",
      };
    }
    return inInt64(BigInt(item));
  }

  return {
    ok: false,
    rule: "unsupported_type",
    reason: `has unsupported type ${kindOf(item)}`,
  };
}

// ─────────────────────────────── Schemas ─────────────────────────────────────

/** One int-like element → integer, or a custom issue tagged with its rule. */
const zIntegerLike = z.unknown().transform((item, ctx) => {
  const out = coerceElement(item);
  if (out.ok) return out.value;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `(${show(item)}) ${out.reason}`,
    params: { rule: out.rule },
  });
  return z.NEVER;
});

export const zNumericList = z.array(zIntegerLike, {
  errorMap: (issue, ctx) =>
    issue.code === z.ZodIssueCode.invalid_type
      ? { message: `must be a list, received ${issue.received}` }
      : { message: ctx.defaultError },
});

function isCoercionRule(v: unknown): v is CoercionRule {
  return COERCION_RULES.some((r) => r === v);
}

function toCoercionIssue(issue: z.ZodIssue, field: string): CoercionIssue {
  const [head] = issue.path;
  if (typeof head !== "number") {
    return { rule: "not_a_list", message: `${field} ${issue.message}` };
  }
  const tagged: unknown =
    issue.code === z.ZodIssueCode.custom ? issue.params?.rule : undefined;
  const rule = isCoercionRule(tagged) ? tagged : "unsupported_type";
  return {
    index: head,
    rule,
    message: `element at position ${head + 1} of ${field} ${issue.message}`,
  };
}

// ─────────────────────────────── Coercion API ────────────────────────────────

export type CoerceOptions = {
  /** Default true; sum passes false. */
  allowEmpty?: boolean;
  /** Prefixes messages with the operation name. */
  operation?: Operation;
  /** Field name used in messages (default "numeros"). */
  field?: string;
};

export type CoercionResult =
  | { ok: true; value: NumericList }
  | { ok: false; error: CoercionError };

function messagePrefix(operation: Operation | undefined): string {
  return operation ? `Invalid input for ${operation}: ` : "";
}

/** Non-throwing form: a validated list or an explicit error value. */
export function safeCoerceToIntegers(
  raw: unknown,
  opts: CoerceOptions = {}
): CoercionResult {
  const field = opts.field ?? "numeros";
  const prefix = messagePrefix(opts.operation);

  const parsed = zNumericList.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => toCoercionIssue(i, field));
    const [first] = issues;
    const message = prefix + (first?.message ?? `${field} is invalid`);
    const error =
      first === undefined || first.index === undefined
        ? new InputTypeError(message, issues)
        : new InputValueError(message, issues);
    return { ok: false, error };
  }

  if (parsed.data.length === 0 && opts.allowEmpty === false) {
    const message = `${field} must not be empty`;
    return {
      ok: false,
      error: new InputValueError(prefix + message, [
        { rule: "empty_list", message },
      ]),
    };
  }

  return { ok: true, value: parsed.data };
}

export function coerceToIntegers(
  raw: unknown,
  opts: CoerceOptions = {}
): NumericList {
  const result = safeCoerceToIntegers(raw, opts);
  if (!result.ok) throw result.error;
  return result.value;
}

// ─────────────────────────────── Aggregates ──────────────────────────────────

/** Exact sum of an already coerced list. */
export function sumIntegers(list: NumericList): bigint {
  let total = 0n;
  for (const n of list) total += n;
  return total;
}

/** Mean of an already coerced list; null when empty. */
export function meanOfIntegers(list: NumericList): number | null {
  if (list.length === 0) return null;
  return Number(sumIntegers(list)) / list.length;
}

/** Exact integer sum of a non-empty list. */
export function sumNumbers(raw: unknown): bigint {
  return sumIntegers(
    coerceToIntegers(raw, { allowEmpty: false, operation: "sum" })
  );
}

/** Arithmetic mean; null for an empty list. */
export function calculateAverage(raw: unknown): number | null {
  return meanOfIntegers(
    coerceToIntegers(raw, { allowEmpty: true, operation: "mean" })
  );
}
