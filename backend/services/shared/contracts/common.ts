// backend/services/shared/contracts/common.ts
import type { Response } from "express";
import { z } from "zod";

/** One entry of a Problem's `errors` list. */
export const zProblemIssue = z.object({
  path: z.string(),
  code: z.string(),
  message: z.string(),
});
export type ProblemIssue = z.infer<typeof zProblemIssue>;

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z.array(zProblemIssue).optional(),
});
export type Problem = z.infer<typeof zProblem>;

/** Map zod issues to the flat wire form used in `errors`. */
export function toProblemIssues(error: z.ZodError): ProblemIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}

/** Strip undefined (stable wire format) */
export function clean(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}

const BIGINT_TAG = "@@bigint:";
const BIGINT_TAG_RE = /"@@bigint:(-?\d+)"/g;

/** JSON text where bigint values become exact integer literals. */
export function toJsonText(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? `${BIGINT_TAG}${v}` : v
  ).replace(BIGINT_TAG_RE, "$1");
}

/** Output guard: validate payload before sending */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: z.input<T>,
  status = 200
) {
  return res
    .status(status)
    .type("application/json")
    .send(toJsonText(schema.parse(payload)));
}
