// backend/services/calc/src/controllers/calc/handlers/problems.ts
import type { Response } from "express";
import type { z } from "zod";
import { toProblemIssues, type ProblemIssue } from "@shared/contracts/common";
import { badRequest, unprocessable } from "@shared/http/errors";
import { InputTypeError, type CoercionError } from "../../../lib/numbers";

export function invalidBody(res: Response, error: z.ZodError) {
  return badRequest(res, "Request body must be a JSON object", {
    errors: toProblemIssues(error),
  });
}

/** Not a list → 400; bad elements or an empty sum list → 422. */
export function coercionProblem(res: Response, err: CoercionError) {
  const errors: ProblemIssue[] = err.issues.map((i) => ({
    path: i.index === undefined ? "numeros" : `numeros.${i.index}`,
    code: i.rule,
    message: i.message,
  }));
  if (err instanceof InputTypeError) {
    return badRequest(res, err.message, { code: "INPUT_TYPE_ERROR", errors });
  }
  return unprocessable(res, err.message, { code: "INPUT_VALUE_ERROR", errors });
}
