// backend/services/shared/http/errors.ts
import type { Response } from "express";
import { clean, type ProblemIssue } from "../contracts/common";

export const PROBLEM_JSON = "application/problem+json";

export type ProblemInit = {
  status: number;
  title: string;
  code: string;
  detail: string;
  errors?: ProblemIssue[];
};

/** Write an RFC 7807 body; `instance` is the request id when one was assigned. */
export function sendProblem(res: Response, p: ProblemInit) {
  const id = res.req.id;
  return res
    .status(p.status)
    .type(PROBLEM_JSON)
    .json(
      clean({
        type: "about:blank",
        title: p.title,
        status: p.status,
        code: p.code,
        detail: p.detail,
        instance: id === undefined ? undefined : String(id),
        errors: p.errors,
      })
    );
}

export const badRequest = (
  res: Response,
  detail: string,
  extra: { code?: string; errors?: ProblemIssue[] } = {}
) =>
  sendProblem(res, {
    status: 400,
    title: "Bad Request",
    code: extra.code ?? "BAD_REQUEST",
    detail,
    errors: extra.errors,
  });

export const unprocessable = (
  res: Response,
  detail: string,
  extra: { code?: string; errors?: ProblemIssue[] } = {}
) =>
  sendProblem(res, {
    status: 422,
    title: "Unprocessable Entity",
    code: extra.code ?? "UNPROCESSABLE_ENTITY",
    detail,
    errors: extra.errors,
  });

/** Generic on purpose: the failing check is never revealed to the caller. */
export const unauthorized = (res: Response) =>
  sendProblem(res.setHeader("WWW-Authenticate", "Bearer"), {
    status: 401,
    title: "Unauthorized",
    code: "UNAUTHORIZED",
    detail: "Invalid or missing credentials",
  });

export const notFound = (res: Response) =>
  sendProblem(res, {
    status: 404,
    title: "Not Found",
    code: "NOT_FOUND",
    detail: "Route not found",
  });

export const internalError = (res: Response) =>
  sendProblem(res, {
    status: 500,
    title: "Internal Server Error",
    code: "INTERNAL_ERROR",
    detail: "An unexpected error occurred.",
  });
