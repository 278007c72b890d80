// backend/services/calc/src/controllers/token/handlers/issue.ts
import type { RequestHandler } from "express";
import { z } from "zod";
import { respond } from "@shared/contracts/common";
import {
  issueAccessToken,
  type Identity,
  type TokenIssueOptions,
} from "@shared/security/accessToken";

export const zTokenResponse = z
  .object({
    access_token: z.string().min(1),
    token_type: z.literal("bearer"),
  })
  .strict();

/** Mints a token for a fixed identity; no credentials are checked. */
export function issueToken(
  identity: Identity,
  opts: TokenIssueOptions
): RequestHandler {
  return (req, res) => {
    const token = issueAccessToken(identity, opts);
    req.log.info(
      {
        subject: token.subject,
        role: token.role,
        expiresAt: token.expiresAt.toISOString(),
      },
      "access token issued"
    );
    return respond(res, zTokenResponse, {
      access_token: token.accessToken,
      token_type: token.tokenType,
    });
  };
}
