// backend/services/calc/src/routes/tokenRoutes.ts
import { Router } from "express";
import type { TokenIssueOptions } from "@shared/security/accessToken";
import { issueToken } from "../controllers/token/handlers/issue";

export function tokenRoutes(opts: TokenIssueOptions): Router {
  const router = Router();
  router.post("/token_admin", issueToken("admin", opts));
  router.post("/token_tester", issueToken("tester", opts));
  return router;
}
