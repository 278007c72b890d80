// backend/services/shared/security/accessToken.ts
/**
 * Bearer access tokens (HMAC JWT): issue + verify.
 *
 * Behavior:
 * - issue: fixed identity → signed JWT { sub, role, iat, exp }.
 * - verify: header → Authenticated state, or AuthError with a specific reason.
 *   The reason is for server-side logs only; clients get one generic 401.
 *
 * Invariants:
 * - No process.env access; secret/algorithm/clock are passed in.
 * - Signature is checked before any time-based claim, so a forged expired
 *   token reports InvalidSignature, never Expired.
 */

import jwt, { type Algorithm, type JwtPayload } from "jsonwebtoken";
import { z } from "zod";

export const ROLES = ["administrator", "tester"] as const;
export type Role = (typeof ROLES)[number];

/** Static identities the issuance endpoints mint for. */
export const IDENTITIES = {
  admin: "administrator",
  tester: "tester",
} as const satisfies Record<string, Role>;
export type Identity = keyof typeof IDENTITIES;

export const TOKEN_ALGORITHMS = [
  "HS256",
  "HS384",
  "HS512",
] as const satisfies readonly Algorithm[];
export type TokenAlgorithm = (typeof TOKEN_ALGORITHMS)[number];

export type AuthState =
  | { state: "unauthenticated" }
  | {
      state: "authenticated";
      subject: string;
      role: Role;
      expiresAt: Date;
    };
export type Authenticated = Extract<AuthState, { state: "authenticated" }>;

export type AuthFailure =
  | "MissingCredential"
  | "InvalidSignature"
  | "Expired"
  | "MalformedClaims";

export class AuthError extends Error {
  public readonly reason: AuthFailure;

  constructor(reason: AuthFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthError";
    this.reason = reason;
  }
}

type Clock = () => number;

export type TokenKeyOptions = {
  secret: string;
  algorithm: TokenAlgorithm;
  /** Epoch millis; defaults to Date.now. */
  now?: Clock;
};

export type TokenIssueOptions = TokenKeyOptions & {
  ttlSec: number;
};

export type IssuedToken = {
  accessToken: string;
  tokenType: "bearer";
  subject: Identity;
  role: Role;
  expiresAt: Date;
};

const zAccessClaims = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  exp: z.number().int(),
  iat: z.number().int().optional(),
});

const INVALID_TIME_CLAIM_RE = /^invalid (exp|nbf) value/;

function epochSeconds(now: Clock | undefined): number {
  return Math.floor((now ?? Date.now)() / 1000);
}

export function issueAccessToken(
  identity: Identity,
  opts: TokenIssueOptions
): IssuedToken {
  if (!opts.secret) throw new Error("issueAccessToken: secret is required");
  if (!Number.isInteger(opts.ttlSec) || opts.ttlSec <= 0) {
    throw new Error("issueAccessToken: ttlSec must be a positive integer");
  }

  const iat = epochSeconds(opts.now);
  const exp = iat + opts.ttlSec;
  const role = IDENTITIES[identity];

  const accessToken = jwt.sign({ role, iat, exp }, opts.secret, {
    algorithm: opts.algorithm,
    subject: identity,
  });

  return {
    accessToken,
    tokenType: "bearer",
    subject: identity,
    role,
    expiresAt: new Date(exp * 1000),
  };
}

/** Pull the token out of `Authorization: Bearer <token>` (scheme is case-insensitive). */
export function extractBearer(header: string | undefined): string {
  const m = /^bearer\s+(.*)$/i.exec((header ?? "").trim());
  const token = m?.[1]?.trim();
  if (!token) {
    throw new AuthError(
      "MissingCredential",
      "Missing or malformed Authorization header"
    );
  }
  return token;
}

export function verifyAccessToken(
  authorizationHeader: string | undefined,
  opts: TokenKeyOptions
): Authenticated {
  const token = extractBearer(authorizationHeader);

  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, opts.secret, {
      algorithms: [opts.algorithm],
      clockTimestamp: epochSeconds(opts.now),
    });
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      throw new AuthError("Expired", "Token expired", { cause: err });
    }
    if (err instanceof jwt.NotBeforeError) {
      throw new AuthError("Expired", "Token not active yet", { cause: err });
    }
    // Signature held, but exp/nbf is not numeric.
    if (
      err instanceof jwt.JsonWebTokenError &&
      INVALID_TIME_CLAIM_RE.test(err.message)
    ) {
      throw new AuthError("MalformedClaims", "Token claims are invalid", {
        cause: err,
      });
    }
    throw new AuthError("InvalidSignature", "Token verification failed", {
      cause: err,
    });
  }

  const claims = zAccessClaims.safeParse(decoded);
  if (!claims.success) {
    throw new AuthError("MalformedClaims", "Token claims are invalid", {
      cause: claims.error,
    });
  }

  return {
    state: "authenticated",
    subject: claims.data.sub,
    role: claims.data.role,
    expiresAt: new Date(claims.data.exp * 1000),
  };
}
