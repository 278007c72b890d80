// backend/services/shared/types/express.d.ts

import type { AuthState } from "../security/accessToken";

/**
 * Global Express request augmentation used by all services.
 * - auth: set by the auth gate on protected routes
 * (`req.id` / `req.log` come from pino-http's own augmentation.)
 */
declare global {
  namespace Express {
    interface Request {
      auth?: AuthState;
    }
  }
}

export {};
