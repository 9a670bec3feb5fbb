// server/src/types/express.ts
// Request and session fields added by the auth middleware

import type { Actor, SessionUser } from "@samurai/shared/auth/types.js";

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

declare module "express-session" {
  interface SessionData {
    user?: SessionUser;
  }
}

export {};
