// server/src/middleware/auth.ts
// Session authentication: turns the session user into req.actor

import type { Request, RequestHandler } from "express";
import type { Actor } from "@samurai/shared/auth/types.js";
import { AuthenticationError } from "@samurai/shared/errors.js";
import type { UserService } from "../services/users.js";
import "../types/express.js";

/**
 * Reject requests without a session. The user is re-read on every request
 * so a deleted account or a role change takes effect immediately.
 */
export function requireAuth(users: UserService): RequestHandler {
  return (req, _res, next) => {
    const sessUser = req.session?.user;
    if (!sessUser) {
      next(new AuthenticationError());
      return;
    }

    users
      .resolveActor(sessUser.id)
      .then((actor) => {
        if (!actor) {
          console.warn(`[auth] session for missing user ${sessUser.id}`);
          next(new AuthenticationError("Session is no longer valid"));
          return;
        }
        req.actor = actor;
        next();
      })
      .catch(next);
  };
}

export function actorOf(req: Request): Actor {
  if (!req.actor) {
    throw new AuthenticationError();
  }
  return req.actor;
}
