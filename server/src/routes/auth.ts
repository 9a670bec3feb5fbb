// server/src/routes/auth.ts
// Login, logout and the current session user

import { Router, type Request, type Response } from "express";
import { AuthenticationError } from "@samurai/shared/errors.js";
import { SESSION_COOKIE } from "../config.js";
import { actorOf, requireAuth } from "../middleware/auth.js";
import type { UserService } from "../services/users.js";
import { asyncRoute } from "../utils/asyncRoute.js";
import "../types/express.js";

function regenerate(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}

function destroy(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((err: unknown) => (err ? reject(err) : resolve()));
  });
}

export function authRouter(users: UserService) {
  const r = Router();

  r.post(
    "/auth/login",
    asyncRoute(async (req: Request, res: Response) => {
      const user = await users.authenticate(req.body);
      if (!user) {
        console.warn("[auth] failed login attempt");
        throw new AuthenticationError("Invalid credentials");
      }

      // New session id on login
      await regenerate(req);
      req.session.user = { id: user.id, username: user.username, role: user.role };
      console.log(`[auth] ${user.username} logged in`);
      res.json({ user });
    })
  );

  r.post(
    "/auth/logout",
    asyncRoute(async (req: Request, res: Response) => {
      const username = req.session.user?.username;
      await destroy(req);
      res.clearCookie(SESSION_COOKIE);
      if (username) console.log(`[auth] ${username} logged out`);
      res.json({ ok: true });
    })
  );

  r.get(
    "/auth/me",
    requireAuth(users),
    asyncRoute(async (req: Request, res: Response) => {
      const actor = actorOf(req);
      res.json({ user: await users.get(actor, actor.id) });
    })
  );

  return r;
}
