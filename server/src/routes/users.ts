// server/src/routes/users.ts
// Admin user management

import { Router, type Request, type Response } from "express";
import { actorOf } from "../middleware/auth.js";
import type { UserService } from "../services/users.js";
import { asyncRoute } from "../utils/asyncRoute.js";

export function usersRouter(users: UserService) {
  const r = Router();

  r.get(
    "/users",
    asyncRoute(async (req: Request, res: Response) => {
      res.json(await users.list(actorOf(req), req.query));
    })
  );

  r.get(
    "/users/:id",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ user: await users.get(actorOf(req), req.params.id) });
    })
  );

  r.post(
    "/users",
    asyncRoute(async (req: Request, res: Response) => {
      res.status(201).json({ user: await users.create(actorOf(req), req.body) });
    })
  );

  r.put(
    "/users/:id",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ user: await users.update(actorOf(req), req.params.id, req.body) });
    })
  );

  r.delete(
    "/users/:id",
    asyncRoute(async (req: Request, res: Response) => {
      await users.remove(actorOf(req), req.params.id);
      res.status(204).end();
    })
  );

  return r;
}
