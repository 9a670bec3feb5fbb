// server/src/routes/usage.ts

import { Router, type Request, type Response } from "express";
import { actorOf } from "../middleware/auth.js";
import type { UsageService } from "../services/usage.js";
import { asyncRoute } from "../utils/asyncRoute.js";

export function usageRouter(usage: UsageService) {
  const r = Router();

  r.get(
    "/usage",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ usage: await usage.list(actorOf(req), req.query) });
    })
  );

  r.get(
    "/usage/:id",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ usage: await usage.get(actorOf(req), req.params.id) });
    })
  );

  r.post(
    "/usage",
    asyncRoute(async (req: Request, res: Response) => {
      const { record, warnings } = await usage.record(actorOf(req), req.body);
      res.status(201).json({ usage: record, warnings });
    })
  );

  r.delete(
    "/usage/:id",
    asyncRoute(async (req: Request, res: Response) => {
      await usage.remove(actorOf(req), req.params.id);
      res.status(204).end();
    })
  );

  return r;
}
