// server/src/routes/assets.ts

import { Router, type Request, type Response } from "express";
import { expireLapsedSchema, parseInput, versionQuerySchema } from "@samurai/shared/schemas.js";
import { actorOf } from "../middleware/auth.js";
import type { AssetService } from "../services/assets.js";
import { asyncRoute } from "../utils/asyncRoute.js";

export function assetsRouter(assets: AssetService) {
  const r = Router();

  r.get(
    "/assets",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ assets: await assets.list(actorOf(req), req.query) });
    })
  );

  r.post(
    "/assets/expire-lapsed",
    asyncRoute(async (req: Request, res: Response) => {
      const { asOf } = parseInput(expireLapsedSchema, req.body ?? {});
      res.json({ expired: await assets.expireLapsed(actorOf(req), asOf) });
    })
  );

  r.get(
    "/assets/:id",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ asset: await assets.get(actorOf(req), req.params.id) });
    })
  );

  r.post(
    "/assets",
    asyncRoute(async (req: Request, res: Response) => {
      res.status(201).json({ asset: await assets.create(actorOf(req), req.body) });
    })
  );

  r.put(
    "/assets/:id",
    asyncRoute(async (req: Request, res: Response) => {
      res.json({ asset: await assets.update(actorOf(req), req.params.id, req.body) });
    })
  );

  // Logical delete; ?version= guards against retiring a record someone just changed
  r.delete(
    "/assets/:id",
    asyncRoute(async (req: Request, res: Response) => {
      const { version } = parseInput(versionQuerySchema, req.query);
      res.json({ asset: await assets.retire(actorOf(req), req.params.id, version) });
    })
  );

  return r;
}
