// server/src/routes/reports.ts

import { Router, type Request, type Response } from "express";
import { actorOf } from "../middleware/auth.js";
import type { InsightService } from "../services/insights.js";
import type { ReportingService } from "../services/reporting.js";
import { asyncRoute } from "../utils/asyncRoute.js";

export function reportsRouter(reporting: ReportingService, insights: InsightService) {
  const r = Router();

  r.get(
    "/reports/summary",
    asyncRoute(async (req: Request, res: Response) => {
      res.json(await reporting.summary(actorOf(req), req.query));
    })
  );

  // Always 200: an advisor outage comes back as { available: false }
  r.post(
    "/insights",
    asyncRoute(async (req: Request, res: Response) => {
      res.json(await insights.recommend(actorOf(req), req.body));
    })
  );

  return r;
}
