// server/src/routes/health.ts
import { Router } from "express";
import { NODE_ENV } from "../config.js";
import type { StoreKind } from "../app.js";

/** Resolves when the backing store answers; rejects otherwise. */
export type ReadinessProbe = () => Promise<void>;

export function healthRouter(storeKind: StoreKind, probe: ReadinessProbe = async () => undefined) {
  const r = Router();

  // Liveness: the process is up and serving
  r.get("/health", (_req, res) => {
    res.json({ ok: true, env: NODE_ENV, store: storeKind, time: new Date().toISOString() });
  });

  // Readiness: the store can take queries
  r.get("/health/ready", (_req, res) => {
    probe()
      .then(() => res.json({ ready: true, store: storeKind }))
      .catch((err: unknown) => {
        console.warn(`[health] ${storeKind} store not ready:`, err instanceof Error ? err.message : err);
        res.status(503).json({ ready: false, store: storeKind });
      });
  });

  return r;
}
