// server/src/index.ts
import RedisStore from "connect-redis";
import { createClient as createRedisClient } from "redis";

import { createApp } from "./app.js";
import {
  DATABASE_URL,
  DEFAULT_ADMIN_EMAIL,
  DEFAULT_ADMIN_PASSWORD,
  DEFAULT_ADMIN_USERNAME,
  HOST,
  MIGRATE_ON_START,
  NODE_ENV,
  PORT,
  REDIS_URL,
  loadInsightConfig,
  loadReportingConfig,
} from "./config.js";
import { createDatabase, createPool, type Database } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { AssetService } from "./services/assets.js";
import { GeminiInsightAdvisor } from "./services/insightAdvisor.js";
import { InsightService } from "./services/insights.js";
import { ReportingService } from "./services/reporting.js";
import { UsageService } from "./services/usage.js";
import { UserService } from "./services/users.js";
import { MemoryRecordStore } from "./store/memoryStore.js";
import { PgRecordStore } from "./store/pgStore.js";
import type { RecordStore } from "./store/types.js";

async function main() {
  // ---------------- Records ----------------
  let db: Database | null = null;
  let store: RecordStore;
  if (DATABASE_URL) {
    db = createDatabase(createPool(DATABASE_URL));
    if (MIGRATE_ON_START) {
      await runMigrations(db);
    }
    store = new PgRecordStore(db);
  } else {
    console.warn("[db] DATABASE_URL not set; records are kept in memory and lost on restart.");
    store = new MemoryRecordStore();
  }

  // ---------------- Redis ----------------
  const redisClient = REDIS_URL ? createRedisClient({ url: REDIS_URL }) : null;
  if (redisClient) {
    redisClient.on("error", (err) => console.error("[redis] error", err));
    await redisClient.connect();
  } else {
    console.warn("[redis] REDIS_URL not set; sessions use the in-process store.");
  }
  const sessionStore = redisClient ? new RedisStore({ client: redisClient, prefix: "samsess:" }) : undefined;

  // ---------------- Services ----------------
  const insightConfig = loadInsightConfig();
  if (insightConfig.enabled && !insightConfig.apiKey) {
    console.warn("[insights] GEMINI_API_KEY not configured; recommendations will be unavailable.");
  }
  const advisor = insightConfig.apiKey
    ? new GeminiInsightAdvisor(insightConfig.apiKey, insightConfig.model)
    : null;

  const users = new UserService(store);
  const reporting = new ReportingService(store, loadReportingConfig());
  const services = {
    assets: new AssetService(store),
    usage: new UsageService(store),
    users,
    reporting,
    insights: new InsightService(reporting, advisor, insightConfig),
  };

  if (DEFAULT_ADMIN_PASSWORD) {
    await users.ensureDefaultAdmin({
      username: DEFAULT_ADMIN_USERNAME,
      email: DEFAULT_ADMIN_EMAIL,
      password: DEFAULT_ADMIN_PASSWORD,
    });
  } else {
    console.warn("[seed] DEFAULT_ADMIN_PASSWORD not set; skipping default admin.");
  }

  // ---------------- Express ----------------
  const database = db;
  const app = createApp({
    services,
    storeKind: database ? "postgres" : "memory",
    readiness: database ? () => database.query("SELECT 1").then(() => undefined) : undefined,
    sessionStore,
  });
  const server = app.listen(PORT, HOST, () => {
    console.log(`[server] listening on ${HOST}:${PORT} (NODE_ENV=${NODE_ENV}, PORT=${PORT})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server.close(() => {
      Promise.all([redisClient?.quit(), db?.close()])
        .catch((err) => console.error("[server] shutdown error", err))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((e) => {
  console.error("[server] fatal startup error:", e);
  process.exit(1);
});
