// server/src/app.ts
// Express application wiring; index.ts supplies the services and session store

import express, { type Express } from "express";
import session, { type SessionOptions, type Store } from "express-session";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import cookieParser from "cookie-parser";

import { IS_PROD, PUBLIC_ORIGIN, SESSION_COOKIE, SESSION_SECRET } from "./config.js";
import { requireAuth } from "./middleware/auth.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { assetsRouter } from "./routes/assets.js";
import { authRouter } from "./routes/auth.js";
import { healthRouter, type ReadinessProbe } from "./routes/health.js";
import { reportsRouter } from "./routes/reports.js";
import { usageRouter } from "./routes/usage.js";
import { usersRouter } from "./routes/users.js";
import type { AssetService } from "./services/assets.js";
import type { InsightService } from "./services/insights.js";
import type { ReportingService } from "./services/reporting.js";
import type { UsageService } from "./services/usage.js";
import type { UserService } from "./services/users.js";

export interface AppServices {
  assets: AssetService;
  usage: UsageService;
  users: UserService;
  reporting: ReportingService;
  insights: InsightService;
}

export type StoreKind = "postgres" | "memory";

export interface AppOptions {
  services: AppServices;
  storeKind: StoreKind;
  readiness?: ReadinessProbe;
  // express-session falls back to its MemoryStore when undefined
  sessionStore?: Store;
  logRequests?: boolean;
}

export function createApp({ services, storeKind, readiness, sessionStore, logRequests = true }: AppOptions): Express {
  const app = express();
  app.set("trust proxy", 1);

  app.use(
    cors({
      origin: PUBLIC_ORIGIN,
      credentials: true,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Requested-With"],
    })
  );
  app.use(helmet());
  if (logRequests) {
    app.use(morgan(IS_PROD ? "combined" : "dev"));
  }
  app.use(cookieParser());
  app.use(express.json({ limit: "1mb" }));

  const sessionOptions: SessionOptions = {
    name: SESSION_COOKIE,
    secret: SESSION_SECRET,
    resave: false,
    saveUninitialized: false,
    store: sessionStore,
    cookie: {
      httpOnly: true,
      sameSite: "lax",
      secure: IS_PROD,
      maxAge: 1000 * 60 * 60 * 24 * 7, // 7 days
    },
  };
  app.use(session(sessionOptions));

  app.use(healthRouter(storeKind, readiness));
  app.use("/api", authRouter(services.users));

  // Everything below needs a session
  app.use("/api", requireAuth(services.users));
  app.use("/api", assetsRouter(services.assets));
  app.use("/api", usageRouter(services.usage));
  app.use("/api", usersRouter(services.users));
  app.use("/api", reportsRouter(services.reporting, services.insights));

  app.use("/api", notFoundHandler);
  app.use(errorHandler);
  return app;
}
