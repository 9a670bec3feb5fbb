import dotenv from "dotenv";
import { getEnvBoolean, getEnvList, getEnvNumber } from "./utils/env.js";
dotenv.config();

export const NODE_ENV = process.env.NODE_ENV ?? "development";
export const IS_PROD = NODE_ENV === "production";
export const PORT = getEnvNumber("PORT", 5000, { integer: true, min: 0, max: 65535 });
export const HOST = process.env.HOST || (IS_PROD ? "0.0.0.0" : "127.0.0.1");

export const SESSION_SECRET = process.env.SESSION_SECRET || "dev-secret";
export const SESSION_COOKIE = "samsess";
// Optional: sessions fall back to the in-process store when unset
export const REDIS_URL = process.env.REDIS_URL || "";
// Optional: records fall back to the in-process store when unset
export const DATABASE_URL = process.env.DATABASE_URL || "";
export const MIGRATE_ON_START = getEnvBoolean("MIGRATE_ON_START", true);

export const PUBLIC_ORIGIN = getEnvList("PUBLIC_ORIGIN", ["http://localhost:5173", "http://localhost:5000"]);

export const DEFAULT_ADMIN_USERNAME = process.env.DEFAULT_ADMIN_USERNAME || "admin";
export const DEFAULT_ADMIN_EMAIL = process.env.DEFAULT_ADMIN_EMAIL || "admin@samurai.local";
// Empty in production unless set explicitly; seeding is skipped then
export const DEFAULT_ADMIN_PASSWORD =
  process.env.DEFAULT_ADMIN_PASSWORD || (IS_PROD ? "" : "change-me-please");

export interface ReportingConfig {
  expiringWithinDays: number;
  underutilizedBelow: number;
}

export function loadReportingConfig(): ReportingConfig {
  return {
    expiringWithinDays: getEnvNumber("EXPIRING_THRESHOLD_DAYS", 30, { integer: true, min: 0 }),
    underutilizedBelow: getEnvNumber("UNDERUTILIZED_THRESHOLD", 0.3, { min: 0, max: 1 }),
  };
}

export interface InsightConfig {
  enabled: boolean;
  apiKey: string;
  model: string;
  timeoutMs: number;
  cacheTtlMs: number;
}

export function loadInsightConfig(): InsightConfig {
  return {
    enabled: getEnvBoolean("INSIGHTS_ENABLED", true),
    apiKey: process.env.GEMINI_API_KEY || "",
    model: process.env.INSIGHTS_MODEL || "gemini-2.5-flash",
    timeoutMs: getEnvNumber("INSIGHTS_TIMEOUT_MS", 15_000, { integer: true, min: 1 }),
    cacheTtlMs: getEnvNumber("INSIGHTS_CACHE_TTL_MS", 5 * 60_000, { integer: true, min: 0 }),
  };
}
