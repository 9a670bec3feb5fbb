// server/src/services/insights.ts
// AI recommendations over the current report. Never fails the caller:
// advisor problems come back as an unavailable Recommendation.

import { createHash } from "node:crypto";
import type { Actor } from "@samurai/shared/auth/types.js";
import { ExternalServiceError } from "@samurai/shared/errors.js";
import { insightRequestSchema, parseInput } from "@samurai/shared/schemas.js";
import type { Recommendation } from "@samurai/shared/types.js";
import type { InsightConfig } from "../config.js";
import { authorize } from "./access.js";
import type { InsightAdvisor } from "./insightAdvisor.js";
import type { ReportingService } from "./reporting.js";

export type InsightServiceOptions = Pick<InsightConfig, "enabled" | "timeoutMs" | "cacheTtlMs">;

// Oldest answers are dropped beyond this many
export const MAX_CACHED_ANSWERS = 200;

interface CacheEntry {
  text: string;
  model: string;
  generatedAt: string;
  expiresAt: number;
}

function unavailable(reason: string): Recommendation {
  return { available: false, text: null, reason };
}

export class InsightService {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly reporting: ReportingService,
    private readonly advisor: InsightAdvisor | null,
    private readonly options: InsightServiceOptions,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get cacheSize(): number {
    return this.cache.size;
  }

  async recommend(actor: Actor, input: unknown): Promise<Recommendation> {
    authorize(actor, "insight:request");
    const request = parseInput(insightRequestSchema, input);

    if (!this.options.enabled) {
      return unavailable("Insights are disabled");
    }
    const advisor = this.advisor;
    if (!advisor) {
      return unavailable("Insight advisor is not configured");
    }

    const report = await this.reporting.summary(actor, { from: request.from, to: request.to });
    const key = createHash("sha256")
      .update(request.message)
      .update("\0")
      .update(JSON.stringify(report))
      .digest("hex");

    const now = this.clock().getTime();
    const hit = this.cache.get(key);
    if (hit && hit.expiresAt > now) {
      return { available: true, text: hit.text, model: hit.model, generatedAt: hit.generatedAt, cached: true };
    }
    this.cache.delete(key);

    try {
      const text = await this.withTimeout((signal) =>
        advisor.recommend({ question: request.message, report }, signal)
      );
      const generatedAt = this.clock().toISOString();
      if (this.options.cacheTtlMs > 0) {
        this.remember(key, { text, model: advisor.model, generatedAt, expiresAt: now + this.options.cacheTtlMs }, now);
      }
      console.log(`[insights] answered for ${actor.username} with ${advisor.model}`);
      return { available: true, text, model: advisor.model, generatedAt, cached: false };
    } catch (error) {
      const failure =
        error instanceof ExternalServiceError
          ? error
          : new ExternalServiceError("insights", error instanceof Error ? error.message : String(error), {
              cause: error,
            });
      console.warn(`[insights] degraded for ${actor.username}: ${failure.message}`);
      return unavailable(failure.message);
    }
  }

  private remember(key: string, entry: CacheEntry, now: number): void {
    for (const [cachedKey, cached] of this.cache) {
      if (cached.expiresAt <= now) {
        this.cache.delete(cachedKey);
      }
    }
    this.cache.set(key, entry);
    // Map iteration follows insertion order, so the first key is the oldest
    for (const oldest of this.cache.keys()) {
      if (this.cache.size <= MAX_CACHED_ANSWERS) break;
      this.cache.delete(oldest);
    }
  }

  /**
   * Abort the advisor call after `timeoutMs`. Rejects on time even if the
   * advisor ignores the signal.
   */
  private async withTimeout<T>(call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExternalServiceError("insights", `advisor timed out after ${this.options.timeoutMs}ms`));
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
