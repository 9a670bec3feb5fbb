// server/src/services/insightAdvisor.ts
// Gemini-backed advisor answering license questions from report data

import { GoogleGenAI } from "@google/genai";
import { ExternalServiceError } from "@samurai/shared/errors.js";
import type { UsageReport } from "./reporting.js";

/**
 * System prompt for license recommendations
 */
const SYSTEM_PROMPT = `You are a software asset management advisor.

You receive an inventory report (JSON) describing licensed software, seat utilization,
annualised costs, upcoming renewals and seat violations, followed by a question.

**Guidelines:**
- Answer in at most 150 words, plain text, no markdown tables
- Base every statement on the report; cite asset names and figures
- Prefer concrete actions: reduce seats, renegotiate, renew, retire, investigate violations
- If the report does not contain what the question needs, say so`;

export interface InsightPayload {
  question: string;
  report: UsageReport;
}

export interface InsightAdvisor {
  readonly model: string;
  recommend(payload: InsightPayload, signal: AbortSignal): Promise<string>;
}

/** Trim the report to what the model needs; per-asset detail is kept, raw lists are capped. */
export function summarizeForPrompt(report: UsageReport): string {
  const names = (items: Array<{ name: string }>) => items.map((i) => i.name);
  return JSON.stringify({
    window: report.window,
    asOf: report.asOf,
    totals: report.totals,
    assets: report.assets.map((a) => ({
      name: a.name,
      vendor: a.vendor,
      licenseType: a.licenseType,
      seats: a.seatCount,
      used: a.used,
      utilization: a.utilization,
      annualCost: a.annualCost,
      renewalDate: a.renewalDate,
    })),
    expiring: names(report.expiring),
    expired: names(report.expired),
    underutilized: names(report.underutilized),
    seatViolations: report.seatViolations.slice(0, 20).map((v) => ({
      asset: v.assetName,
      quantity: v.quantity,
      seats: v.seatCount,
    })),
  });
}

export class GeminiInsightAdvisor implements InsightAdvisor {
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, readonly model: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async recommend(payload: InsightPayload, signal: AbortSignal): Promise<string> {
    let text: string | undefined;
    try {
      const resp = await this.ai.models.generateContent({
        model: this.model,
        contents: [
          {
            role: "user",
            parts: [
              { text: `**Inventory report:**\n${summarizeForPrompt(payload.report)}` },
              { text: `**Question:**\n${payload.question}` },
            ],
          },
        ],
        config: {
          systemInstruction: SYSTEM_PROMPT,
          temperature: 0.3,
          maxOutputTokens: 1024,
          abortSignal: signal,
        },
      });
      text = resp.text;
    } catch (error) {
      throw new ExternalServiceError(
        "gemini",
        `request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const answer = text?.trim();
    if (!answer) {
      throw new ExternalServiceError("gemini", "empty reply");
    }
    return answer;
  }
}
