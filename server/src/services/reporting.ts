// server/src/services/reporting.ts
// Utilization and cost analytics over assets and usage

import type { Actor } from "@samurai/shared/auth/types.js";
import { addDaysIso, daysBetween, monthWindow, todayIso } from "@samurai/shared/dates.js";
import { ValidationError } from "@samurai/shared/errors.js";
import { parseInput, reportQuerySchema } from "@samurai/shared/schemas.js";
import type {
  BillingPeriod,
  LicenseType,
  SoftwareAsset,
  UsageRecord,
  UsageSubjectType,
} from "@samurai/shared/types.js";
import type { ReportingConfig } from "../config.js";
import type { RecordStore } from "../store/types.js";
import { authorize } from "./access.js";

const PERIODS_PER_YEAR: Record<BillingPeriod, number> = {
  monthly: 12,
  quarterly: 4,
  annual: 1,
  one_time: 1,
};

const HIGH_USAGE = 0.8;
const MEDIUM_USAGE = 0.3;
const HIGH_COST = 100_000;
const MEDIUM_COST = 10_000;
const TOP_COUNT = 3;

export interface ReportWindow {
  from: string;
  to: string;
}

export interface ReportOptions {
  window: ReportWindow;
  asOf: string;
  expiringWithinDays: number;
  underutilizedBelow: number;
}

export interface AssetMetrics {
  assetId: string;
  name: string;
  vendor: string;
  licenseType: LicenseType;
  status: SoftwareAsset["status"];
  seatCount: number;
  used: number;
  utilization: number;
  costPerPeriod: number;
  billingPeriod: BillingPeriod;
  annualCost: number;
  // Annual cost of one seat; null for assets without seats
  costPerSeat: number | null;
  unusedSeats: number;
  renewalDate: string | null;
  daysUntilRenewal: number | null;
}

export interface SeatViolation {
  usageId: string;
  assetId: string;
  assetName: string;
  subjectType: UsageSubjectType;
  subjectId: string;
  quantity: number;
  seatCount: number;
}

export interface Bands {
  high: number;
  medium: number;
  low: number;
}

export interface UsageReport {
  window: ReportWindow;
  asOf: string;
  thresholds: { expiringWithinDays: number; underutilizedBelow: number };
  assets: AssetMetrics[];
  totals: {
    assetCount: number;
    seats: number;
    used: number;
    utilization: number;
    annualCost: number;
    costPerPeriod: number;
    potentialSavings: number;
    costByVendor: Record<string, number>;
  };
  expiring: AssetMetrics[];
  expired: AssetMetrics[];
  underutilized: AssetMetrics[];
  seatViolations: SeatViolation[];
  topUtilized: AssetMetrics[];
  distributions: {
    licenseTypes: Record<string, number>;
    vendors: Record<string, number>;
    usageBands: Bands;
    costBands: Bands;
  };
}

function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

function roundRatio(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function annualCost(asset: Pick<SoftwareAsset, "costPerPeriod" | "billingPeriod">): number {
  return asset.costPerPeriod * PERIODS_PER_YEAR[asset.billingPeriod];
}

function bandOf(value: number, high: number, medium: number): keyof Bands {
  if (value >= high) return "high";
  if (value >= medium) return "medium";
  return "low";
}

function sortedCounts(entries: Map<string, number>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const key of [...entries.keys()].sort()) {
    out[key] = entries.get(key) ?? 0;
  }
  return out;
}

function measure(asset: SoftwareAsset, used: number, asOf: string): AssetMetrics {
  const yearly = annualCost(asset);
  return {
    assetId: asset.id,
    name: asset.name,
    vendor: asset.vendor,
    licenseType: asset.licenseType,
    status: asset.status,
    seatCount: asset.seatCount,
    used,
    utilization: asset.seatCount > 0 ? roundRatio(used / asset.seatCount) : 0,
    costPerPeriod: roundMoney(asset.costPerPeriod),
    billingPeriod: asset.billingPeriod,
    annualCost: roundMoney(yearly),
    costPerSeat: asset.seatCount > 0 ? roundMoney(yearly / asset.seatCount) : null,
    unusedSeats: Math.max(0, asset.seatCount - used),
    renewalDate: asset.renewalDate,
    daysUntilRenewal: asset.renewalDate ? daysBetween(asOf, asset.renewalDate) : null,
  };
}

/**
 * Compute the report from already-filtered assets and the usage records
 * whose period overlaps the window. Pure: the same input always yields the
 * same report.
 */
export function buildReport(
  assets: SoftwareAsset[],
  usage: UsageRecord[],
  options: ReportOptions
): UsageReport {
  const { window, asOf, expiringWithinDays, underutilizedBelow } = options;
  const byId = new Map(assets.map((a) => [a.id, a]));

  const usedByAsset = new Map<string, number>();
  const seatViolations: SeatViolation[] = [];
  for (const record of usage) {
    const asset = byId.get(record.assetId);
    if (!asset || record.periodEnd < window.from || record.periodStart > window.to) {
      continue;
    }
    usedByAsset.set(asset.id, (usedByAsset.get(asset.id) ?? 0) + record.quantity);
    if (record.quantity > asset.seatCount) {
      seatViolations.push({
        usageId: record.id,
        assetId: asset.id,
        assetName: asset.name,
        subjectType: record.subjectType,
        subjectId: record.subjectId,
        quantity: record.quantity,
        seatCount: asset.seatCount,
      });
    }
  }

  const metrics = assets.map((a) => measure(a, usedByAsset.get(a.id) ?? 0, asOf));
  const statusOf = (m: AssetMetrics) => byId.get(m.assetId)?.status;

  const expiringUntil = addDaysIso(asOf, expiringWithinDays);
  const expiring = metrics
    .filter((m) => m.renewalDate !== null && m.renewalDate >= asOf && m.renewalDate <= expiringUntil)
    .sort((a, b) => (a.daysUntilRenewal ?? 0) - (b.daysUntilRenewal ?? 0) || a.name.localeCompare(b.name));
  const expired = metrics
    .filter((m) => m.renewalDate !== null && m.renewalDate < asOf)
    .sort((a, b) => (a.daysUntilRenewal ?? 0) - (b.daysUntilRenewal ?? 0) || a.name.localeCompare(b.name));
  // Assets without seats have nothing to under-use
  const underutilized = metrics
    .filter((m) => statusOf(m) === "active" && m.seatCount > 0 && m.utilization < underutilizedBelow)
    .sort((a, b) => a.utilization - b.utilization || a.name.localeCompare(b.name));
  const topUtilized = metrics
    .filter((m) => m.seatCount > 0)
    .sort((a, b) => b.utilization - a.utilization || a.name.localeCompare(b.name))
    .slice(0, TOP_COUNT);

  const seats = metrics.reduce((sum, m) => sum + m.seatCount, 0);
  const used = metrics.reduce((sum, m) => sum + m.used, 0);
  const potentialSavings = underutilized.reduce((sum, m) => {
    const asset = byId.get(m.assetId);
    return asset ? sum + (m.unusedSeats * annualCost(asset)) / asset.seatCount : sum;
  }, 0);

  const costByVendor = new Map<string, number>();
  const vendors = new Map<string, number>();
  const licenseTypes = new Map<string, number>();
  const usageBands: Bands = { high: 0, medium: 0, low: 0 };
  const costBands: Bands = { high: 0, medium: 0, low: 0 };
  for (const asset of assets) {
    costByVendor.set(asset.vendor, (costByVendor.get(asset.vendor) ?? 0) + annualCost(asset));
    vendors.set(asset.vendor, (vendors.get(asset.vendor) ?? 0) + 1);
    licenseTypes.set(asset.licenseType, (licenseTypes.get(asset.licenseType) ?? 0) + 1);
  }
  for (const m of metrics) {
    usageBands[bandOf(m.utilization, HIGH_USAGE, MEDIUM_USAGE)] += 1;
    costBands[bandOf(m.annualCost, HIGH_COST, MEDIUM_COST)] += 1;
  }
  const vendorCosts = sortedCounts(costByVendor);
  for (const vendor of Object.keys(vendorCosts)) {
    vendorCosts[vendor] = roundMoney(vendorCosts[vendor]);
  }

  return {
    window,
    asOf,
    thresholds: { expiringWithinDays, underutilizedBelow },
    assets: metrics,
    totals: {
      assetCount: assets.length,
      seats,
      used,
      utilization: seats > 0 ? roundRatio(used / seats) : 0,
      annualCost: roundMoney(assets.reduce((sum, a) => sum + annualCost(a), 0)),
      costPerPeriod: roundMoney(assets.reduce((sum, a) => sum + a.costPerPeriod, 0)),
      potentialSavings: roundMoney(potentialSavings),
      costByVendor: vendorCosts,
    },
    expiring,
    expired,
    underutilized,
    seatViolations,
    topUtilized,
    distributions: {
      licenseTypes: sortedCounts(licenseTypes),
      vendors: sortedCounts(vendors),
      usageBands,
      costBands,
    },
  };
}

export class ReportingService {
  constructor(
    private readonly store: RecordStore,
    private readonly config: ReportingConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Build the report for a window, defaulting to the calendar month of
   * `asOf`. Retired assets are left out unless the query asks for them.
   */
  async summary(actor: Actor, query: unknown = {}): Promise<UsageReport> {
    authorize(actor, "report:read");
    const q = parseInput(reportQuerySchema, query);
    const asOf = q.asOf ?? todayIso(this.clock());
    const month = monthWindow(asOf);
    const window: ReportWindow = { from: q.from ?? month.from, to: q.to ?? month.to };
    if (window.from > window.to) {
      throw new ValidationError("Window start must not be after its end", [
        { path: "from", message: `${window.from} is after ${window.to}` },
      ]);
    }

    const assets = await this.store.assets.list({
      vendor: q.vendor,
      licenseType: q.licenseType,
      status: q.status ?? ["active", "expired"],
    });
    const usage = await this.store.usage.list({
      assetIds: assets.map((a) => a.id),
      from: window.from,
      to: window.to,
    });

    return buildReport(assets, usage, {
      window,
      asOf,
      expiringWithinDays: q.expiringWithinDays ?? this.config.expiringWithinDays,
      underutilizedBelow: q.underutilizedBelow ?? this.config.underutilizedBelow,
    });
  }
}
