import { ValidationError } from "@samurai/shared/errors.js";
import type { SoftwareAsset, UsageRecord } from "@samurai/shared/types.js";
import { MemoryRecordStore } from "../../store/memoryStore";
import { AssetService } from "../assets";
import { buildReport, ReportingService, type ReportOptions } from "../reporting";
import { UsageService } from "../usage";
import { admin, alice, fixedClock, subscription } from "./fixtures";

function asset(overrides: Partial<SoftwareAsset> & Pick<SoftwareAsset, "id" | "name">): SoftwareAsset {
  return {
    vendor: "Acme",
    licenseType: "subscription",
    seatCount: 10,
    costPerPeriod: 100,
    billingPeriod: "monthly",
    renewalDate: null,
    status: "active",
    version: 1,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function usage(
  overrides: Partial<UsageRecord> & Pick<UsageRecord, "id" | "assetId" | "quantity">
): UsageRecord {
  return {
    subjectType: "user",
    subjectId: "user_alice",
    periodStart: "2026-03-01",
    periodEnd: "2026-03-31",
    recordedBy: "user_admin",
    createdAt: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}

const options: ReportOptions = {
  window: { from: "2026-03-01", to: "2026-03-31" },
  asOf: "2026-03-15",
  expiringWithinDays: 30,
  underutilizedBelow: 0.3,
};

describe("buildReport", () => {
  const sketchpad = asset({ id: "a", name: "Sketchpad", renewalDate: "2026-04-04" });
  const ledger = asset({
    id: "b",
    name: "Ledger",
    vendor: "Globex",
    seatCount: 20,
    costPerPeriod: 3000,
    billingPeriod: "annual",
    renewalDate: "2026-01-31",
  });
  const archive = asset({
    id: "c",
    name: "Archive",
    licenseType: "perpetual",
    seatCount: 0,
    costPerPeriod: 50000,
    billingPeriod: "one_time",
  });
  const records = [
    usage({ id: "u1", assetId: "a", quantity: 7 }),
    // Outside the window
    usage({ id: "u2", assetId: "a", quantity: 5, periodStart: "2026-02-01", periodEnd: "2026-02-28" }),
    usage({ id: "u3", assetId: "b", quantity: 2 }),
    usage({ id: "u4", assetId: "c", quantity: 1, subjectType: "department", subjectId: "Records" }),
  ];
  const report = buildReport([sketchpad, ledger, archive], records, options);
  const metricsOf = (id: string) => report.assets.find((m) => m.assetId === id);

  it("computes utilization and cost per asset", () => {
    expect(metricsOf("a")).toEqual({
      assetId: "a",
      name: "Sketchpad",
      vendor: "Acme",
      licenseType: "subscription",
      status: "active",
      seatCount: 10,
      used: 7,
      utilization: 0.7,
      costPerPeriod: 100,
      billingPeriod: "monthly",
      annualCost: 1200,
      costPerSeat: 120,
      unusedSeats: 3,
      renewalDate: "2026-04-04",
      daysUntilRenewal: 20,
    });
    expect(metricsOf("b")).toMatchObject({ used: 2, utilization: 0.1, annualCost: 3000, costPerSeat: 150, daysUntilRenewal: -43 });
  });

  it("reports zero utilization and no per-seat cost without seats", () => {
    expect(metricsOf("c")).toMatchObject({
      used: 1,
      utilization: 0,
      costPerSeat: null,
      unusedSeats: 0,
      annualCost: 50000,
      daysUntilRenewal: null,
    });
  });

  it("totals seats, usage and cost", () => {
    expect(report.totals).toEqual({
      assetCount: 3,
      seats: 30,
      used: 10,
      utilization: 0.3333,
      annualCost: 54200,
      costPerPeriod: 53100,
      potentialSavings: 2700,
      costByVendor: { Acme: 51200, Globex: 3000 },
    });
  });

  it("lists expiring, expired and underutilized assets", () => {
    expect(report.expiring.map((m) => m.assetId)).toEqual(["a"]);
    expect(report.expired.map((m) => m.assetId)).toEqual(["b"]);
    expect(report.underutilized.map((m) => m.assetId)).toEqual(["b"]);
    expect(report.topUtilized.map((m) => m.assetId)).toEqual(["a", "b"]);
  });

  it("flags usage above the licensed seat count", () => {
    expect(report.seatViolations).toEqual([
      {
        usageId: "u4",
        assetId: "c",
        assetName: "Archive",
        subjectType: "department",
        subjectId: "Records",
        quantity: 1,
        seatCount: 0,
      },
    ]);
  });

  it("builds the distributions", () => {
    expect(report.distributions).toEqual({
      licenseTypes: { perpetual: 1, subscription: 2 },
      vendors: { Acme: 2, Globex: 1 },
      usageBands: { high: 0, medium: 1, low: 2 },
      costBands: { high: 0, medium: 1, low: 2 },
    });
  });

  it("treats the renewal horizon as inclusive", () => {
    const edge = buildReport([asset({ id: "e", name: "Edge", renewalDate: "2026-04-14" })], [], options);
    const beyond = buildReport([asset({ id: "f", name: "Beyond", renewalDate: "2026-04-15" })], [], options);
    const today = buildReport([asset({ id: "g", name: "Today", renewalDate: "2026-03-15" })], [], options);

    expect(edge.expiring).toHaveLength(1);
    expect(beyond.expiring).toHaveLength(0);
    expect(today.expiring).toHaveLength(1);
    expect(today.expired).toHaveLength(0);
  });

  it("leaves expired-status assets out of the underutilized list", () => {
    const lapsed = asset({ id: "h", name: "Lapsed", status: "expired" });
    expect(buildReport([lapsed], [], options).underutilized).toEqual([]);
  });

  it("is deterministic", () => {
    expect(buildReport([archive, ledger, sketchpad], [...records].reverse(), options)).toEqual(
      buildReport([archive, ledger, sketchpad], [...records].reverse(), options)
    );
  });
});

describe("ReportingService", () => {
  let assets: AssetService;
  let usageService: UsageService;
  let reporting: ReportingService;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = new MemoryRecordStore(fixedClock());
    assets = new AssetService(store, fixedClock());
    usageService = new UsageService(store, fixedClock());
    reporting = new ReportingService(store, { expiringWithinDays: 30, underutilizedBelow: 0.3 }, fixedClock());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("reports 0.7 utilization and an upcoming renewal for seven of ten seats", async () => {
    const created = await assets.create(admin, subscription);
    await usageService.record(admin, {
      assetId: created.id,
      subjectType: "department",
      subjectId: "Design",
      periodStart: "2026-03-02",
      quantity: 7,
    });

    const report = await reporting.summary(alice, { asOf: "2026-03-15" });

    expect(report.window).toEqual({ from: "2026-03-01", to: "2026-03-31" });
    expect(report.assets[0]).toMatchObject({ assetId: created.id, used: 7, utilization: 0.7 });
    expect(report.expiring.map((m) => m.assetId)).toEqual([created.id]);
  });

  it("defaults asOf to the clock's date", async () => {
    const report = await reporting.summary(admin);
    expect(report.asOf).toBe("2026-03-15");
    expect(report.thresholds).toEqual({ expiringWithinDays: 30, underutilizedBelow: 0.3 });
  });

  it("leaves retired assets out unless asked for", async () => {
    const created = await assets.create(admin, subscription);
    await assets.retire(admin, created.id);

    expect((await reporting.summary(admin, { asOf: "2026-03-15" })).totals.assetCount).toBe(0);
    expect((await reporting.summary(admin, { asOf: "2026-03-15", status: "retired" })).totals.assetCount).toBe(1);
  });

  it("applies query thresholds over the configured ones", async () => {
    await assets.create(admin, { ...subscription, renewalDate: "2026-05-10" });

    const report = await reporting.summary(admin, { asOf: "2026-03-15", expiringWithinDays: "60" });
    expect(report.expiring).toHaveLength(1);
  });

  it("rejects a window that ends before it starts", async () => {
    await expect(reporting.summary(admin, { asOf: "2026-03-15", from: "2026-04-01" })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("validates query filters", async () => {
    await expect(reporting.summary(admin, { status: "bogus" })).rejects.toBeInstanceOf(ValidationError);
    await expect(reporting.summary(admin, { underutilizedBelow: "2" })).rejects.toBeInstanceOf(ValidationError);
  });
});
