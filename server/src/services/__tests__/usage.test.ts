import { NotFoundError, PermissionError, ValidationError } from "@samurai/shared/errors.js";
import { MemoryRecordStore } from "../../store/memoryStore";
import { AssetService } from "../assets";
import { UsageService } from "../usage";
import { admin, alice, bob, fixedClock, subscription } from "./fixtures";

describe("UsageService", () => {
  let assets: AssetService;
  let usage: UsageService;
  let assetId: string;

  beforeEach(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = new MemoryRecordStore(fixedClock());
    assets = new AssetService(store, fixedClock());
    usage = new UsageService(store, fixedClock());
    assetId = (await assets.create(admin, subscription)).id;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("records usage for the acting user by default", async () => {
    const { record, warnings } = await usage.record(alice, { assetId, periodStart: "2026-03-01", quantity: 7 });

    expect(record).toMatchObject({
      assetId,
      subjectType: "user",
      subjectId: alice.id,
      periodStart: "2026-03-01",
      periodEnd: "2026-03-01",
      quantity: 7,
      recordedBy: alice.id,
      createdAt: "2026-03-15T09:00:00.000Z",
    });
    expect(record.id).toMatch(/^usage_/);
    expect(warnings).toEqual([]);
  });

  it("stops standard users recording for anyone else", async () => {
    await expect(
      usage.record(alice, { assetId, subjectId: bob.id, periodStart: "2026-03-01", quantity: 1 })
    ).rejects.toBeInstanceOf(PermissionError);
    await expect(
      usage.record(alice, { assetId, subjectType: "department", subjectId: "Design", periodStart: "2026-03-01", quantity: 1 })
    ).rejects.toBeInstanceOf(PermissionError);
  });

  it("lets admins record department usage", async () => {
    const { record } = await usage.record(admin, {
      assetId,
      subjectType: "department",
      subjectId: "Design",
      periodStart: "2026-03-01",
      periodEnd: "2026-03-31",
      quantity: 4,
    });
    expect(record).toMatchObject({ subjectType: "department", subjectId: "Design", recordedBy: admin.id });
  });

  it("stores over-seat usage with a warning", async () => {
    const { record, warnings } = await usage.record(admin, {
      assetId,
      subjectType: "department",
      subjectId: "Design",
      periodStart: "2026-03-01",
      quantity: 12,
    });

    expect(warnings).toEqual(["Quantity 12 exceeds the 10 licensed seat(s) of Sketchpad"]);
    expect(await usage.get(admin, record.id)).toEqual(record);
  });

  it("rejects unknown and retired assets", async () => {
    await expect(
      usage.record(alice, { assetId: "asset_missing", periodStart: "2026-03-01", quantity: 1 })
    ).rejects.toThrow(new NotFoundError("Software asset", "asset_missing").message);

    await assets.retire(admin, assetId);
    await expect(usage.record(alice, { assetId, periodStart: "2026-03-01", quantity: 1 })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("keeps history queryable after the asset is retired", async () => {
    const { record } = await usage.record(alice, { assetId, periodStart: "2026-03-01", quantity: 2 });
    await assets.retire(admin, assetId);

    expect(await usage.list(bob, { assetId })).toEqual([record]);
  });

  it("filters by subject and overlapping window", async () => {
    await usage.record(alice, { assetId, periodStart: "2026-02-01", periodEnd: "2026-02-28", quantity: 3 });
    const march = (await usage.record(alice, { assetId, periodStart: "2026-03-10", quantity: 5 })).record;
    await usage.record(bob, { assetId, periodStart: "2026-03-12", quantity: 1 });

    const rows = await usage.list(alice, { subjectId: alice.id, from: "2026-03-01", to: "2026-03-31" });
    expect(rows).toEqual([march]);
  });

  it("lets standard users delete only their own records", async () => {
    const own = (await usage.record(alice, { assetId, periodStart: "2026-03-01", quantity: 1 })).record;
    const other = (await usage.record(bob, { assetId, periodStart: "2026-03-01", quantity: 1 })).record;

    await expect(usage.remove(alice, other.id)).rejects.toBeInstanceOf(PermissionError);
    await usage.remove(alice, own.id);

    await expect(usage.get(alice, own.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(usage.get(alice, other.id)).resolves.toEqual(other);
  });
});
