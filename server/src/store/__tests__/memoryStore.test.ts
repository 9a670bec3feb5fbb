import type { SoftwareAsset, UserRecord } from "@samurai/shared/types.js";
import { MemoryRecordStore } from "../memoryStore";

const clock = () => new Date("2026-03-15T09:00:00.000Z");

function asset(id: string, name: string, overrides: Partial<SoftwareAsset> = {}): SoftwareAsset {
  return {
    id,
    name,
    vendor: "Acme",
    licenseType: "perpetual",
    seatCount: 5,
    costPerPeriod: 10,
    billingPeriod: "monthly",
    renewalDate: null,
    status: "active",
    version: 1,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function user(id: string, username: string, role: UserRecord["role"] = "standard"): UserRecord {
  return {
    id,
    username,
    email: `${username}@example.com`,
    passwordHash: "hash",
    role,
    createdAt: `2026-01-0${id.slice(-1)}T00:00:00.000Z`,
    lastLogin: null,
  };
}

describe("MemoryRecordStore", () => {
  let store: MemoryRecordStore;

  beforeEach(() => {
    store = new MemoryRecordStore(clock);
  });

  it("hands out copies so callers cannot mutate stored rows", async () => {
    const saved = await store.assets.insert(asset("a1", "Sketchpad"));
    saved.seatCount = 99;
    expect((await store.assets.findById("a1"))?.seatCount).toBe(5);
  });

  it("updates only at the expected version", async () => {
    await store.assets.insert(asset("a1", "Sketchpad"));

    expect(await store.assets.update("a1", { seatCount: 6 }, 2)).toBeNull();
    const updated = await store.assets.update("a1", { seatCount: 6 }, 1);

    expect(updated).toMatchObject({ seatCount: 6, version: 2, updatedAt: "2026-03-15T09:00:00.000Z" });
    expect(await store.assets.update("missing", { seatCount: 6 }, 1)).toBeNull();
  });

  it("orders and filters asset listings", async () => {
    await store.assets.insert(asset("a1", "zeta"));
    await store.assets.insert(asset("a2", "Alpha", { renewalDate: "2026-05-01", status: "expired" }));
    await store.assets.insert(asset("a3", "beta", { description: "Shared drawing board" }));

    expect((await store.assets.list()).map((a) => a.id)).toEqual(["a2", "a3", "a1"]);
    expect((await store.assets.list({ status: "active" })).map((a) => a.id)).toEqual(["a3", "a1"]);
    expect((await store.assets.list({ renewalFrom: "2026-01-01" })).map((a) => a.id)).toEqual(["a2"]);
    expect((await store.assets.list({ search: "drawing" })).map((a) => a.id)).toEqual(["a3"]);
    expect(await store.assets.findByNameAndVendor("ZETA", "acme")).toHaveLength(1);
  });

  it("matches usage records whose period overlaps the window", async () => {
    const base = {
      assetId: "a1",
      subjectType: "user" as const,
      subjectId: "u1",
      quantity: 1,
      recordedBy: "u1",
      createdAt: "2026-03-01T00:00:00.000Z",
    };
    await store.usage.insert({ ...base, id: "r1", periodStart: "2026-02-20", periodEnd: "2026-03-01" });
    await store.usage.insert({ ...base, id: "r2", periodStart: "2026-03-05", periodEnd: "2026-03-05" });
    await store.usage.insert({ ...base, id: "r3", periodStart: "2026-04-01", periodEnd: "2026-04-30" });

    const rows = await store.usage.list({ from: "2026-03-01", to: "2026-03-31" });
    expect(rows.map((r) => r.id)).toEqual(["r2", "r1"]);
    expect(await store.usage.list({ assetIds: [] })).toEqual([]);
    expect(await store.usage.delete("r3")).toBe(true);
    expect(await store.usage.delete("r3")).toBe(false);
  });

  it("looks users up case-insensitively and pages them by creation", async () => {
    await store.users.insert(user("u1", "Alice", "admin"));
    await store.users.insert(user("u2", "bob"));
    await store.users.insert(user("u3", "carol"));

    expect((await store.users.findByUsername("alice"))?.id).toBe("u1");
    expect((await store.users.findByEmail("BOB@example.com"))?.id).toBe("u2");
    expect(await store.users.countByRole("admin")).toBe(1);

    const page = await store.users.list({ offset: 1, limit: 1 });
    expect(page.total).toBe(3);
    expect(page.users.map((u) => u.id)).toEqual(["u2"]);
  });

  it("rolls back everything a failed transaction wrote", async () => {
    await store.users.insert(user("u1", "alice", "admin"));

    await expect(
      store.transaction(async (tx) => {
        await tx.users.update("u1", { role: "standard" });
        await tx.assets.insert(asset("a1", "Sketchpad"));
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect((await store.users.findById("u1"))?.role).toBe("admin");
    expect(await store.assets.findById("a1")).toBeNull();
  });

  it("keeps writes made outside a transaction that fails", async () => {
    await store.users.insert(user("u1", "alice", "admin"));
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const failing = store.transaction(async (tx) => {
      await tx.users.update("u1", { role: "standard" });
      await gate;
      throw new Error("abort");
    });
    await store.assets.insert(asset("a1", "Sketchpad"));
    release();

    await expect(failing).rejects.toThrow("abort");
    expect(await store.assets.findById("a1")).toMatchObject({ id: "a1", name: "Sketchpad" });
    expect((await store.users.findById("u1"))?.role).toBe("admin");
  });

  it("undoes a transaction's writes in reverse order", async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.assets.insert(asset("a1", "Sketchpad"));
        await tx.assets.update("a1", { seatCount: 9 }, 1);
        await tx.usage.insert({
          id: "r1",
          assetId: "a1",
          subjectType: "department",
          subjectId: "Design",
          periodStart: "2026-03-01",
          periodEnd: "2026-03-31",
          quantity: 2,
          recordedBy: "u1",
          createdAt: "2026-03-01T00:00:00.000Z",
        });
        await tx.usage.delete("r1");
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect(await store.assets.findById("a1")).toBeNull();
    expect(await store.usage.findById("r1")).toBeNull();
  });

  it("runs transactions one at a time", async () => {
    const order: string[] = [];
    const slow = store.transaction(async () => {
      order.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("slow:end");
    });
    const fast = store.transaction(async () => {
      order.push("fast");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("keeps going after a failed transaction", async () => {
    await expect(store.transaction(async () => Promise.reject(new Error("first")))).rejects.toThrow("first");
    await expect(store.transaction(async () => "second")).resolves.toBe("second");
  });
});
