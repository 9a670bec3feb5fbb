// server/src/store/memoryStore.ts
// In-process record store. Used when DATABASE_URL is unset and by the tests.

import type { SoftwareAsset, UsageRecord, UserRecord } from "@samurai/shared/types.js";
import type { UserRole } from "@samurai/shared/auth/types.js";
import { periodsOverlap } from "@samurai/shared/dates.js";
import {
  toStatusList,
  type AssetFilter,
  type AssetPatch,
  type AssetRepository,
  type RecordStore,
  type UsageFilter,
  type UsageRepository,
  type UserPage,
  type UserPatch,
  type UserRepository,
} from "./types.js";

type Clock = () => Date;

interface MemoryState {
  assets: Map<string, SoftwareAsset>;
  usage: Map<string, UsageRecord>;
  users: Map<string, UserRecord>;
}

/** The slice of Map the repositories use; a transaction swaps in a journaled view. */
interface Rows<V> {
  get(key: string): V | undefined;
  set(key: string, value: V): unknown;
  delete(key: string): boolean;
  values(): Iterable<V>;
  forEach(fn: (value: V, key: string) => void): void;
}

type UndoLog = Array<() => void>;

/**
 * Records how to reverse each write made through it. Rolling back replays
 * only this log, so writes made outside the transaction survive.
 */
class JournaledRows<V> implements Rows<V> {
  constructor(private readonly rows: Map<string, V>, private readonly undo: UndoLog) {}

  get(key: string): V | undefined {
    return this.rows.get(key);
  }

  set(key: string, value: V): this {
    this.remember(key);
    this.rows.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    if (!this.rows.has(key)) return false;
    this.remember(key);
    return this.rows.delete(key);
  }

  values(): Iterable<V> {
    return this.rows.values();
  }

  forEach(fn: (value: V, key: string) => void): void {
    this.rows.forEach((value, key) => fn(value, key));
  }

  private remember(key: string): void {
    const previous = this.rows.get(key);
    this.undo.push(() => {
      if (previous === undefined) {
        this.rows.delete(key);
      } else {
        this.rows.set(key, previous);
      }
    });
  }
}

const lower = (value: string | undefined) => (value ?? "").toLowerCase();

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

class MemoryAssetRepository implements AssetRepository {
  constructor(private readonly rows: Rows<SoftwareAsset>, private readonly clock: Clock) {}

  async insert(asset: SoftwareAsset): Promise<SoftwareAsset> {
    this.rows.set(asset.id, { ...asset });
    return { ...asset };
  }

  async findById(id: string): Promise<SoftwareAsset | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByNameAndVendor(name: string, vendor: string): Promise<SoftwareAsset[]> {
    return [...this.rows.values()]
      .filter((a) => lower(a.name) === lower(name) && lower(a.vendor) === lower(vendor))
      .map((a) => ({ ...a }));
  }

  async update(id: string, patch: AssetPatch, expectedVersion: number): Promise<SoftwareAsset | null> {
    const current = this.rows.get(id);
    if (!current || current.version !== expectedVersion) {
      return null;
    }
    const next: SoftwareAsset = {
      ...current,
      ...patch,
      version: current.version + 1,
      updatedAt: this.clock().toISOString(),
    };
    this.rows.set(id, next);
    return { ...next };
  }

  async list(filter: AssetFilter = {}): Promise<SoftwareAsset[]> {
    const statuses = toStatusList(filter.status);
    const search = filter.search ? lower(filter.search) : null;

    return [...this.rows.values()]
      .filter((a) => !filter.vendor || lower(a.vendor) === lower(filter.vendor))
      .filter((a) => !statuses || statuses.includes(a.status))
      .filter((a) => !filter.licenseType || a.licenseType === filter.licenseType)
      .filter((a) => {
        if (!filter.renewalFrom && !filter.renewalTo) return true;
        if (!a.renewalDate) return false;
        if (filter.renewalFrom && a.renewalDate < filter.renewalFrom) return false;
        if (filter.renewalTo && a.renewalDate > filter.renewalTo) return false;
        return true;
      })
      .filter(
        (a) =>
          !search ||
          lower(a.name).includes(search) ||
          lower(a.vendor).includes(search) ||
          lower(a.description).includes(search)
      )
      .sort(
        (a, b) =>
          compareText(lower(a.name), lower(b.name)) ||
          compareText(lower(a.vendor), lower(b.vendor)) ||
          compareText(a.id, b.id)
      )
      .map((a) => ({ ...a }));
  }
}

class MemoryUsageRepository implements UsageRepository {
  constructor(private readonly rows: Rows<UsageRecord>) {}

  async insert(record: UsageRecord): Promise<UsageRecord> {
    this.rows.set(record.id, { ...record });
    return { ...record };
  }

  async findById(id: string): Promise<UsageRecord | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async list(filter: UsageFilter = {}): Promise<UsageRecord[]> {
    const window = {
      start: filter.from ?? "0000-01-01",
      end: filter.to ?? "9999-12-31",
    };

    return [...this.rows.values()]
      .filter((u) => !filter.assetId || u.assetId === filter.assetId)
      .filter((u) => !filter.assetIds || filter.assetIds.includes(u.assetId))
      .filter((u) => !filter.subjectType || u.subjectType === filter.subjectType)
      .filter((u) => !filter.subjectId || u.subjectId === filter.subjectId)
      .filter((u) => periodsOverlap({ start: u.periodStart, end: u.periodEnd }, window))
      .sort(
        (a, b) =>
          compareText(b.periodStart, a.periodStart) ||
          compareText(b.createdAt, a.createdAt) ||
          compareText(a.id, b.id)
      )
      .map((u) => ({ ...u }));
  }
}

class MemoryUserRepository implements UserRepository {
  constructor(private readonly rows: Rows<UserRecord>) {}

  async insert(user: UserRecord): Promise<UserRecord> {
    this.rows.set(user.id, { ...user });
    return { ...user };
  }

  async findById(id: string): Promise<UserRecord | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const row = [...this.rows.values()].find((u) => lower(u.username) === lower(username));
    return row ? { ...row } : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const row = [...this.rows.values()].find((u) => lower(u.email) === lower(email));
    return row ? { ...row } : null;
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const current = this.rows.get(id);
    if (!current) return null;
    const next = { ...current, ...patch };
    this.rows.set(id, next);
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async list(options: { offset: number; limit: number }): Promise<UserPage> {
    const all = [...this.rows.values()].sort(
      (a, b) => compareText(a.createdAt, b.createdAt) || compareText(a.id, b.id)
    );
    return {
      users: all.slice(options.offset, options.offset + options.limit).map((u) => ({ ...u })),
      total: all.length,
    };
  }

  async countByRole(role: UserRole): Promise<number> {
    let count = 0;
    this.rows.forEach((u) => {
      if (u.role === role) count++;
    });
    return count;
  }
}

/**
 * The store handed to a transaction callback. Nested transactions run
 * inline, since the outer one already holds the lock.
 */
class MemoryTransactionScope implements RecordStore {
  readonly assets: AssetRepository;
  readonly usage: UsageRepository;
  readonly users: UserRepository;

  constructor(state: MemoryState, clock: Clock, undo: UndoLog) {
    this.assets = new MemoryAssetRepository(new JournaledRows(state.assets, undo), clock);
    this.usage = new MemoryUsageRepository(new JournaledRows(state.usage, undo));
    this.users = new MemoryUserRepository(new JournaledRows(state.users, undo));
  }

  transaction<T>(fn: (store: RecordStore) => Promise<T>): Promise<T> {
    return fn(this);
  }
}

export class MemoryRecordStore implements RecordStore {
  readonly assets: AssetRepository;
  readonly usage: UsageRepository;
  readonly users: UserRepository;

  private readonly state: MemoryState = {
    assets: new Map(),
    usage: new Map(),
    users: new Map(),
  };
  // Transactions run one at a time, in arrival order
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly clock: Clock = () => new Date()) {
    this.assets = new MemoryAssetRepository(this.state.assets, clock);
    this.usage = new MemoryUsageRepository(this.state.usage);
    this.users = new MemoryUserRepository(this.state.users);
  }

  transaction<T>(fn: (store: RecordStore) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const undo: UndoLog = [];
      try {
        return await fn(new MemoryTransactionScope(this.state, this.clock, undo));
      } catch (err) {
        undo.reverse().forEach((step) => step());
        throw err;
      }
    });
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
