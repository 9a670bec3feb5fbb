// server/src/store/pgStore.ts
// PostgreSQL record store (schema in db/migrations)

import type {
  AssetStatus,
  BillingPeriod,
  LicenseType,
  SoftwareAsset,
  UsageRecord,
  UsageSubjectType,
  UserRecord,
} from "@samurai/shared/types.js";
import type { UserRole } from "@samurai/shared/auth/types.js";
import type { Database, SqlExecutor } from "../db/index.js";
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

interface AssetRow {
  id: string;
  name: string;
  vendor: string;
  description: string | null;
  license_type: LicenseType;
  seat_count: number;
  cost_per_period: string; // NUMERIC comes back as text
  billing_period: BillingPeriod;
  renewal_date: string | null;
  status: AssetStatus;
  version: number;
  created_at: Date;
  updated_at: Date;
}

interface UsageRow {
  id: string;
  asset_id: string;
  subject_type: UsageSubjectType;
  subject_id: string;
  period_start: string;
  period_end: string;
  quantity: number;
  recorded_by: string;
  created_at: Date;
}

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  role: UserRole;
  created_at: Date;
  last_login: Date | null;
}

// DATE columns are rendered as text so they never pass through a JS Date
const ASSET_COLUMNS = `id, name, vendor, description, license_type, seat_count, cost_per_period,
  billing_period, to_char(renewal_date, 'YYYY-MM-DD') AS renewal_date, status, version,
  created_at, updated_at`;

const USAGE_COLUMNS = `id, asset_id, subject_type, subject_id,
  to_char(period_start, 'YYYY-MM-DD') AS period_start,
  to_char(period_end, 'YYYY-MM-DD') AS period_end,
  quantity, recorded_by, created_at`;

const USER_COLUMNS = "id, username, email, password_hash, role, created_at, last_login";

function toAsset(row: AssetRow): SoftwareAsset {
  return {
    id: row.id,
    name: row.name,
    vendor: row.vendor,
    description: row.description ?? undefined,
    licenseType: row.license_type,
    seatCount: row.seat_count,
    costPerPeriod: Number(row.cost_per_period),
    billingPeriod: row.billing_period,
    renewalDate: row.renewal_date,
    status: row.status,
    version: row.version,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function toUsage(row: UsageRow): UsageRecord {
  return {
    id: row.id,
    assetId: row.asset_id,
    subjectType: row.subject_type,
    subjectId: row.subject_id,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    quantity: row.quantity,
    recordedBy: row.recorded_by,
    createdAt: row.created_at.toISOString(),
  };
}

function toUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at.toISOString(),
    lastLogin: row.last_login ? row.last_login.toISOString() : null,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Collects WHERE fragments with positional parameters. */
class WhereBuilder {
  readonly values: unknown[] = [];
  private readonly clauses: string[] = [];

  add(clause: (param: string) => string, value: unknown): void {
    this.values.push(value);
    this.clauses.push(clause(`$${this.values.length}`));
  }

  raw(clause: string): void {
    this.clauses.push(clause);
  }

  toSql(): string {
    return this.clauses.length ? `WHERE ${this.clauses.join(" AND ")}` : "";
  }
}

/** SET fragments for the pairs whose value is defined, numbered from `offset + 1`. */
function setClauses(pairs: Array<[column: string, value: unknown]>, offset: number): { sql: string[]; values: unknown[] } {
  const sql: string[] = [];
  const values: unknown[] = [];
  for (const [column, value] of pairs) {
    if (value === undefined) continue;
    values.push(value);
    sql.push(`${column} = $${offset + values.length}`);
  }
  return { sql, values };
}

class PgAssetRepository implements AssetRepository {
  constructor(private readonly query: SqlExecutor) {}

  async insert(asset: SoftwareAsset): Promise<SoftwareAsset> {
    const res = await this.query<AssetRow>(
      `INSERT INTO software_assets (
         id, name, vendor, description, license_type, seat_count, cost_per_period,
         billing_period, renewal_date, status, version, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       RETURNING ${ASSET_COLUMNS}`,
      [
        asset.id,
        asset.name,
        asset.vendor,
        asset.description ?? null,
        asset.licenseType,
        asset.seatCount,
        asset.costPerPeriod,
        asset.billingPeriod,
        asset.renewalDate,
        asset.status,
        asset.version,
        asset.createdAt,
        asset.updatedAt,
      ]
    );
    return toAsset(res.rows[0]);
  }

  async findById(id: string): Promise<SoftwareAsset | null> {
    const res = await this.query<AssetRow>(`SELECT ${ASSET_COLUMNS} FROM software_assets WHERE id = $1`, [id]);
    return res.rows[0] ? toAsset(res.rows[0]) : null;
  }

  async findByNameAndVendor(name: string, vendor: string): Promise<SoftwareAsset[]> {
    const res = await this.query<AssetRow>(
      `SELECT ${ASSET_COLUMNS} FROM software_assets
       WHERE LOWER(name) = LOWER($1) AND LOWER(vendor) = LOWER($2)`,
      [name, vendor]
    );
    return res.rows.map(toAsset);
  }

  async update(id: string, patch: AssetPatch, expectedVersion: number): Promise<SoftwareAsset | null> {
    const set = setClauses(
      [
        ["name", patch.name],
        ["vendor", patch.vendor],
        ["description", patch.description],
        ["license_type", patch.licenseType],
        ["seat_count", patch.seatCount],
        ["cost_per_period", patch.costPerPeriod],
        ["billing_period", patch.billingPeriod],
        ["renewal_date", patch.renewalDate],
        ["status", patch.status],
      ],
      2
    );
    const res = await this.query<AssetRow>(
      `UPDATE software_assets
       SET ${[...set.sql, "version = version + 1", "updated_at = NOW()"].join(", ")}
       WHERE id = $1 AND version = $2
       RETURNING ${ASSET_COLUMNS}`,
      [id, expectedVersion, ...set.values]
    );
    return res.rows[0] ? toAsset(res.rows[0]) : null;
  }

  async list(filter: AssetFilter = {}): Promise<SoftwareAsset[]> {
    const where = new WhereBuilder();
    if (filter.vendor) where.add((p) => `LOWER(vendor) = LOWER(${p})`, filter.vendor);
    const statuses = toStatusList(filter.status);
    if (statuses) where.add((p) => `status = ANY(${p})`, statuses);
    if (filter.licenseType) where.add((p) => `license_type = ${p}`, filter.licenseType);
    if (filter.renewalFrom || filter.renewalTo) where.raw("renewal_date IS NOT NULL");
    if (filter.renewalFrom) where.add((p) => `renewal_date >= ${p}`, filter.renewalFrom);
    if (filter.renewalTo) where.add((p) => `renewal_date <= ${p}`, filter.renewalTo);
    if (filter.search) {
      where.add(
        (p) => `(name ILIKE ${p} OR vendor ILIKE ${p} OR COALESCE(description, '') ILIKE ${p})`,
        `%${escapeLike(filter.search)}%`
      );
    }

    const res = await this.query<AssetRow>(
      `SELECT ${ASSET_COLUMNS} FROM software_assets ${where.toSql()}
       ORDER BY LOWER(name), LOWER(vendor), id`,
      where.values
    );
    return res.rows.map(toAsset);
  }
}

class PgUsageRepository implements UsageRepository {
  constructor(private readonly query: SqlExecutor) {}

  async insert(record: UsageRecord): Promise<UsageRecord> {
    const res = await this.query<UsageRow>(
      `INSERT INTO usage_records (
         id, asset_id, subject_type, subject_id, period_start, period_end, quantity, recorded_by, created_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${USAGE_COLUMNS}`,
      [
        record.id,
        record.assetId,
        record.subjectType,
        record.subjectId,
        record.periodStart,
        record.periodEnd,
        record.quantity,
        record.recordedBy,
        record.createdAt,
      ]
    );
    return toUsage(res.rows[0]);
  }

  async findById(id: string): Promise<UsageRecord | null> {
    const res = await this.query<UsageRow>(`SELECT ${USAGE_COLUMNS} FROM usage_records WHERE id = $1`, [id]);
    return res.rows[0] ? toUsage(res.rows[0]) : null;
  }

  async delete(id: string): Promise<boolean> {
    const res = await this.query("DELETE FROM usage_records WHERE id = $1", [id]);
    return (res.rowCount ?? 0) > 0;
  }

  async list(filter: UsageFilter = {}): Promise<UsageRecord[]> {
    const where = new WhereBuilder();
    if (filter.assetId) where.add((p) => `asset_id = ${p}`, filter.assetId);
    if (filter.assetIds) where.add((p) => `asset_id = ANY(${p})`, filter.assetIds);
    if (filter.subjectType) where.add((p) => `subject_type = ${p}`, filter.subjectType);
    if (filter.subjectId) where.add((p) => `subject_id = ${p}`, filter.subjectId);
    if (filter.from) where.add((p) => `period_end >= ${p}`, filter.from);
    if (filter.to) where.add((p) => `period_start <= ${p}`, filter.to);

    const res = await this.query<UsageRow>(
      `SELECT ${USAGE_COLUMNS} FROM usage_records ${where.toSql()}
       ORDER BY period_start DESC, created_at DESC, id`,
      where.values
    );
    return res.rows.map(toUsage);
  }
}

class PgUserRepository implements UserRepository {
  constructor(private readonly query: SqlExecutor, private readonly inTransaction: boolean) {}

  async insert(user: UserRecord): Promise<UserRecord> {
    const res = await this.query<UserRow>(
      `INSERT INTO users (id, username, email, password_hash, role, created_at, last_login)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.username, user.email, user.passwordHash, user.role, user.createdAt, user.lastLogin]
    );
    return toUser(res.rows[0]);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const res = await this.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return res.rows[0] ? toUser(res.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const res = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(username) = LOWER($1)`,
      [username]
    );
    return res.rows[0] ? toUser(res.rows[0]) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const res = await this.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = LOWER($1)`, [
      email,
    ]);
    return res.rows[0] ? toUser(res.rows[0]) : null;
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const set = setClauses(
      [
        ["username", patch.username],
        ["email", patch.email],
        ["password_hash", patch.passwordHash],
        ["role", patch.role],
        ["last_login", patch.lastLogin],
      ],
      1
    );
    if (set.sql.length === 0) {
      return this.findById(id);
    }
    const res = await this.query<UserRow>(
      `UPDATE users SET ${set.sql.join(", ")} WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [id, ...set.values]
    );
    return res.rows[0] ? toUser(res.rows[0]) : null;
  }

  async delete(id: string): Promise<boolean> {
    const res = await this.query("DELETE FROM users WHERE id = $1", [id]);
    return (res.rowCount ?? 0) > 0;
  }

  async list(options: { offset: number; limit: number }): Promise<UserPage> {
    const [page, count] = await Promise.all([
      this.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY created_at, id LIMIT $1 OFFSET $2`, [
        options.limit,
        options.offset,
      ]),
      this.query<{ total: string }>("SELECT COUNT(*) AS total FROM users"),
    ]);
    return {
      users: page.rows.map(toUser),
      total: Number(count.rows[0]?.total ?? 0),
    };
  }

  async countByRole(role: UserRole): Promise<number> {
    // Row locks need a transaction; outside one the plain count is enough
    const res = await this.query<{ id: string }>(
      `SELECT id FROM users WHERE role = $1${this.inTransaction ? " FOR UPDATE" : ""}`,
      [role]
    );
    return res.rows.length;
  }
}

export class PgRecordStore implements RecordStore {
  readonly assets: AssetRepository;
  readonly usage: UsageRepository;
  readonly users: UserRepository;

  constructor(private readonly db: Database, query: SqlExecutor = db.query, private readonly inTransaction = false) {
    this.assets = new PgAssetRepository(query);
    this.usage = new PgUsageRepository(query);
    this.users = new PgUserRepository(query, inTransaction);
  }

  transaction<T>(fn: (store: RecordStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return fn(this);
    }
    return this.db.transaction((query) => fn(new PgRecordStore(this.db, query, true)));
  }
}
