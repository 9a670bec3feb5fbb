// server/src/store/types.ts
// Repository contracts shared by the PostgreSQL and in-process stores

import type {
  AssetStatus,
  LicenseType,
  SoftwareAsset,
  UsageRecord,
  UsageSubjectType,
  UserRecord,
} from "@samurai/shared/types.js";
import type { UserRole } from "@samurai/shared/auth/types.js";

export interface AssetFilter {
  vendor?: string;
  status?: AssetStatus | AssetStatus[];
  licenseType?: LicenseType;
  // Inclusive bounds on renewalDate; assets without one never match
  renewalFrom?: string;
  renewalTo?: string;
  // Case-insensitive substring over name, vendor and description
  search?: string;
}

export function toStatusList(status: AssetFilter["status"]): AssetStatus[] | null {
  if (status === undefined) return null;
  return Array.isArray(status) ? status : [status];
}

export type AssetPatch = Partial<
  Pick<
    SoftwareAsset,
    | "name"
    | "vendor"
    | "description"
    | "licenseType"
    | "seatCount"
    | "costPerPeriod"
    | "billingPeriod"
    | "renewalDate"
    | "status"
  >
>;

export interface AssetRepository {
  insert(asset: SoftwareAsset): Promise<SoftwareAsset>;
  findById(id: string): Promise<SoftwareAsset | null>;
  /** Case-insensitive match on both fields. */
  findByNameAndVendor(name: string, vendor: string): Promise<SoftwareAsset[]>;
  /**
   * Apply `patch` only if the stored version still equals `expectedVersion`,
   * bumping the version and updatedAt. Returns null when the asset is missing
   * or the version has moved on.
   */
  update(id: string, patch: AssetPatch, expectedVersion: number): Promise<SoftwareAsset | null>;
  list(filter?: AssetFilter): Promise<SoftwareAsset[]>;
}

export interface UsageFilter {
  assetId?: string;
  assetIds?: string[];
  subjectType?: UsageSubjectType;
  subjectId?: string;
  // Records whose period overlaps [from, to]
  from?: string;
  to?: string;
}

export interface UsageRepository {
  insert(record: UsageRecord): Promise<UsageRecord>;
  findById(id: string): Promise<UsageRecord | null>;
  delete(id: string): Promise<boolean>;
  list(filter?: UsageFilter): Promise<UsageRecord[]>;
}

export type UserPatch = Partial<Pick<UserRecord, "username" | "email" | "passwordHash" | "role" | "lastLogin">>;

export interface UserPage {
  users: UserRecord[];
  total: number;
}

export interface UserRepository {
  insert(user: UserRecord): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  /** Case-insensitive. */
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Case-insensitive. */
  findByEmail(email: string): Promise<UserRecord | null>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: string): Promise<boolean>;
  list(options: { offset: number; limit: number }): Promise<UserPage>;
  /**
   * Inside a transaction the PostgreSQL store locks the admin rows, so two
   * concurrent demotions cannot both see a count of two.
   */
  countByRole(role: UserRole): Promise<number>;
}

export interface RecordStore {
  readonly assets: AssetRepository;
  readonly usage: UsageRepository;
  readonly users: UserRepository;
  /**
   * Run `fn` against a store bound to a single transaction. Everything `fn`
   * writes is discarded if it throws.
   */
  transaction<T>(fn: (store: RecordStore) => Promise<T>): Promise<T>;
}
