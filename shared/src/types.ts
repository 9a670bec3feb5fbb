// shared/src/types.ts
// Record types for software assets, usage and users

import type { UserRole } from "./auth/types.js";

export type AssetId = string;
export type UsageId = string;
export type UserId = string;

export const LICENSE_TYPES = ["perpetual", "subscription", "trial"] as const;
export type LicenseType = (typeof LICENSE_TYPES)[number];

export const ASSET_STATUSES = ["active", "expired", "retired"] as const;
export type AssetStatus = (typeof ASSET_STATUSES)[number];

export const BILLING_PERIODS = ["monthly", "quarterly", "annual", "one_time"] as const;
export type BillingPeriod = (typeof BILLING_PERIODS)[number];

export const USAGE_SUBJECT_TYPES = ["user", "department"] as const;
export type UsageSubjectType = (typeof USAGE_SUBJECT_TYPES)[number];

export interface SoftwareAsset {
  id: AssetId;
  name: string;
  vendor: string;
  description?: string;
  licenseType: LicenseType;
  seatCount: number;
  // Cost of the whole license for one billing period
  costPerPeriod: number;
  billingPeriod: BillingPeriod;
  renewalDate: string | null; // YYYY-MM-DD
  status: AssetStatus;
  // Bumped on every write; used for optimistic conflict detection
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface UsageRecord {
  id: UsageId;
  assetId: AssetId;
  subjectType: UsageSubjectType;
  // User id or department name, depending on subjectType
  subjectId: string;
  periodStart: string; // YYYY-MM-DD
  periodEnd: string; // YYYY-MM-DD, inclusive
  quantity: number;
  recordedBy: UserId;
  createdAt: string;
}

export interface UserRecord {
  id: UserId;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  createdAt: string;
  lastLogin: string | null;
}

/** User as returned to clients: never carries the password hash. */
export type PublicUser = Omit<UserRecord, "passwordHash">;

export function toPublicUser(user: UserRecord): PublicUser {
  const { passwordHash: _omit, ...rest } = user;
  return rest;
}

export type Recommendation =
  | {
      available: true;
      text: string;
      model: string;
      generatedAt: string;
      cached: boolean;
    }
  | {
      available: false;
      text: null;
      reason: string;
    };
