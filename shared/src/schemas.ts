// shared/src/schemas.ts
// Input schemas for every write and query the API accepts

import { z } from "zod";
import { USER_ROLES } from "./auth/types.js";
import { isIsoDate } from "./dates.js";
import { ValidationError, type ValidationIssue } from "./errors.js";
import {
  ASSET_STATUSES,
  BILLING_PERIODS,
  LICENSE_TYPES,
  USAGE_SUBJECT_TYPES,
  type SoftwareAsset,
} from "./types.js";

const isoDate = z
  .string()
  .trim()
  .refine(isIsoDate, { message: "Expected a date in YYYY-MM-DD format" });

// Column limits: INTEGER and NUMERIC(14, 2)
export const MAX_COUNT = 2_147_483_647;
export const MAX_COST = 999_999_999_999.99;

const hasAtMostTwoDecimals = (value: number) => Number(value.toFixed(2)) === value;

const assetFields = {
  name: z.string().trim().min(1, "Name is required").max(100),
  vendor: z.string().trim().min(1, "Vendor is required").max(100),
  description: z.string().trim().max(2000),
  licenseType: z.enum(LICENSE_TYPES),
  seatCount: z
    .number()
    .int("Seat count must be a whole number")
    .min(0, "Seat count must be zero or greater")
    .max(MAX_COUNT, `Seat count must be at most ${MAX_COUNT}`),
  costPerPeriod: z
    .number()
    .finite()
    .min(0, "Cost must be zero or greater")
    .max(MAX_COST, `Cost must be at most ${MAX_COST}`)
    .refine(hasAtMostTwoDecimals, { message: "Cost must have at most two decimal places" }),
  billingPeriod: z.enum(BILLING_PERIODS),
  renewalDate: isoDate.nullable(),
};

/**
 * Cross-field rules for an asset. Used on create input and again on the
 * merged record during updates, where the fields may come from two sources.
 */
export function assetInvariantIssues(
  asset: Pick<SoftwareAsset, "licenseType" | "renewalDate" | "seatCount" | "costPerPeriod">
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (asset.seatCount < 0) {
    issues.push({ path: "seatCount", message: "Seat count must be zero or greater" });
  }
  if (asset.costPerPeriod < 0) {
    issues.push({ path: "costPerPeriod", message: "Cost must be zero or greater" });
  }
  if (asset.licenseType === "subscription" && !asset.renewalDate) {
    issues.push({ path: "renewalDate", message: "Renewal date is required for subscription licenses" });
  }
  return issues;
}

export const assetCreateSchema = z
  .object({
    ...assetFields,
    description: assetFields.description.optional(),
    billingPeriod: assetFields.billingPeriod.default("monthly"),
    renewalDate: assetFields.renewalDate.default(null),
  })
  .superRefine((asset, ctx) => {
    for (const issue of assetInvariantIssues(asset)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [issue.path], message: issue.message });
    }
  });

export const assetUpdateSchema = z
  .object({
    name: assetFields.name.optional(),
    vendor: assetFields.vendor.optional(),
    description: assetFields.description.optional(),
    licenseType: assetFields.licenseType.optional(),
    seatCount: assetFields.seatCount.optional(),
    costPerPeriod: assetFields.costPerPeriod.optional(),
    billingPeriod: assetFields.billingPeriod.optional(),
    renewalDate: assetFields.renewalDate.optional(),
    status: z.enum(["active", "expired"]).optional(),
    version: z.number().int().min(1).optional(),
  })
  .refine(
    ({ version: _version, ...fields }) => Object.values(fields).some((v) => v !== undefined),
    { message: "No fields to update" }
  );

export const assetListQuerySchema = z.object({
  vendor: z.string().trim().min(1).optional(),
  status: z.enum(ASSET_STATUSES).optional(),
  licenseType: z.enum(LICENSE_TYPES).optional(),
  renewalFrom: isoDate.optional(),
  renewalTo: isoDate.optional(),
  q: z.string().trim().min(1).max(100).optional(),
});

export const versionQuerySchema = z.object({
  version: z.coerce.number().int().min(1).optional(),
});

export const expireLapsedSchema = z.object({
  asOf: isoDate.optional(),
});

export const usageCreateSchema = z
  .object({
    assetId: z.string().trim().min(1, "Asset is required"),
    subjectType: z.enum(USAGE_SUBJECT_TYPES).default("user"),
    subjectId: z.string().trim().min(1).max(120).optional(),
    periodStart: isoDate,
    periodEnd: isoDate.optional(),
    quantity: z
      .number()
      .int("Quantity must be a whole number")
      .min(0, "Quantity must be zero or greater")
      .max(MAX_COUNT, `Quantity must be at most ${MAX_COUNT}`),
  })
  .superRefine((usage, ctx) => {
    if (usage.periodEnd !== undefined && usage.periodEnd < usage.periodStart) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["periodEnd"],
        message: "Period end must not be before period start",
      });
    }
    if (usage.subjectType === "department" && !usage.subjectId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["subjectId"],
        message: "Department is required",
      });
    }
  });

export const usageListQuerySchema = z.object({
  assetId: z.string().trim().min(1).optional(),
  subjectType: z.enum(USAGE_SUBJECT_TYPES).optional(),
  subjectId: z.string().trim().min(1).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
});

const password = z
  .string()
  .min(8, "Password must be at least 8 characters long")
  .max(128, "Password must be less than 128 characters");

const userFields = {
  // "@" marks an email at login
  username: z
    .string()
    .trim()
    .min(3, "Username must be at least 3 characters")
    .max(80)
    .refine((v) => !v.includes("@"), { message: "Username must not contain @" }),
  email: z.string().trim().toLowerCase().email("Invalid email format").max(120),
  password,
  role: z.enum(USER_ROLES),
};

export const userCreateSchema = z.object({
  ...userFields,
  role: userFields.role.default("standard"),
});

export const userUpdateSchema = z
  .object({
    username: userFields.username.optional(),
    email: userFields.email.optional(),
    password: userFields.password.optional(),
    role: userFields.role.optional(),
  })
  .refine((fields) => Object.values(fields).some((v) => v !== undefined), {
    message: "No fields to update",
  });

export const userListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(10),
});

export const loginSchema = z.object({
  login: z.string().trim().min(1, "Username or email is required"),
  password: z.string().min(1, "Password is required"),
});

export const reportQuerySchema = z
  .object({
    from: isoDate.optional(),
    to: isoDate.optional(),
    asOf: isoDate.optional(),
    vendor: z.string().trim().min(1).optional(),
    licenseType: z.enum(LICENSE_TYPES).optional(),
    status: z.enum(ASSET_STATUSES).optional(),
    expiringWithinDays: z.coerce.number().int().min(0).max(3650).optional(),
    underutilizedBelow: z.coerce.number().min(0).max(1).optional(),
  })
  .refine((q) => !q.from || !q.to || q.from <= q.to, {
    message: "Window start must not be after its end",
    path: ["from"],
  });

export const insightRequestSchema = z.object({
  message: z.string().trim().min(1, "Message is required").max(2000),
  from: isoDate.optional(),
  to: isoDate.optional(),
});

export type AssetCreateInput = z.output<typeof assetCreateSchema>;
export type AssetUpdateInput = z.output<typeof assetUpdateSchema>;
export type AssetListQuery = z.output<typeof assetListQuerySchema>;
export type UsageCreateInput = z.output<typeof usageCreateSchema>;
export type UsageListQuery = z.output<typeof usageListQuerySchema>;
export type UserCreateInput = z.output<typeof userCreateSchema>;
export type UserUpdateInput = z.output<typeof userUpdateSchema>;
export type UserListQuery = z.output<typeof userListQuerySchema>;
export type LoginInput = z.output<typeof loginSchema>;
export type ReportQuery = z.output<typeof reportQuerySchema>;
export type InsightRequest = z.output<typeof insightRequestSchema>;

/**
 * Parse untrusted input, turning zod failures into a ValidationError whose
 * message is the first issue and whose details carry all of them.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const details: ValidationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  throw new ValidationError(details[0]?.message ?? "Validation failed", details);
}
