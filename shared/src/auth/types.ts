// shared/src/auth/types.ts
// Roles and the operations the access gate understands

export const USER_ROLES = ["admin", "standard"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export type Operation =
  | "asset:read"
  | "asset:write"
  | "asset:delete"
  | "usage:read"
  | "usage:write"
  | "usage:delete"
  | "user:manage"
  | "report:read"
  | "insight:request";

/**
 * The authenticated user an operation runs on behalf of.
 * Passed explicitly to every service call.
 */
export interface Actor {
  id: string;
  username: string;
  role: UserRole;
}

// What express-session keeps for a logged-in user
export interface SessionUser {
  id: string;
  username: string;
  role: UserRole;
}
