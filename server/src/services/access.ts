// server/src/services/access.ts
// Access control gate: role capabilities plus ownership for usage writes

import type { Actor, Operation, UserRole } from "@samurai/shared/auth/types.js";
import { PermissionError } from "@samurai/shared/errors.js";
import type { UsageSubjectType } from "@samurai/shared/types.js";

type Grant = "always" | "own" | "never";

const CAPABILITIES: Record<UserRole, Record<Operation, Grant>> = {
  admin: {
    "asset:read": "always",
    "asset:write": "always",
    "asset:delete": "always",
    "usage:read": "always",
    "usage:write": "always",
    "usage:delete": "always",
    "user:manage": "always",
    "report:read": "always",
    "insight:request": "always",
  },
  standard: {
    "asset:read": "always",
    "asset:write": "never",
    "asset:delete": "never",
    "usage:read": "always",
    "usage:write": "own",
    "usage:delete": "own",
    "user:manage": "never",
    "report:read": "always",
    "insight:request": "always",
  },
};

/** The usage subject an "own" grant is checked against. */
export interface UsageSubject {
  subjectType: UsageSubjectType;
  subjectId: string;
}

/**
 * Decide without throwing. An "own" grant only passes when the caller names
 * a subject and that subject is the actor as a user.
 */
export function can(actor: Actor, operation: Operation, subject?: UsageSubject): boolean {
  const grant = CAPABILITIES[actor.role][operation];
  if (grant === "always") return true;
  if (grant === "never") return false;
  return subject !== undefined && subject.subjectType === "user" && subject.subjectId === actor.id;
}

export function authorize(actor: Actor, operation: Operation, subject?: UsageSubject): void {
  if (!can(actor, operation, subject)) {
    console.warn(`[access] denied ${operation} for ${actor.username} (${actor.role})`);
    throw new PermissionError(`Permission denied: ${operation} requires additional privileges`);
  }
}
