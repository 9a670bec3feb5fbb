import type { Actor } from "@samurai/shared/auth/types.js";

export const admin: Actor = { id: "user_admin", username: "admin", role: "admin" };
export const alice: Actor = { id: "user_alice", username: "alice", role: "standard" };
export const bob: Actor = { id: "user_bob", username: "bob", role: "standard" };

export const NOW = "2026-03-15T09:00:00.000Z";
export const fixedClock = (iso: string = NOW) => () => new Date(iso);

export const subscription = {
  name: "Sketchpad",
  vendor: "Acme",
  licenseType: "subscription",
  seatCount: 10,
  costPerPeriod: 100,
  billingPeriod: "monthly",
  renewalDate: "2026-04-04",
};
