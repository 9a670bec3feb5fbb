import { PermissionError } from "@samurai/shared/errors.js";
import { authorize, can } from "../access";
import { admin, alice } from "./fixtures";

describe("access gate", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("lets admins do everything", () => {
    expect(can(admin, "asset:delete")).toBe(true);
    expect(can(admin, "user:manage")).toBe(true);
    expect(can(admin, "usage:write", { subjectType: "department", subjectId: "Finance" })).toBe(true);
  });

  it("lets standard users read and report", () => {
    expect(can(alice, "asset:read")).toBe(true);
    expect(can(alice, "usage:read")).toBe(true);
    expect(can(alice, "report:read")).toBe(true);
    expect(can(alice, "insight:request")).toBe(true);
  });

  it("keeps standard users away from asset writes and user management", () => {
    expect(can(alice, "asset:write")).toBe(false);
    expect(can(alice, "asset:delete")).toBe(false);
    expect(can(alice, "user:manage")).toBe(false);
  });

  it("limits standard usage writes to the user's own records", () => {
    expect(can(alice, "usage:write", { subjectType: "user", subjectId: alice.id })).toBe(true);
    expect(can(alice, "usage:write", { subjectType: "user", subjectId: "user_bob" })).toBe(false);
    expect(can(alice, "usage:write", { subjectType: "department", subjectId: alice.id })).toBe(false);
    expect(can(alice, "usage:delete")).toBe(false);
  });

  it("throws PermissionError when denied", () => {
    expect(() => authorize(alice, "asset:delete")).toThrow(PermissionError);
    expect(() => authorize(alice, "asset:delete")).toThrow(
      "Permission denied: asset:delete requires additional privileges"
    );
    expect(() => authorize(admin, "asset:delete")).not.toThrow();
  });
});
