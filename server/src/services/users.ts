// server/src/services/users.ts
// User accounts: admin-managed CRUD, login and the last-admin invariant

import { v4 as uuidv4 } from "uuid";
import type { Actor } from "@samurai/shared/auth/types.js";
import { NotFoundError, ValidationError } from "@samurai/shared/errors.js";
import {
  loginSchema,
  parseInput,
  userCreateSchema,
  userListQuerySchema,
  userUpdateSchema,
} from "@samurai/shared/schemas.js";
import { toPublicUser, type PublicUser, type UserRecord } from "@samurai/shared/types.js";
import type { RecordStore, UserPatch } from "../store/types.js";
import { comparePassword, hashPassword, needsRehash, SALT_ROUNDS } from "../utils/password.js";
import { authorize } from "./access.js";

export interface UserServiceOptions {
  clock?: () => Date;
  saltRounds?: number;
}

export interface UserListing {
  users: PublicUser[];
  total: number;
  page: number;
  pageSize: number;
  adminCount: number;
}

export interface DefaultAdmin {
  username: string;
  email: string;
  password: string;
}

export class UserService {
  private readonly clock: () => Date;
  private readonly saltRounds: number;

  constructor(private readonly store: RecordStore, options: UserServiceOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.saltRounds = options.saltRounds ?? SALT_ROUNDS;
  }

  async create(actor: Actor, input: unknown): Promise<PublicUser> {
    authorize(actor, "user:manage");
    const data = parseInput(userCreateSchema, input);
    await this.assertAvailable(this.store, { username: data.username, email: data.email });

    const user: UserRecord = {
      id: `user_${uuidv4()}`,
      username: data.username,
      email: data.email,
      passwordHash: await hashPassword(data.password, this.saltRounds),
      role: data.role,
      createdAt: this.clock().toISOString(),
      lastLogin: null,
    };
    const saved = await this.store.users.insert(user);
    console.log(`[users] ${actor.username} created ${saved.id} (${saved.username}, ${saved.role})`);
    return toPublicUser(saved);
  }

  /** Admins can read anyone; a standard user can read only themselves. */
  async get(actor: Actor, id: string): Promise<PublicUser> {
    if (id !== actor.id) {
      authorize(actor, "user:manage");
    }
    const user = await this.store.users.findById(id);
    if (!user) {
      throw new NotFoundError("User", id);
    }
    return toPublicUser(user);
  }

  async list(actor: Actor, query: unknown = {}): Promise<UserListing> {
    authorize(actor, "user:manage");
    const { page, pageSize } = parseInput(userListQuerySchema, query);
    const [result, adminCount] = await Promise.all([
      this.store.users.list({ offset: (page - 1) * pageSize, limit: pageSize }),
      this.store.users.countByRole("admin"),
    ]);
    return {
      users: result.users.map(toPublicUser),
      total: result.total,
      page,
      pageSize,
      adminCount,
    };
  }

  async update(actor: Actor, id: string, input: unknown): Promise<PublicUser> {
    authorize(actor, "user:manage");
    const data = parseInput(userUpdateSchema, input);
    const passwordHash =
      data.password !== undefined ? await hashPassword(data.password, this.saltRounds) : undefined;

    const updated = await this.store.transaction(async (tx) => {
      const user = await tx.users.findById(id);
      if (!user) {
        throw new NotFoundError("User", id);
      }
      await this.assertAvailable(tx, { username: data.username, email: data.email }, id);

      if (data.role !== undefined && data.role !== user.role) {
        if (id === actor.id) {
          throw new ValidationError("Cannot change own role");
        }
        if (user.role === "admin" && (await tx.users.countByRole("admin")) <= 1) {
          throw new ValidationError("Cannot remove last admin");
        }
      }

      const patch: UserPatch = {};
      if (data.username !== undefined) patch.username = data.username;
      if (data.email !== undefined) patch.email = data.email;
      if (data.role !== undefined) patch.role = data.role;
      if (passwordHash !== undefined) patch.passwordHash = passwordHash;

      const next = await tx.users.update(id, patch);
      if (!next) {
        throw new NotFoundError("User", id);
      }
      return next;
    });

    console.log(`[users] ${actor.username} updated ${id}`);
    return toPublicUser(updated);
  }

  async remove(actor: Actor, id: string): Promise<void> {
    authorize(actor, "user:manage");
    if (id === actor.id) {
      throw new ValidationError("Cannot delete own account");
    }

    await this.store.transaction(async (tx) => {
      const user = await tx.users.findById(id);
      if (!user) {
        throw new NotFoundError("User", id);
      }
      if (user.role === "admin" && (await tx.users.countByRole("admin")) <= 1) {
        throw new ValidationError("Cannot delete last admin");
      }
      await tx.users.delete(id);
    });
    console.log(`[users] ${actor.username} deleted ${id}`);
  }

  /**
   * Check a username-or-email and password pair. Returns null on any
   * mismatch so callers cannot tell which half was wrong.
   */
  async authenticate(input: unknown): Promise<PublicUser | null> {
    const { login, password } = parseInput(loginSchema, input);
    const user = login.includes("@")
      ? await this.store.users.findByEmail(login)
      : await this.store.users.findByUsername(login);
    if (!user || !(await comparePassword(password, user.passwordHash))) {
      return null;
    }

    const patch: UserPatch = { lastLogin: this.clock().toISOString() };
    // Upgrade hashes made under a lower cost factor while the plaintext is at hand
    if (needsRehash(user.passwordHash, this.saltRounds)) {
      patch.passwordHash = await hashPassword(password, this.saltRounds);
      console.log(`[users] re-hashed password for ${user.id}`);
    }
    const stamped = await this.store.users.update(user.id, patch);
    return toPublicUser(stamped ?? user);
  }

  /** Resolve a session's user id to the actor it stands for, if it still exists. */
  async resolveActor(id: string): Promise<Actor | null> {
    const user = await this.store.users.findById(id);
    return user ? { id: user.id, username: user.username, role: user.role } : null;
  }

  /**
   * Create the bootstrap admin when no admin exists yet.
   * @returns The created admin, or null when one already existed or its
   *   username or email is held by another account
   */
  async ensureDefaultAdmin(admin: DefaultAdmin): Promise<PublicUser | null> {
    const data = parseInput(userCreateSchema, { ...admin, role: "admin" });
    const passwordHash = await hashPassword(data.password, this.saltRounds);

    const created = await this.store.transaction(async (tx) => {
      if ((await tx.users.countByRole("admin")) > 0) {
        return null;
      }
      const taken =
        (await tx.users.findByUsername(data.username)) ?? (await tx.users.findByEmail(data.email));
      if (taken) {
        console.warn(
          `[users] no admin exists but ${taken.username} already holds the default admin's username or email; skipping seed`
        );
        return null;
      }
      return tx.users.insert({
        id: `user_${uuidv4()}`,
        username: data.username,
        email: data.email,
        passwordHash,
        role: "admin",
        createdAt: this.clock().toISOString(),
        lastLogin: null,
      });
    });

    if (created) {
      console.log(`[users] seeded default admin ${created.username}`);
    }
    return created ? toPublicUser(created) : null;
  }

  private async assertAvailable(
    store: RecordStore,
    fields: { username?: string; email?: string },
    exceptId?: string
  ): Promise<void> {
    if (fields.username !== undefined) {
      const existing = await store.users.findByUsername(fields.username);
      if (existing && existing.id !== exceptId) {
        throw new ValidationError("Username already exists", [{ path: "username", message: "Username already exists" }]);
      }
    }
    if (fields.email !== undefined) {
      const existing = await store.users.findByEmail(fields.email);
      if (existing && existing.id !== exceptId) {
        throw new ValidationError("Email already exists", [{ path: "email", message: "Email already exists" }]);
      }
    }
  }
}
