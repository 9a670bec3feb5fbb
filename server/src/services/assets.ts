// server/src/services/assets.ts
// Software asset records: validation, uniqueness, versioned updates, retirement

import { v4 as uuidv4 } from "uuid";
import type { Actor } from "@samurai/shared/auth/types.js";
import { todayIso } from "@samurai/shared/dates.js";
import { ConflictError, NotFoundError, ValidationError } from "@samurai/shared/errors.js";
import {
  assetCreateSchema,
  assetInvariantIssues,
  assetListQuerySchema,
  assetUpdateSchema,
  parseInput,
} from "@samurai/shared/schemas.js";
import type { SoftwareAsset } from "@samurai/shared/types.js";
import type { AssetFilter, AssetPatch, RecordStore } from "../store/types.js";
import { authorize } from "./access.js";

// Retries for an update without an expected version that loses a race
const MAX_WRITE_ATTEMPTS = 3;

export class AssetService {
  constructor(private readonly store: RecordStore, private readonly clock: () => Date = () => new Date()) {}

  async create(actor: Actor, input: unknown): Promise<SoftwareAsset> {
    authorize(actor, "asset:write");
    const data = parseInput(assetCreateSchema, input);

    await this.assertUniqueName(data.name, data.vendor);

    const now = this.clock().toISOString();
    const asset: SoftwareAsset = {
      id: `asset_${uuidv4()}`,
      name: data.name,
      vendor: data.vendor,
      description: data.description,
      licenseType: data.licenseType,
      seatCount: data.seatCount,
      costPerPeriod: data.costPerPeriod,
      billingPeriod: data.billingPeriod,
      renewalDate: data.renewalDate,
      status: "active",
      version: 1,
      createdAt: now,
      updatedAt: now,
    };

    const saved = await this.store.assets.insert(asset);
    console.log(`[assets] ${actor.username} created ${saved.id} (${saved.vendor} ${saved.name})`);
    return saved;
  }

  async get(actor: Actor, id: string): Promise<SoftwareAsset> {
    authorize(actor, "asset:read");
    const asset = await this.store.assets.findById(id);
    if (!asset) {
      throw new NotFoundError("Software asset", id);
    }
    return asset;
  }

  /**
   * List assets. Retired assets are left out unless the query asks for the
   * retired status explicitly.
   */
  async list(actor: Actor, query: unknown = {}): Promise<SoftwareAsset[]> {
    authorize(actor, "asset:read");
    const q = parseInput(assetListQuerySchema, query);
    const filter: AssetFilter = {
      vendor: q.vendor,
      status: q.status ?? ["active", "expired"],
      licenseType: q.licenseType,
      renewalFrom: q.renewalFrom,
      renewalTo: q.renewalTo,
      search: q.q,
    };
    return this.store.assets.list(filter);
  }

  /**
   * Apply a partial update. When the input carries `version` and the stored
   * version has moved past it, fail with ConflictError; without it the last
   * writer wins.
   */
  async update(actor: Actor, id: string, input: unknown): Promise<SoftwareAsset> {
    authorize(actor, "asset:write");
    const { version: expectedVersion, ...patch } = parseInput(assetUpdateSchema, input);

    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const current = await this.get(actor, id);
      if (current.status === "retired") {
        throw new ValidationError("Retired assets cannot be modified");
      }
      if (expectedVersion !== undefined && expectedVersion !== current.version) {
        throw new ConflictError(
          `Asset ${id} was modified by someone else (version ${current.version}, expected ${expectedVersion})`,
          current.version
        );
      }

      const merged = { ...current, ...patch };
      const issues = assetInvariantIssues(merged);
      if (issues.length > 0) {
        throw new ValidationError(issues[0].message, issues);
      }
      if (patch.name !== undefined || patch.vendor !== undefined) {
        await this.assertUniqueName(merged.name, merged.vendor, id);
      }

      const updated = await this.store.assets.update(id, patch, current.version);
      if (updated) {
        console.log(`[assets] ${actor.username} updated ${id} to version ${updated.version}`);
        return updated;
      }
      if (expectedVersion !== undefined) {
        const latest = await this.store.assets.findById(id);
        throw new ConflictError(`Asset ${id} was modified by someone else`, latest?.version);
      }
      console.warn(`[assets] concurrent write on ${id}, retrying (attempt ${attempt})`);
    }

    throw new ConflictError(`Asset ${id} is being modified concurrently; try again`);
  }

  /**
   * Logical delete: the asset becomes `retired`, drops out of default
   * listings and reports, and keeps its usage history.
   */
  async retire(actor: Actor, id: string, expectedVersion?: number): Promise<SoftwareAsset> {
    authorize(actor, "asset:delete");
    const current = await this.get(actor, id);
    if (current.status === "retired") {
      return current;
    }
    if (expectedVersion !== undefined && expectedVersion !== current.version) {
      throw new ConflictError(`Asset ${id} was modified by someone else`, current.version);
    }

    const retired = await this.store.assets.update(id, { status: "retired" }, current.version);
    if (!retired) {
      const latest = await this.store.assets.findById(id);
      throw new ConflictError(`Asset ${id} was modified by someone else`, latest?.version);
    }
    console.log(`[assets] ${actor.username} retired ${id}`);
    return retired;
  }

  /**
   * Mark active assets whose renewal date has passed as `expired`.
   * @returns The assets changed by this call
   */
  async expireLapsed(actor: Actor, asOf: string = todayIso(this.clock())): Promise<SoftwareAsset[]> {
    authorize(actor, "asset:write");
    const lapsed = (await this.store.assets.list({ status: "active" })).filter(
      (a) => a.renewalDate !== null && a.renewalDate < asOf
    );

    const expired: SoftwareAsset[] = [];
    for (const asset of lapsed) {
      const patch: AssetPatch = { status: "expired" };
      const updated = await this.store.assets.update(asset.id, patch, asset.version);
      if (updated) {
        expired.push(updated);
      } else {
        console.warn(`[assets] skipped expiring ${asset.id}: modified concurrently`);
      }
    }
    if (expired.length > 0) {
      console.log(`[assets] marked ${expired.length} lapsed asset(s) expired as of ${asOf}`);
    }
    return expired;
  }

  private async assertUniqueName(name: string, vendor: string, exceptId?: string): Promise<void> {
    const clashes = (await this.store.assets.findByNameAndVendor(name, vendor)).filter(
      (a) => a.status !== "retired" && a.id !== exceptId
    );
    if (clashes.length > 0) {
      throw new ValidationError("Software already exists", [
        { path: "name", message: `${vendor} ${name} is already tracked as ${clashes[0].id}` },
      ]);
    }
  }
}
