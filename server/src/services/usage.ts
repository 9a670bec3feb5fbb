// server/src/services/usage.ts
// Usage records: manual entry, listing and hard delete

import { v4 as uuidv4 } from "uuid";
import type { Actor } from "@samurai/shared/auth/types.js";
import { NotFoundError, ValidationError } from "@samurai/shared/errors.js";
import { parseInput, usageCreateSchema, usageListQuerySchema } from "@samurai/shared/schemas.js";
import type { UsageRecord } from "@samurai/shared/types.js";
import type { RecordStore } from "../store/types.js";
import { authorize } from "./access.js";

export interface RecordedUsage {
  record: UsageRecord;
  // Soft constraint breaches; the record is stored regardless
  warnings: string[];
}

export class UsageService {
  constructor(private readonly store: RecordStore, private readonly clock: () => Date = () => new Date()) {}

  /**
   * Record consumption of an asset. Standard users may only record usage
   * for themselves; the subject defaults to the actor.
   */
  async record(actor: Actor, input: unknown): Promise<RecordedUsage> {
    const data = parseInput(usageCreateSchema, input);
    const subjectId = data.subjectId ?? actor.id;
    authorize(actor, "usage:write", { subjectType: data.subjectType, subjectId });

    const asset = await this.store.assets.findById(data.assetId);
    if (!asset) {
      throw new NotFoundError("Software asset", data.assetId);
    }
    if (asset.status === "retired") {
      throw new ValidationError("Usage cannot be recorded against a retired asset", [
        { path: "assetId", message: `${asset.id} is retired` },
      ]);
    }

    const record: UsageRecord = {
      id: `usage_${uuidv4()}`,
      assetId: asset.id,
      subjectType: data.subjectType,
      subjectId,
      periodStart: data.periodStart,
      periodEnd: data.periodEnd ?? data.periodStart,
      quantity: data.quantity,
      recordedBy: actor.id,
      createdAt: this.clock().toISOString(),
    };

    const warnings: string[] = [];
    if (record.quantity > asset.seatCount) {
      warnings.push(
        `Quantity ${record.quantity} exceeds the ${asset.seatCount} licensed seat(s) of ${asset.name}`
      );
      console.warn(`[usage] seat violation on ${asset.id}: ${record.quantity} > ${asset.seatCount}`);
    }

    const saved = await this.store.usage.insert(record);
    console.log(`[usage] ${actor.username} recorded ${saved.quantity} on ${saved.assetId} for ${saved.subjectType}:${saved.subjectId}`);
    return { record: saved, warnings };
  }

  async get(actor: Actor, id: string): Promise<UsageRecord> {
    authorize(actor, "usage:read");
    const record = await this.store.usage.findById(id);
    if (!record) {
      throw new NotFoundError("Usage record", id);
    }
    return record;
  }

  // History stays queryable for retired assets
  async list(actor: Actor, query: unknown = {}): Promise<UsageRecord[]> {
    authorize(actor, "usage:read");
    const q = parseInput(usageListQuerySchema, query);
    return this.store.usage.list(q);
  }

  async remove(actor: Actor, id: string): Promise<void> {
    const record = await this.get(actor, id);
    authorize(actor, "usage:delete", record);
    await this.store.usage.delete(id);
    console.log(`[usage] ${actor.username} deleted ${id}`);
  }
}
