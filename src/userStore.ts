// src/userStore.ts
import type { Db } from "./db";
import { isValidSlot } from "./clock";
import { StoreFailure, ValidationFailure } from "./errors";
import {
  type LocationBinding,
  type NotifyOffset,
  type Subscriber,
  type SubscriberId,
  toNotifyOffset,
} from "./models";
import {
  DEFAULT_SUBSCRIPTIONS,
  type WasteType,
  canonicalizeWasteType,
  wasteTypeLabel,
} from "./wasteTypes";

type LocationRow = {
  id: number;
  user_id: number;
  location_id: string;
  notify_time: string;
  notify_offset: number;
  alias: string | null;
};

const LOCATION_COLUMNS =
  "id, user_id, location_id, notify_time, notify_offset, alias";

// A binding is addressed by its alias or its location code
const MATCHES_REF = "user_id = ? AND (alias = ? OR location_id = ?)";

const INSERT_USER =
  "INSERT INTO users (id) VALUES (?) ON CONFLICT(id) DO NOTHING";

const INSERT_SUBSCRIPTION = `
  INSERT INTO subscriptions (user_location_id, waste_type)
  VALUES (?, ?) ON CONFLICT DO NOTHING`;

/** Standort-IDs are short alphanumeric codes. */
export function isValidLocationCode(code: string): boolean {
  return /^[A-Za-z0-9]{1,20}$/.test(code);
}

function toBinding(row: LocationRow): LocationBinding {
  return {
    id: row.id,
    subscriberId: row.user_id,
    locationCode: row.location_id,
    alias: row.alias,
    notifyTime: row.notify_time,
    // The column defaults to 1; anything else is treated as day-before
    notifyOffset: toNotifyOffset(row.notify_offset) ?? 1,
  };
}

/**
 * Subscribers, their location bindings and per-binding waste subscriptions.
 * Lookups that find nothing return null/false/[]; only driver errors throw.
 */
export class SubscriptionStore {
  constructor(private readonly db: Db) {}

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreFailure(operation, err);
    }
  }

  createSubscriber(id: SubscriberId): void {
    this.run("create subscriber", () => {
      this.db.prepare(INSERT_USER).run(id);
    });
  }

  findSubscriber(id: SubscriberId): Subscriber | null {
    return this.run("find subscriber", () => {
      const row = this.db
        .prepare<[number], { id: number; created_at: string }>(
          "SELECT id, created_at FROM users WHERE id = ?"
        )
        .get(id);
      return row ? { id: row.id, createdAt: row.created_at } : null;
    });
  }

  /** Removes the subscriber with all locations and subscriptions. */
  deleteSubscriber(id: SubscriberId): boolean {
    return this.run("delete subscriber", () => {
      const result = this.db.prepare("DELETE FROM users WHERE id = ?").run(id);
      return result.changes > 0;
    });
  }

  /**
   * Adds a location for the subscriber, creating the subscriber on first use.
   * Re-adding an existing location only updates its alias.
   */
  upsertLocation(
    subscriberId: SubscriberId,
    locationCode: string,
    alias?: string | null
  ): number {
    if (!isValidLocationCode(locationCode)) {
      throw new ValidationFailure(`Invalid location code: ${locationCode}`);
    }
    const cleanAlias = alias?.trim() || null;

    return this.run("upsert location", () =>
      this.db.transaction(() => {
        this.db.prepare(INSERT_USER).run(subscriberId);
        const row = this.db
          .prepare<[number, string, string | null], { id: number }>(
            `INSERT INTO user_locations (user_id, location_id, alias)
             VALUES (?, ?, ?)
             ON CONFLICT(user_id, location_id)
             DO UPDATE SET alias = excluded.alias
             RETURNING id`
          )
          .get(subscriberId, locationCode, cleanAlias);
        if (!row) throw new Error("upsert returned no row");
        return row.id;
      })()
    );
  }

  listLocations(subscriberId: SubscriberId): LocationBinding[] {
    return this.run("list locations", () =>
      this.db
        .prepare<[number], LocationRow>(
          `SELECT ${LOCATION_COLUMNS} FROM user_locations
           WHERE user_id = ? ORDER BY id`
        )
        .all(subscriberId)
        .map(toBinding)
    );
  }

  findLocation(
    subscriberId: SubscriberId,
    bindingId: number
  ): LocationBinding | null {
    return this.run("find location", () => {
      const row = this.db
        .prepare<[number, number], LocationRow>(
          `SELECT ${LOCATION_COLUMNS} FROM user_locations
           WHERE user_id = ? AND id = ?`
        )
        .get(subscriberId, bindingId);
      return row ? toBinding(row) : null;
    });
  }

  /** `ref` matches either the alias or the location code. */
  deleteLocation(subscriberId: SubscriberId, ref: string): boolean {
    return this.run("delete location", () => {
      const result = this.db
        .prepare(`DELETE FROM user_locations WHERE ${MATCHES_REF}`)
        .run(subscriberId, ref, ref);
      return result.changes > 0;
    });
  }

  setNotifyTime(
    subscriberId: SubscriberId,
    ref: string,
    time: string
  ): boolean {
    if (!isValidSlot(time)) {
      throw new ValidationFailure(
        `Notification time must be HH:00, got ${time}`
      );
    }
    return this.run("set notify time", () => {
      const result = this.db
        .prepare(
          `UPDATE user_locations SET notify_time = ? WHERE ${MATCHES_REF}`
        )
        .run(time, subscriberId, ref, ref);
      return result.changes > 0;
    });
  }

  setNotifyOffset(
    subscriberId: SubscriberId,
    ref: string,
    offset: NotifyOffset
  ): boolean {
    if (toNotifyOffset(offset) === null) {
      throw new ValidationFailure(
        `Notification offset must be 0 or 1, got ${offset}`
      );
    }
    return this.run("set notify offset", () => {
      const result = this.db
        .prepare(
          `UPDATE user_locations SET notify_offset = ? WHERE ${MATCHES_REF}`
        )
        .run(offset, subscriberId, ref, ref);
      return result.changes > 0;
    });
  }

  addSubscription(bindingId: number, wasteType: WasteType): void {
    this.run("add subscription", () => {
      this.db
        .prepare(INSERT_SUBSCRIPTION)
        .run(bindingId, wasteTypeLabel(wasteType));
    });
  }

  addDefaultSubscriptions(bindingId: number): void {
    this.run("add default subscriptions", () => {
      const insert = this.db.prepare(INSERT_SUBSCRIPTION);
      this.db.transaction(() => {
        for (const wasteType of DEFAULT_SUBSCRIPTIONS) {
          insert.run(bindingId, wasteTypeLabel(wasteType));
        }
      })();
    });
  }

  removeSubscription(bindingId: number, wasteType: WasteType): boolean {
    return this.run("remove subscription", () => {
      const result = this.db
        .prepare(
          `DELETE FROM subscriptions
           WHERE user_location_id = ? AND waste_type = ?`
        )
        .run(bindingId, wasteTypeLabel(wasteType));
      return result.changes > 0;
    });
  }

  listSubscriptions(bindingId: number): WasteType[] {
    return this.run("list subscriptions", () =>
      this.db
        .prepare<[number], { waste_type: string }>(
          `SELECT waste_type FROM subscriptions
           WHERE user_location_id = ? ORDER BY rowid`
        )
        .all(bindingId)
        .map((row) => canonicalizeWasteType(row.waste_type))
    );
  }

  /** Every location code some subscriber still watches. */
  distinctLocationCodes(): string[] {
    return this.run("list location codes", () =>
      this.db
        .prepare<[], { location_id: string }>(
          "SELECT DISTINCT location_id FROM user_locations ORDER BY location_id"
        )
        .all()
        .map((row) => row.location_id)
    );
  }
}
