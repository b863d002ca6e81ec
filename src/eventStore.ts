// src/eventStore.ts
import type { Db } from "./db";
import { type Clock, localDate } from "./clock";
import { StoreFailure } from "./errors";
import type { PickupEvent, StoredPickupEvent } from "./models";
import { canonicalizeWasteType, wasteTypeLabel } from "./wasteTypes";

export const DEFAULT_INSERT_CHUNK_SIZE = 250;

// SQLite binds at most 32766 variables per statement; each row takes three
export const MAX_INSERT_CHUNK_SIZE = Math.floor(32766 / 3);

export interface EventStoreOptions {
  clock: Clock;
  /** Rows per INSERT statement, capped at MAX_INSERT_CHUNK_SIZE. */
  insertChunkSize?: number;
}

type EventRow = { location_id: string; date: string; waste_type: string };

type InsertRow = [locationCode: string, date: string, wasteType: string];

export class EventStore {
  private readonly clock: Clock;
  private readonly chunkSize: number;

  constructor(private readonly db: Db, options: EventStoreOptions) {
    this.clock = options.clock;
    const requested = Math.floor(
      options.insertChunkSize ?? DEFAULT_INSERT_CHUNK_SIZE
    );
    this.chunkSize = Math.min(MAX_INSERT_CHUNK_SIZE, Math.max(1, requested));
  }

  /**
   * Replaces every event of `locationCode` dated today or later with
   * `events`. Past events are never touched and stale input is dropped.
   * Runs as one transaction: on failure nothing changes.
   */
  sync(locationCode: string, events: readonly PickupEvent[]): void {
    const today = localDate(this.clock);

    const rows: InsertRow[] = [];
    const seen = new Set<string>();
    for (const event of events) {
      if (event.date < today) continue;
      const label = wasteTypeLabel(event.wasteType);
      const key = `${event.date}|${label}`;
      if (seen.has(key)) continue;
      seen.add(key);
      rows.push([locationCode, event.date, label]);
    }

    const replace = this.db.transaction((batch: InsertRow[]) => {
      this.db
        .prepare(
          "DELETE FROM pickup_events WHERE location_id = ? AND date >= ?"
        )
        .run(locationCode, today);

      for (let i = 0; i < batch.length; i += this.chunkSize) {
        const chunk = batch.slice(i, i + this.chunkSize);
        const placeholders = chunk.map(() => "(?, ?, ?)").join(", ");
        this.db
          .prepare(
            `INSERT INTO pickup_events (location_id, date, waste_type)
             VALUES ${placeholders}`
          )
          .run(...chunk.flat());
      }
    });

    try {
      replace(rows);
    } catch (err) {
      throw new StoreFailure(`sync events for ${locationCode}`, err);
    }
  }

  listEvents(locationCode: string, fromDate?: string): StoredPickupEvent[] {
    try {
      const rows = this.db
        .prepare<[string, string], EventRow>(
          `SELECT location_id, date, waste_type FROM pickup_events
           WHERE location_id = ? AND date >= ?
           ORDER BY date, waste_type`
        )
        .all(locationCode, fromDate ?? "");
      return rows.map((row) => ({
        locationCode: row.location_id,
        date: row.date,
        wasteType: canonicalizeWasteType(row.waste_type),
      }));
    } catch (err) {
      throw new StoreFailure(`list events for ${locationCode}`, err);
    }
  }

  countEvents(locationCode: string): number {
    try {
      const row = this.db
        .prepare<[string], { n: number }>(
          "SELECT COUNT(*) AS n FROM pickup_events WHERE location_id = ?"
        )
        .get(locationCode);
      return row?.n ?? 0;
    } catch (err) {
      throw new StoreFailure(`count events for ${locationCode}`, err);
    }
  }
}
