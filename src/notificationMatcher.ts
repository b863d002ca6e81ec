// src/notificationMatcher.ts
import type { Db } from "./db";
import { StoreFailure } from "./errors";
import { type NotificationTask, toNotifyOffset } from "./models";
import { canonicalizeWasteType } from "./wasteTypes";

type DueRow = {
  chat_id: number;
  waste_type: string;
  alias: string | null;
  location_id: string;
  notify_offset: number;
};

// Offset 0 targets `today`, offset 1 targets `tomorrow`; a binding has one
// offset, so it can only ever match one of the two dates in a tick.
const DUE_SQL = `
  SELECT u.id AS chat_id, s.waste_type, ul.alias, ul.location_id,
         ul.notify_offset
  FROM users u
  JOIN user_locations ul ON u.id = ul.user_id
  JOIN subscriptions s ON ul.id = s.user_location_id
  JOIN pickup_events e
    ON ul.location_id = e.location_id AND s.waste_type = e.waste_type
  WHERE ul.notify_time = ?
    AND (
         (ul.notify_offset = 0 AND e.date = ?)
      OR (ul.notify_offset = 1 AND e.date = ?)
    )
`;

/**
 * Everything due at `slotTime` ("HH:00"). Read-only; result order is not
 * meaningful.
 */
export function dueNotifications(
  db: Db,
  slotTime: string,
  today: string,
  tomorrow: string
): NotificationTask[] {
  let rows: DueRow[];
  try {
    rows = db
      .prepare<[string, string, string], DueRow>(DUE_SQL)
      .all(slotTime, today, tomorrow);
  } catch (err) {
    throw new StoreFailure(`match notifications for ${slotTime}`, err);
  }

  return rows.map((row) => ({
    subscriberId: row.chat_id,
    wasteType: canonicalizeWasteType(row.waste_type),
    locationCode: row.location_id,
    locationLabel: row.alias ?? row.location_id,
    offset: toNotifyOffset(row.notify_offset) ?? 1,
  }));
}
