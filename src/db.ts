// src/db.ts
import Database from "better-sqlite3";

import { childLogger } from "./logger";

const log = childLogger("db");

export type Db = Database.Database;

/**
 * Opens the SQLite file in WAL mode. Foreign keys must be on for the
 * subscriber -> location -> subscription cascade.
 */
export function openDatabase(filename: string): Db {
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("foreign_keys = ON");
  createSchema(db);
  return db;
}

export function createSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS user_locations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      location_id TEXT NOT NULL,
      notify_time TEXT NOT NULL DEFAULT '18:00',
      notify_offset INTEGER NOT NULL DEFAULT 1,
      alias TEXT,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
      UNIQUE(user_id, location_id)
    );
  `);

  // Databases created before day-before reminders existed lack notify_offset
  const columns = db
    .prepare<[], { name: string }>("PRAGMA table_info(user_locations)")
    .all();
  if (!columns.some((c) => c.name === "notify_offset")) {
    db.exec(`
      ALTER TABLE user_locations
      ADD COLUMN notify_offset INTEGER NOT NULL DEFAULT 1`);
    log.info("added notify_offset column to user_locations");
  }

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_user_locations_user_id
      ON user_locations(user_id);
    CREATE INDEX IF NOT EXISTS idx_user_locations_notify_time
      ON user_locations(notify_time);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS subscriptions (
      user_location_id INTEGER NOT NULL,
      waste_type TEXT NOT NULL,
      PRIMARY KEY (user_location_id, waste_type),
      FOREIGN KEY (user_location_id)
        REFERENCES user_locations(id) ON DELETE CASCADE
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS pickup_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      location_id TEXT NOT NULL,
      date TEXT NOT NULL,
      waste_type TEXT NOT NULL,
      UNIQUE(location_id, date, waste_type)
    );
    CREATE INDEX IF NOT EXISTS idx_pickup_events_date ON pickup_events(date);
  `);
}
