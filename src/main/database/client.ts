import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { getEngineConfig } from "../../shared/config/engine";
import { getLogger } from "../../shared/logger";
import { DETECTION_EVENTS_TABLE, IDENTITIES_TABLE, schema } from "./schema";

export type PresenceDatabase = BetterSQLite3Database<typeof schema>;

const logger = getLogger("database", "main");

let database: PresenceDatabase | null = null;
let connection: Database.Database | null = null;

const createTables = (sqlite: Database.Database): void => {
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${IDENTITIES_TABLE} (
          name TEXT PRIMARY KEY NOT NULL,
          feature_vector_json TEXT NOT NULL,
          image_path TEXT,
          registered_at INTEGER NOT NULL
        )
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${DETECTION_EVENTS_TABLE} (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          identity_label TEXT NOT NULL,
          matched_identity TEXT,
          similarity REAL NOT NULL,
          emotion TEXT NOT NULL,
          instantaneous_motion REAL NOT NULL,
          cumulative_motion REAL NOT NULL,
          is_known INTEGER NOT NULL,
          outcome TEXT NOT NULL,
          bounding_box_json TEXT NOT NULL,
          timestamp INTEGER NOT NULL
        )
      `,
    )
    .run();

  sqlite
    .prepare(
      `
        CREATE INDEX IF NOT EXISTS detection_events_identity_idx
        ON ${DETECTION_EVENTS_TABLE}(identity_label)
      `,
    )
    .run();
};

const createDatabase = (databasePath: string): PresenceDatabase => {
  if (databasePath !== ":memory:") {
    fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const sqlite = new Database(databasePath);
  if (databasePath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  createTables(sqlite);
  connection = sqlite;

  logger.info("Database opened", { databasePath });
  return drizzle(sqlite, { schema });
};

export const initializeDatabase = (
  databasePath: string = getEngineConfig().storage.databasePath,
): PresenceDatabase => {
  if (database) {
    return database;
  }
  database = createDatabase(databasePath);
  return database;
};

export const getDatabase = (): PresenceDatabase => {
  if (!database) {
    throw new Error("Database has not been initialized");
  }
  return database;
};

export const closeDatabase = (): void => {
  connection?.close();
  connection = null;
  database = null;
};
