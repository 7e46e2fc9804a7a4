import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { join, resolve } from "path";
import { logger } from "../core/logger";
import { sanitizeWorkName } from "../core/normalize";
import { runMigrations } from "./migrate";
import * as schema from "./schema";

export const DATABASE_FILENAME = "pinterest.db";
export const IMAGES_DIRNAME = "images";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface KeywordDatabase {
  keyword: string;
  workName: string;
  dir: string;
  dbPath: string;
  imagesDir: string;
  sqlite: Database.Database;
  db: AppDatabase;
}

export function keywordDir(outputDir: string, keyword: string): string {
  return join(resolve(outputDir), sanitizeWorkName(keyword));
}

/** Opens (creating and migrating when needed) the isolated partition for one keyword. */
export function openKeywordDb(outputDir: string, keyword: string): KeywordDatabase {
  const workName = sanitizeWorkName(keyword);
  const dir = join(resolve(outputDir), workName);
  const imagesDir = join(dir, IMAGES_DIRNAME);
  mkdirSync(imagesDir, { recursive: true });

  const dbPath = join(dir, DATABASE_FILENAME);
  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("foreign_keys = ON");

  try {
    runMigrations(sqlite);
  } catch (error) {
    sqlite.close();
    throw error;
  }

  logger.debug({ keyword, dbPath }, "Keyword database opened");
  return { keyword, workName, dir, dbPath, imagesDir, sqlite, db: drizzle(sqlite, { schema }) };
}

export function closeKeywordDb(handle: KeywordDatabase): void {
  if (!handle.sqlite.open) return;
  handle.sqlite.close();
  logger.debug({ keyword: handle.keyword }, "Keyword database closed");
}
