import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "fs";
import { join } from "path";
import { logger } from "../core/logger";
import { errorMessage } from "../core/errors";

export const MIGRATIONS_DIR = join(__dirname, "migrations");

const TOLERATED_ERRORS = ["already exists", "duplicate column"];

/** Applies every pending `*.sql` file in name order and returns the files applied. */
export function runMigrations(sqlite: Database.Database, migrationsDir: string = MIGRATIONS_DIR): string[] {
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, "No migrations directory found");
    return [];
  }

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS __migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedRows = sqlite.prepare("SELECT hash FROM __migrations").all();
  const appliedMigrations = new Set<string>();
  for (const row of appliedRows) {
    if (row && typeof row === "object" && "hash" in row && typeof row.hash === "string") {
      appliedMigrations.add(row.hash);
    }
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const applied: string[] = [];
  const record = sqlite.prepare("INSERT INTO __migrations (hash, created_at) VALUES (?, ?)");

  for (const file of files) {
    if (appliedMigrations.has(file)) {
      logger.trace({ file }, "Migration already applied, skipping");
      continue;
    }

    const content = readFileSync(join(migrationsDir, file), "utf-8");
    const statements = content
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const apply = sqlite.transaction(() => {
      for (const statement of statements) {
        try {
          sqlite.exec(statement);
        } catch (error) {
          const message = errorMessage(error);
          if (TOLERATED_ERRORS.some((fragment) => message.includes(fragment))) {
            logger.debug({ statement: statement.substring(0, 100) }, "Object already exists, continuing");
            continue;
          }
          logger.error({ error, statement: statement.substring(0, 200) }, "Statement failed");
          throw error;
        }
      }
      record.run(file, Date.now());
    });

    apply();
    applied.push(file);
    logger.debug({ file }, "Migration applied");
  }

  return applied;
}
