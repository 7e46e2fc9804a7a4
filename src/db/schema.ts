import { sqliteTable, text, integer, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const pins = sqliteTable(
  "pins",
  {
    id: text("id").primaryKey(),
    query: text("query").notNull(),
    title: text("title"),
    description: text("description"),
    imageUrlsJson: text("image_urls_json").notNull().default("{}"),
    largestImageUrl: text("largest_image_url"),
    creatorJson: text("creator_json"),
    boardJson: text("board_json"),
    categoriesJson: text("categories_json").notNull().default("[]"),
    likes: integer("likes").notNull().default(0),
    saves: integer("saves").notNull().default(0),
    comments: integer("comments").notNull().default(0),
    url: text("url"),
    sourceLink: text("source_link"),
    downloaded: integer("downloaded", { mode: "boolean" }).notNull().default(false),
    downloadPath: text("download_path"),
    rawDataJson: text("raw_data_json").notNull().default("{}"),
    sessionId: text("session_id"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => ({
    queryCreatedIdx: index("pins_query_created_idx").on(table.query, table.createdAt),
    downloadedIdx: index("pins_downloaded_idx").on(table.downloaded),
  })
);

export const scrapingSessions = sqliteTable(
  "scraping_sessions",
  {
    id: text("id").primaryKey(),
    query: text("query").notNull(),
    targetCount: integer("target_count").notNull(),
    savedCount: integer("saved_count").notNull().default(0),
    outputDir: text("output_dir").notNull(),
    downloadImages: integer("download_images", { mode: "boolean" }).notNull().default(true),
    status: text("status", {
      enum: ["running", "completed", "interrupted", "failed"],
    }).notNull().default("running"),
    statsJson: text("stats_json"),
    startedAt: integer("started_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
    completedAt: integer("completed_at"),
  },
  (table) => ({
    queryStartedIdx: index("scraping_sessions_query_started_idx").on(table.query, sql`started_at DESC`),
    statusIdx: index("scraping_sessions_status_idx").on(table.status),
  })
);

export const downloadTasks = sqliteTable(
  "download_tasks",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    pinId: text("pin_id").notNull().references(() => pins.id),
    imageUrl: text("image_url").notNull(),
    status: text("status", {
      enum: ["pending", "downloading", "completed", "failed"],
    }).notNull().default("pending"),
    localPath: text("local_path"),
    fileSize: integer("file_size"),
    retryCount: integer("retry_count").notNull().default(0),
    errorMessage: text("error_message"),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => ({
    pinUrlIdx: uniqueIndex("download_tasks_pin_url_idx").on(table.pinId, table.imageUrl),
    statusCreatedIdx: index("download_tasks_status_created_idx").on(table.status, table.createdAt),
  })
);

export type PinRow = typeof pins.$inferSelect;
export type NewPinRow = typeof pins.$inferInsert;
export type ScrapingSessionRow = typeof scrapingSessions.$inferSelect;
export type NewScrapingSessionRow = typeof scrapingSessions.$inferInsert;
export type DownloadTaskRow = typeof downloadTasks.$inferSelect;
export type NewDownloadTaskRow = typeof downloadTasks.$inferInsert;
