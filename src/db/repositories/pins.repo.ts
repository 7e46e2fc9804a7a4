import { and, eq, like, ne, not, or, isNotNull, sql } from "drizzle-orm";
import { z } from "zod";
import type { AppDatabase } from "../client";
import { downloadTasks, pins, type PinRow, type NewPinRow } from "../schema";
import {
  PinBoardSchema,
  PinCreatorSchema,
  PinSchema,
  type Pin,
  type RawPin,
} from "../../domain/models";
import { normalizePinId } from "../../core/normalize";
import { PersistenceError, errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";

function parseJsonColumn<T>(value: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  if (value === null) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(value));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback;
  }
}

const ImageUrlsColumn = z.record(z.string(), z.string());
const CategoriesColumn = z.array(z.string());
const RawDataColumn = z.record(z.string(), z.unknown());

export function rowToPin(row: PinRow): Pin {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    imageUrls: parseJsonColumn(row.imageUrlsJson, ImageUrlsColumn, {}),
    largestImageUrl: row.largestImageUrl,
    creator: parseJsonColumn(row.creatorJson, PinCreatorSchema.nullable(), null),
    board: parseJsonColumn(row.boardJson, PinBoardSchema.nullable(), null),
    categories: parseJsonColumn(row.categoriesJson, CategoriesColumn, []),
    stats: { likes: row.likes, saves: row.saves, comments: row.comments },
    url: row.url,
    sourceLink: row.sourceLink,
    downloaded: row.downloaded,
    downloadPath: row.downloadPath,
    rawData: parseJsonColumn(row.rawDataJson, RawDataColumn, {}),
  };
}

function pinToRow(pin: Pin, query: string, sessionId: string | null, now: number): NewPinRow {
  return {
    id: pin.id,
    query,
    title: pin.title,
    description: pin.description,
    imageUrlsJson: JSON.stringify(pin.imageUrls),
    largestImageUrl: pin.largestImageUrl,
    creatorJson: pin.creator ? JSON.stringify(pin.creator) : null,
    boardJson: pin.board ? JSON.stringify(pin.board) : null,
    categoriesJson: JSON.stringify(pin.categories),
    likes: pin.stats.likes,
    saves: pin.stats.saves,
    comments: pin.stats.comments,
    url: pin.url,
    sourceLink: pin.sourceLink,
    downloaded: pin.downloaded,
    downloadPath: pin.downloadPath,
    rawDataJson: JSON.stringify(pin.rawData),
    sessionId,
    createdAt: now,
    updatedAt: now,
  };
}

const hasImage = or(
  and(isNotNull(pins.largestImageUrl), ne(pins.largestImageUrl, "")),
  ne(pins.imageUrlsJson, "{}")
);

export class PinsRepository {
  constructor(private db: AppDatabase) {}

  /** An existing id only refreshes the engagement counters. */
  async save(raw: RawPin, query: string, sessionId: string | null): Promise<boolean> {
    const parsed = PinSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug({ issues: parsed.error.issues.length }, "Pin failed validation, skipped");
      return false;
    }

    const pin = parsed.data;
    const now = Math.floor(Date.now() / 1000);

    try {
      const inserted = await this.db
        .insert(pins)
        .values(pinToRow(pin, query, sessionId, now))
        .onConflictDoNothing()
        .returning({ id: pins.id });

      if (inserted.length > 0) return true;

      await this.db
        .update(pins)
        .set({ likes: pin.stats.likes, saves: pin.stats.saves, comments: pin.stats.comments, updatedAt: now })
        .where(eq(pins.id, pin.id));
      return false;
    } catch (error) {
      throw new PersistenceError(`Failed to save pin ${pin.id}: ${errorMessage(error)}`, "PIN_WRITE_FAILED");
    }
  }

  async findById(id: string): Promise<Pin | null> {
    const [row] = await this.db.select().from(pins).where(eq(pins.id, id)).limit(1);
    return row ? rowToPin(row) : null;
  }

  async listByQuery(query: string, limit?: number, offset = 0): Promise<Pin[]> {
    const rows = await this.db
      .select()
      .from(pins)
      .where(eq(pins.query, query))
      .orderBy(sql`rowid`)
      .limit(limit ?? -1)
      .offset(offset);
    return rows.map(rowToPin);
  }

  async listWithImages(query: string, limit: number, offset: number): Promise<Pin[]> {
    const rows = await this.db
      .select()
      .from(pins)
      .where(and(eq(pins.query, query), hasImage))
      .orderBy(sql`rowid`)
      .limit(limit)
      .offset(offset);
    return rows.map(rowToPin);
  }

  async countByQuery(query: string): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(pins)
      .where(eq(pins.query, query));
    return row?.count ?? 0;
  }

  async listQueries(): Promise<string[]> {
    const rows = await this.db.selectDistinct({ query: pins.query }).from(pins).orderBy(pins.query);
    return rows.map((r) => r.query);
  }

  async listIds(query: string): Promise<string[]> {
    const rows = await this.db.select({ id: pins.id }).from(pins).where(eq(pins.query, query));
    return rows.map((r) => r.id);
  }

  async listIdsWithoutImages(query: string): Promise<string[]> {
    const rows = await this.db
      .select({ id: pins.id })
      .from(pins)
      .where(and(eq(pins.query, query), not(hasImage)))
      .orderBy(sql`rowid`);
    return rows.map((r) => r.id);
  }

  async updateContent(pin: Pin): Promise<void> {
    await this.db
      .update(pins)
      .set({
        title: pin.title,
        description: pin.description,
        imageUrlsJson: JSON.stringify(pin.imageUrls),
        largestImageUrl: pin.largestImageUrl,
        creatorJson: pin.creator ? JSON.stringify(pin.creator) : null,
        boardJson: pin.board ? JSON.stringify(pin.board) : null,
        likes: pin.stats.likes,
        saves: pin.stats.saves,
        comments: pin.stats.comments,
        rawDataJson: JSON.stringify(pin.rawData),
        updatedAt: Math.floor(Date.now() / 1000),
      })
      .where(eq(pins.id, pin.id));
  }

  /**
   * Rows stored under a base64 `Pin:<n>` id move to the numeric id. When the
   * numeric row already exists the encoded row and its tasks are dropped.
   */
  collapseEncodedIds(): { renamed: number; merged: number } {
    const result = { renamed: 0, merged: 0 };
    const rows = this.db.select().from(pins).where(like(pins.id, "UGlu%")).all();

    for (const row of rows) {
      const numericId = normalizePinId(row.id);
      if (numericId === row.id) continue;

      this.db.transaction((tx) => {
        const [existing] = tx.select({ id: pins.id }).from(pins).where(eq(pins.id, numericId)).limit(1).all();
        if (existing) {
          tx.delete(downloadTasks).where(eq(downloadTasks.pinId, row.id)).run();
          tx.delete(pins).where(eq(pins.id, row.id)).run();
          result.merged++;
          return;
        }

        tx.insert(pins).values({ ...row, id: numericId }).run();
        tx.update(downloadTasks).set({ pinId: numericId }).where(eq(downloadTasks.pinId, row.id)).run();
        tx.delete(pins).where(eq(pins.id, row.id)).run();
        result.renamed++;
      });
    }

    return result;
  }

  async markDownloaded(id: string, downloadPath: string): Promise<void> {
    await this.db
      .update(pins)
      .set({ downloaded: true, downloadPath, updatedAt: Math.floor(Date.now() / 1000) })
      .where(eq(pins.id, id));
  }
}
