import { and, desc, eq, inArray, sql } from "drizzle-orm";
import { randomUUID } from "crypto";
import type { AppDatabase } from "../client";
import { scrapingSessions, type ScrapingSessionRow } from "../schema";
import type { ScrapingSession, ScrapingSessionStatus } from "../../domain/models";
import { RESUMABLE_STATUSES, validateTransition } from "../../domain/session-state-machine";
import { logger } from "../../core/logger";

function parseStats(value: string | null): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    logger.debug({ error }, "Unreadable session stats, ignoring");
  }
  return {};
}

function rowToSession(row: ScrapingSessionRow): ScrapingSession {
  return {
    id: row.id,
    keyword: row.query,
    targetCount: row.targetCount,
    savedCount: row.savedCount,
    outputDir: row.outputDir,
    downloadImages: row.downloadImages,
    status: row.status,
    stats: parseStats(row.statsJson),
    startedAt: row.startedAt,
    updatedAt: row.updatedAt,
    completedAt: row.completedAt,
  };
}

export class SessionsRepository {
  constructor(private db: AppDatabase) {}

  async create(keyword: string, targetCount: number, outputDir: string, downloadImages: boolean): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    const id = randomUUID();
    await this.db.insert(scrapingSessions).values({
      id,
      query: keyword,
      targetCount,
      savedCount: 0,
      outputDir,
      downloadImages,
      status: "running",
      startedAt: now,
      updatedAt: now,
    });
    logger.info({ sessionId: id, keyword, targetCount }, "Scraping session created");
    return id;
  }

  async findById(id: string): Promise<ScrapingSession | null> {
    const [row] = await this.db.select().from(scrapingSessions).where(eq(scrapingSessions.id, id)).limit(1);
    return row ? rowToSession(row) : null;
  }

  async listIncomplete(keyword: string): Promise<ScrapingSession[]> {
    const rows = await this.db
      .select()
      .from(scrapingSessions)
      .where(and(eq(scrapingSessions.query, keyword), inArray(scrapingSessions.status, [...RESUMABLE_STATUSES])))
      .orderBy(desc(scrapingSessions.startedAt), sql`rowid DESC`);
    return rows.map(rowToSession);
  }

  async listRecent(limit: number = 20): Promise<ScrapingSession[]> {
    const rows = await this.db
      .select()
      .from(scrapingSessions)
      .orderBy(desc(scrapingSessions.startedAt), sql`rowid DESC`)
      .limit(limit);
    return rows.map(rowToSession);
  }

  async updateStatus(
    id: string,
    status: ScrapingSessionStatus,
    savedCount: number,
    stats?: Record<string, unknown>
  ): Promise<ScrapingSession | null> {
    const current = await this.findById(id);
    if (!current) {
      logger.warn({ sessionId: id, status }, "Session not found for status update");
      return null;
    }

    validateTransition(current.status, status);

    const now = Math.floor(Date.now() / 1000);
    const [row] = await this.db
      .update(scrapingSessions)
      .set({
        status,
        savedCount,
        updatedAt: now,
        completedAt: status === "completed" || status === "failed" ? now : null,
        ...(stats ? { statsJson: JSON.stringify(stats) } : {}),
      })
      .where(eq(scrapingSessions.id, id))
      .returning();

    logger.debug({ sessionId: id, from: current.status, to: status, savedCount }, "Session status updated");
    return row ? rowToSession(row) : null;
  }
}
