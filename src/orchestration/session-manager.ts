import type { KeywordRepository } from "../db/repositories/keyword.repo";
import type { ScrapingSession } from "../domain/models";
import { SessionMismatchError } from "../core/errors";
import { logger } from "../core/logger";

export type SessionAction = "cached" | "resumed" | "created";

export interface SessionStart {
  /** Null when the cache already satisfied the request and no session was open. */
  sessionId: string | null;
  action: SessionAction;
  cachedCount: number;
  remaining: number;
}

function checkResumable(session: ScrapingSession, keyword: string, targetCount: number): void {
  if (session.keyword !== keyword) {
    throw new SessionMismatchError(
      `Session ${session.id} was started for "${session.keyword}", not "${keyword}"`,
      session.id
    );
  }
  if (session.targetCount !== targetCount) {
    throw new SessionMismatchError(
      `Session ${session.id} targets ${session.targetCount} records, request wants ${targetCount}`,
      session.id
    );
  }
}

export class SessionManager {
  constructor(
    private repo: KeywordRepository,
    private outputDir: string,
    private downloadImages: boolean
  ) {}

  async startOrResume(keyword: string, targetCount: number): Promise<SessionStart> {
    const cachedCount = await this.repo.countPins(keyword);
    const incomplete = await this.repo.getIncompleteSessions(keyword);

    if (cachedCount >= targetCount) {
      const open = incomplete[0];
      if (open) {
        await this.repo.updateSessionStatus(open.id, "completed", cachedCount);
      }
      await this.failSuperseded(incomplete.slice(1), "superseded by cache");
      logger.info({ keyword, cachedCount, targetCount }, "Cached pins satisfy request, skipping acquisition");
      return { sessionId: open?.id ?? null, action: "cached", cachedCount, remaining: 0 };
    }

    const [latest, ...older] = incomplete;
    await this.failSuperseded(older, "superseded by newer session");

    if (latest) {
      try {
        checkResumable(latest, keyword, targetCount);
        if (await this.repo.resumeSession(latest.id)) {
          const remaining = targetCount - cachedCount;
          logger.info(
            { sessionId: latest.id, keyword, cachedCount, targetCount, remaining },
            "Resuming scraping session"
          );
          return { sessionId: latest.id, action: "resumed", cachedCount, remaining };
        }
      } catch (error) {
        if (!(error instanceof SessionMismatchError)) throw error;
        logger.warn({ sessionId: error.sessionId, reason: error.message }, "Discarding mismatched session");
        await this.repo.updateSessionStatus(latest.id, "failed", latest.savedCount);
      }
    }

    const sessionId = await this.repo.createSession(keyword, targetCount, this.outputDir, this.downloadImages);
    return { sessionId, action: "created", cachedCount, remaining: targetCount - cachedCount };
  }

  /** Stored pin count; session counts never use in-memory totals. */
  durableCount(keyword: string): Promise<number> {
    return this.repo.countPins(keyword);
  }

  async complete(sessionId: string | null, keyword: string, stats?: Record<string, unknown>): Promise<number> {
    return this.finish(sessionId, keyword, "completed", stats);
  }

  async interrupt(sessionId: string | null, keyword: string, stats?: Record<string, unknown>): Promise<number> {
    return this.finish(sessionId, keyword, "interrupted", stats);
  }

  async fail(sessionId: string | null, keyword: string, stats?: Record<string, unknown>): Promise<number> {
    return this.finish(sessionId, keyword, "failed", stats);
  }

  private async finish(
    sessionId: string | null,
    keyword: string,
    status: "completed" | "interrupted" | "failed",
    stats?: Record<string, unknown>
  ): Promise<number> {
    const savedCount = await this.durableCount(keyword);
    if (sessionId) {
      await this.repo.updateSessionStatus(sessionId, status, savedCount, stats);
      logger.info({ sessionId, status, savedCount }, "Scraping session finished");
    }
    return savedCount;
  }

  private async failSuperseded(sessions: ScrapingSession[], reason: string): Promise<void> {
    for (const session of sessions) {
      logger.warn({ sessionId: session.id, status: session.status, reason }, "Closing stale session");
      await this.repo.updateSessionStatus(session.id, "failed", session.savedCount);
    }
  }
}
