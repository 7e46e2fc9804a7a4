import { closeKeywordDb, openKeywordDb, type KeywordDatabase } from "../client";
import type { DownloadTask, DownloadTaskStatus, Pin, RawPin, ScrapingSession, ScrapingSessionStatus } from "../../domain/models";
import { canTransition } from "../../domain/session-state-machine";
import { logger } from "../../core/logger";
import { PinsRepository } from "./pins.repo";
import { SessionsRepository } from "./sessions.repo";
import { DownloadTasksRepository, type TaskStatusUpdate } from "./download-tasks.repo";

export class KeywordRepository {
  readonly pins: PinsRepository;
  readonly sessions: SessionsRepository;
  readonly tasks: DownloadTasksRepository;

  constructor(readonly handle: KeywordDatabase) {
    this.pins = new PinsRepository(handle.db);
    this.sessions = new SessionsRepository(handle.db);
    this.tasks = new DownloadTasksRepository(handle.db);
  }

  static open(outputDir: string, keyword: string): KeywordRepository {
    return new KeywordRepository(openKeywordDb(outputDir, keyword));
  }

  get keyword(): string {
    return this.handle.keyword;
  }

  get dir(): string {
    return this.handle.dir;
  }

  get imagesDir(): string {
    return this.handle.imagesDir;
  }

  close(): void {
    closeKeywordDb(this.handle);
  }

  createSession(keyword: string, targetCount: number, outputDir: string, downloadImages: boolean): Promise<string> {
    return this.sessions.create(keyword, targetCount, outputDir, downloadImages);
  }

  getIncompleteSessions(keyword: string): Promise<ScrapingSession[]> {
    return this.sessions.listIncomplete(keyword);
  }

  getSession(sessionId: string): Promise<ScrapingSession | null> {
    return this.sessions.findById(sessionId);
  }

  listSessions(limit?: number): Promise<ScrapingSession[]> {
    return this.sessions.listRecent(limit);
  }

  async resumeSession(sessionId: string): Promise<boolean> {
    const session = await this.sessions.findById(sessionId);
    if (!session || !canTransition(session.status, "running")) {
      logger.warn({ sessionId, status: session?.status ?? null }, "Session cannot be resumed");
      return false;
    }
    await this.sessions.updateStatus(sessionId, "running", session.savedCount);
    return true;
  }

  async updateSessionStatus(
    sessionId: string,
    status: ScrapingSessionStatus,
    savedCount: number,
    stats?: Record<string, unknown>
  ): Promise<void> {
    await this.sessions.updateStatus(sessionId, status, savedCount, stats);
  }

  savePinImmediately(pin: RawPin, keyword: string, sessionId: string | null): Promise<boolean> {
    return this.pins.save(pin, keyword, sessionId);
  }

  loadPinsByQuery(keyword: string, limit?: number, offset?: number): Promise<Pin[]> {
    return this.pins.listByQuery(keyword, limit, offset);
  }

  loadPinsWithImages(keyword: string, limit: number, offset: number): Promise<Pin[]> {
    return this.pins.listWithImages(keyword, limit, offset);
  }

  countPins(keyword: string): Promise<number> {
    return this.pins.countByQuery(keyword);
  }

  listPinIds(keyword: string): Promise<string[]> {
    return this.pins.listIds(keyword);
  }

  listPinIdsWithoutImages(keyword: string): Promise<string[]> {
    return this.pins.listIdsWithoutImages(keyword);
  }

  updatePinContent(pin: Pin): Promise<void> {
    return this.pins.updateContent(pin);
  }

  collapseEncodedPinIds(): { renamed: number; merged: number } {
    const result = this.pins.collapseEncodedIds();
    if (result.renamed + result.merged > 0) {
      logger.info({ keyword: this.keyword, ...result }, "Encoded pin ids normalised");
    }
    return result;
  }

  markPinDownloaded(pinId: string, downloadPath: string): Promise<void> {
    return this.pins.markDownloaded(pinId, downloadPath);
  }

  createDownloadTask(pinId: string, imageUrl: string): Promise<number> {
    return this.tasks.create(pinId, imageUrl);
  }

  getDownloadTaskByPinAndUrl(pinId: string, imageUrl: string): Promise<DownloadTask | null> {
    return this.tasks.findByPinAndUrl(pinId, imageUrl);
  }

  async updateDownloadTaskStatus(taskId: number, status: DownloadTaskStatus, update?: TaskStatusUpdate): Promise<void> {
    this.tasks.updateStatus(taskId, status, update);
  }

  getPendingDownloadTasks(limit: number): Promise<DownloadTask[]> {
    return this.tasks.listPending(limit);
  }

  countTasksByStatus(): Promise<Record<DownloadTaskStatus, number>> {
    return this.tasks.countByStatus();
  }

  getTasksForPin(pinId: string): Promise<DownloadTask[]> {
    return this.tasks.listForPin(pinId);
  }
}
