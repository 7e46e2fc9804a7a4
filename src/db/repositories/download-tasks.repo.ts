import { and, asc, eq, sql } from "drizzle-orm";
import type { AppDatabase } from "../client";
import { downloadTasks, pins, type DownloadTaskRow } from "../schema";
import type { DownloadTask, DownloadTaskStatus } from "../../domain/models";
import { PersistenceError } from "../../core/errors";

export interface TaskStatusUpdate {
  localPath?: string | null;
  fileSize?: number | null;
  errorMessage?: string | null;
}

function rowToTask(row: DownloadTaskRow): DownloadTask {
  return {
    id: row.id,
    pinId: row.pinId,
    imageUrl: row.imageUrl,
    status: row.status,
    localPath: row.localPath,
    fileSize: row.fileSize,
    retryCount: row.retryCount,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DownloadTasksRepository {
  constructor(private db: AppDatabase) {}

  async create(pinId: string, imageUrl: string): Promise<number> {
    const now = Math.floor(Date.now() / 1000);
    const [inserted] = await this.db
      .insert(downloadTasks)
      .values({ pinId, imageUrl, status: "pending", createdAt: now, updatedAt: now })
      .onConflictDoNothing()
      .returning({ id: downloadTasks.id });
    if (inserted) return inserted.id;

    const existing = await this.findByPinAndUrl(pinId, imageUrl);
    if (!existing) {
      throw new PersistenceError(`Failed to create download task for pin ${pinId}`, "TASK_WRITE_FAILED");
    }
    return existing.id;
  }

  async findById(id: number): Promise<DownloadTask | null> {
    const [row] = await this.db.select().from(downloadTasks).where(eq(downloadTasks.id, id)).limit(1);
    return row ? rowToTask(row) : null;
  }

  async findByPinAndUrl(pinId: string, imageUrl: string): Promise<DownloadTask | null> {
    const [row] = await this.db
      .select()
      .from(downloadTasks)
      .where(and(eq(downloadTasks.pinId, pinId), eq(downloadTasks.imageUrl, imageUrl)))
      .limit(1);
    return row ? rowToTask(row) : null;
  }

  async listForPin(pinId: string): Promise<DownloadTask[]> {
    const rows = await this.db
      .select()
      .from(downloadTasks)
      .where(eq(downloadTasks.pinId, pinId))
      .orderBy(asc(downloadTasks.id));
    return rows.map(rowToTask);
  }

  async listPending(limit: number): Promise<DownloadTask[]> {
    const rows = await this.db
      .select()
      .from(downloadTasks)
      .where(eq(downloadTasks.status, "pending"))
      .orderBy(asc(downloadTasks.createdAt), asc(downloadTasks.id))
      .limit(limit);
    return rows.map(rowToTask);
  }

  async countByStatus(): Promise<Record<DownloadTaskStatus, number>> {
    const rows = await this.db
      .select({ status: downloadTasks.status, count: sql<number>`count(*)` })
      .from(downloadTasks)
      .groupBy(downloadTasks.status);

    const counts: Record<DownloadTaskStatus, number> = { pending: 0, downloading: 0, completed: 0, failed: 0 };
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  /**
   * Writes status, path and size in one statement. Completion also flags the
   * owning pin as downloaded inside the same transaction, so no reader sees a
   * completed task without its file path.
   */
  updateStatus(id: number, status: DownloadTaskStatus, update: TaskStatusUpdate = {}): void {
    if (status === "completed" && !update.localPath) {
      throw new PersistenceError(`Task ${id} cannot complete without a local path`, "TASK_COMPLETED_WITHOUT_PATH");
    }

    const now = Math.floor(Date.now() / 1000);
    const values = {
      status,
      updatedAt: now,
      localPath: status === "completed" ? update.localPath ?? null : null,
      fileSize: status === "completed" ? update.fileSize ?? null : null,
      errorMessage: status === "failed" ? update.errorMessage ?? null : null,
      ...(status === "failed" ? { retryCount: sql`${downloadTasks.retryCount} + 1` } : {}),
    };

    this.db.transaction((tx) => {
      const updated = tx
        .update(downloadTasks)
        .set(values)
        .where(eq(downloadTasks.id, id))
        .returning({ pinId: downloadTasks.pinId })
        .all();

      const row = updated[0];
      if (!row) {
        throw new PersistenceError(`Download task ${id} not found`, "TASK_NOT_FOUND");
      }

      if (status === "completed" && update.localPath) {
        tx.update(pins)
          .set({ downloaded: true, downloadPath: update.localPath, updatedAt: now })
          .where(eq(pins.id, row.pinId))
          .run();
      }
    });
  }
}
