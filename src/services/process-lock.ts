import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { z } from "zod";
import type { ProcessLock } from "../platforms/adapter";
import { sanitizeWorkName } from "../core/normalize";
import { hasErrorCode } from "../core/errors";
import { env } from "../core/config";
import { logger } from "../core/logger";

const LockFileSchema = z.object({
  pid: z.number().int(),
  createdAt: z.number(),
});
type LockFile = z.infer<typeof LockFileSchema>;

export interface FileProcessLockOptions {
  staleSeconds?: number;
  pid?: number;
  now?: () => number;
}

export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return hasErrorCode(error, "EPERM");
  }
}

/**
 * Advisory lock backed by `<dir>/.<name>.lock`, created exclusively. A lock
 * left by a dead process, or older than the stale age, is broken on acquire.
 */
export class FileProcessLock implements ProcessLock {
  private readonly dir: string;
  private readonly staleMs: number;
  private readonly pid: number;
  private readonly now: () => number;
  private readonly held = new Set<string>();

  constructor(dir: string, options: FileProcessLockOptions = {}) {
    this.dir = resolve(dir);
    this.staleMs = (options.staleSeconds ?? env.LOCK_STALE_SECONDS) * 1000;
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? Date.now;
  }

  lockPath(name: string): string {
    return join(this.dir, `.${sanitizeWorkName(name)}.lock`);
  }

  async acquire(name: string): Promise<boolean> {
    await mkdir(this.dir, { recursive: true });
    const path = this.lockPath(name);

    if (await this.tryCreate(path)) {
      this.held.add(name);
      return true;
    }

    const existing = await this.readLock(path);
    if (existing && !this.isStale(existing)) {
      logger.debug({ name, holderPid: existing.pid }, "Lock held by another process");
      return false;
    }

    logger.warn({ name, holderPid: existing?.pid ?? null }, "Breaking stale lock");
    await unlink(path).catch((error: unknown) => {
      if (!hasErrorCode(error, "ENOENT")) throw error;
    });

    if (await this.tryCreate(path)) {
      this.held.add(name);
      return true;
    }
    return false;
  }

  async release(name: string): Promise<void> {
    if (!this.held.has(name)) return;
    this.held.delete(name);

    const path = this.lockPath(name);
    const existing = await this.readLock(path);
    if (existing && existing.pid !== this.pid) {
      logger.warn({ name, holderPid: existing.pid }, "Lock taken over by another process, leaving it");
      return;
    }

    await unlink(path).catch((error: unknown) => {
      if (!hasErrorCode(error, "ENOENT")) throw error;
    });
  }

  private async tryCreate(path: string): Promise<boolean> {
    const content: LockFile = { pid: this.pid, createdAt: this.now() };
    try {
      await writeFile(path, JSON.stringify(content), { flag: "wx" });
      return true;
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) return false;
      throw error;
    }
  }

  private async readLock(path: string): Promise<LockFile | null> {
    try {
      const parsed = LockFileSchema.safeParse(JSON.parse(await readFile(path, "utf-8")));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.debug({ error, path }, "Unreadable lock file");
      return null;
    }
  }

  private isStale(lock: LockFile): boolean {
    if (lock.pid !== this.pid && !isPidAlive(lock.pid)) return true;
    return this.now() - lock.createdAt > this.staleMs;
  }
}
