import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { unlink, writeFile } from "fs/promises";
import { join } from "path";
import { KeywordRepository } from "../../../../src/db/repositories/keyword.repo";
import { DownloadScheduler, expectedImagePath, type ScheduledTask } from "../../../../src/orchestration/download/download-scheduler";
import { BoundedQueue } from "../../../../src/orchestration/download/work-queue";
import { imageUrlFor, jpegBytes, makePin, makeTempDir, removeDir } from "../../../support/fakes";

describe("DownloadScheduler", () => {
  let outputDir: string;
  let repo: KeywordRepository;
  let scheduler: DownloadScheduler;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    repo = KeywordRepository.open(outputDir, "cat");
    scheduler = new DownloadScheduler(repo, { pageSize: 2, minFileBytes: 16 });
  });

  afterEach(async () => {
    repo.close();
    await removeDir(outputDir);
  });

  async function drain(queue: BoundedQueue<ScheduledTask>): Promise<ScheduledTask[]> {
    const items: ScheduledTask[] = [];
    for (;;) {
      const next = await queue.take(10);
      if (next.kind !== "item") return items;
      items.push(next.item);
    }
  }

  it("should name files after the pin id and the URL extension", () => {
    expect(expectedImagePath("/out/cat/images", "p1", "https://img.test/p1.png")).toBe(join("/out/cat/images", "p1.png"));
    expect(expectedImagePath("/out/cat/images", "a/b", "https://img.test/x")).toBe(join("/out/cat/images", "a_b.jpg"));
  });

  it("should queue one task per pin whose file is missing", async () => {
    for (const id of ["p1", "p2", "p3"]) await repo.savePinImmediately(makePin(id), "cat", null);
    await repo.savePinImmediately({ id: "bare" }, "cat", null);
    const queue = new BoundedQueue<ScheduledTask>(10);

    const stats = await scheduler.produce(queue);
    const tasks = await drain(queue);

    expect(stats).toEqual({ scanned: 3, present: 0, queued: 3, healed: 0, noCandidates: 0 });
    expect(tasks.map((t) => t.pinId)).toEqual(["p1", "p2", "p3"]);
    expect(tasks[0]).toMatchObject({
      candidates: [imageUrlFor("p1")],
      expectedPath: join(repo.imagesDir, "p1.jpg"),
    });
    expect(queue.isClosed).toBe(true);
  });

  it("should not create a second task on a repeat run", async () => {
    await repo.savePinImmediately(makePin("p1"), "cat", null);

    const first = await scheduler.planTask((await repo.pins.findById("p1")) ?? fail());
    const second = await scheduler.planTask((await repo.pins.findById("p1")) ?? fail());

    expect(second?.taskId).toBe(first?.taskId);
    expect(await repo.getTasksForPin("p1")).toHaveLength(1);
  });

  it("should skip pins whose file is already on disk and record the path", async () => {
    await repo.savePinImmediately(makePin("p1"), "cat", null);
    const path = join(repo.imagesDir, "p1.jpg");
    await writeFile(path, jpegBytes(64));

    const task = await scheduler.planTask((await repo.pins.findById("p1")) ?? fail());

    expect(task).toBeNull();
    expect(scheduler.summary.present).toBe(1);
    expect((await repo.pins.findById("p1"))?.downloadPath).toBe(path);
    expect(await repo.getTasksForPin("p1")).toHaveLength(0);
  });

  it("should treat a truncated file as missing", async () => {
    await repo.savePinImmediately(makePin("p1"), "cat", null);
    await writeFile(join(repo.imagesDir, "p1.jpg"), jpegBytes(8));

    const task = await scheduler.planTask((await repo.pins.findById("p1")) ?? fail());

    expect(task?.pinId).toBe("p1");
  });

  it("should re-queue a completed task whose file has gone", async () => {
    await repo.savePinImmediately(makePin("p1"), "cat", null);
    const path = join(repo.imagesDir, "p1.jpg");
    const taskId = await repo.createDownloadTask("p1", imageUrlFor("p1"));
    await writeFile(path, jpegBytes(64));
    await repo.updateDownloadTaskStatus(taskId, "completed", { localPath: path, fileSize: 64 });
    await unlink(path);
    expect(existsSync(path)).toBe(false);

    const queue = new BoundedQueue<ScheduledTask>(10);
    const stats = await scheduler.produce(queue);
    const tasks = await drain(queue);

    expect(stats.healed).toBe(1);
    expect(tasks.map((t) => t.taskId)).toEqual([taskId]);
    const task = await repo.tasks.findById(taskId);
    expect(task?.status).toBe("pending");
    expect(task?.localPath).toBeNull();
  });
});

function fail(): never {
  throw new Error("pin not found");
}
