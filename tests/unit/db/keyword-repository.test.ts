import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { join } from "path";
import { KeywordRepository } from "../../../src/db/repositories/keyword.repo";
import { DATABASE_FILENAME } from "../../../src/db/client";
import { PersistenceError } from "../../../src/core/errors";
import { pins } from "../../../src/db/schema";
import { makePin, makeTempDir, removeDir } from "../../support/fakes";

describe("KeywordRepository", () => {
  let outputDir: string;
  let repo: KeywordRepository;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    repo = KeywordRepository.open(outputDir, "cat");
  });

  afterEach(async () => {
    repo.close();
    await removeDir(outputDir);
  });

  it("should create the partition database and images directory", () => {
    expect(existsSync(join(outputDir, "cat", DATABASE_FILENAME))).toBe(true);
    expect(existsSync(join(outputDir, "cat", "images"))).toBe(true);
  });

  it("should keep keywords in separate partitions", async () => {
    const dogs = KeywordRepository.open(outputDir, "dog");
    try {
      await dogs.savePinImmediately(makePin("d1"), "dog", null);
      expect(await repo.countPins("cat")).toBe(0);
      expect(await dogs.countPins("dog")).toBe(1);
    } finally {
      dogs.close();
    }
  });

  describe("pins", () => {
    it("should write a pin once and refresh its counters on repeat writes", async () => {
      expect(await repo.savePinImmediately(makePin("p1", { stats: { saves: 1 } }), "cat", null)).toBe(true);
      expect(await repo.savePinImmediately(makePin("p1", { stats: { saves: 9 } }), "cat", null)).toBe(false);

      expect(await repo.countPins("cat")).toBe(1);
      const stored = await repo.pins.findById("p1");
      expect(stored?.stats.saves).toBe(9);
      expect(stored?.imageUrls).toEqual({ orig: "https://img.test/p1.jpg" });
    });

    it("should reject records that fail validation without writing", async () => {
      expect(await repo.savePinImmediately({ id: "  " }, "cat", null)).toBe(false);
      expect(await repo.countPins("cat")).toBe(0);
    });

    it("should page pins in insertion order", async () => {
      for (const id of ["p3", "p1", "p2"]) {
        await repo.savePinImmediately(makePin(id), "cat", null);
      }

      const firstPage = await repo.loadPinsByQuery("cat", 2);
      const secondPage = await repo.loadPinsByQuery("cat", 2, 2);
      expect(firstPage.map((p) => p.id)).toEqual(["p3", "p1"]);
      expect(secondPage.map((p) => p.id)).toEqual(["p2"]);
    });

    it("should list only pins that have an image", async () => {
      await repo.savePinImmediately(makePin("p1"), "cat", null);
      await repo.savePinImmediately({ id: "p2", imageUrls: {}, largestImageUrl: null }, "cat", null);

      const withImages = await repo.loadPinsWithImages("cat", 10, 0);
      expect(withImages.map((p) => p.id)).toEqual(["p1"]);
    });
  });

  describe("encoded pin ids", () => {
    it("should store an encoded id and its numeric form as one pin", async () => {
      expect(await repo.savePinImmediately(makePin("UGluOjU1"), "cat", null)).toBe(true);
      expect(await repo.savePinImmediately(makePin("55"), "cat", null)).toBe(false);

      expect(await repo.listPinIds("cat")).toEqual(["55"]);
    });

    it("should move a stored encoded row and its tasks to the numeric id", async () => {
      repo.handle.db.insert(pins).values({ id: "UGluOjEyMzQ=", query: "cat", largestImageUrl: "https://img.test/a.jpg" }).run();
      await repo.createDownloadTask("UGluOjEyMzQ=", "https://img.test/a.jpg");

      expect(repo.collapseEncodedPinIds()).toEqual({ renamed: 1, merged: 0 });
      expect(await repo.pins.findById("UGluOjEyMzQ=")).toBeNull();
      expect((await repo.pins.findById("1234"))?.largestImageUrl).toBe("https://img.test/a.jpg");
      expect((await repo.getTasksForPin("1234")).map((t) => t.imageUrl)).toEqual(["https://img.test/a.jpg"]);
    });

    it("should drop an encoded row when the numeric pin already exists", async () => {
      await repo.savePinImmediately(makePin("55"), "cat", null);
      repo.handle.db.insert(pins).values({ id: "UGluOjU1", query: "cat" }).run();
      await repo.createDownloadTask("UGluOjU1", "https://img.test/dup.jpg");

      expect(repo.collapseEncodedPinIds()).toEqual({ renamed: 0, merged: 1 });
      expect(await repo.listPinIds("cat")).toEqual(["55"]);
      expect(await repo.countTasksByStatus()).toMatchObject({ pending: 0 });
    });

    it("should leave non-numeric encoded-looking ids alone", async () => {
      repo.handle.db.insert(pins).values({ id: "UGluOmFiYw==", query: "cat" }).run();

      expect(repo.collapseEncodedPinIds()).toEqual({ renamed: 0, merged: 0 });
      expect(await repo.listPinIds("cat")).toEqual(["UGluOmFiYw=="]);
    });
  });

  describe("pin enhancement storage", () => {
    it("should list pins without images and rewrite their content", async () => {
      await repo.savePinImmediately(makePin("p1"), "cat", null);
      await repo.savePinImmediately({ id: "p2", title: "Kept", imageUrls: {}, largestImageUrl: null }, "cat", null);

      expect(await repo.listPinIdsWithoutImages("cat")).toEqual(["p2"]);

      const stored = await repo.pins.findById("p2");
      expect(stored).not.toBeNull();
      if (!stored) return;
      await repo.updatePinContent({ ...stored, largestImageUrl: "https://img.test/p2.jpg", imageUrls: { orig: "https://img.test/p2.jpg" } });

      expect(await repo.listPinIdsWithoutImages("cat")).toEqual([]);
      expect((await repo.pins.findById("p2"))?.title).toBe("Kept");
    });
  });

  describe("sessions", () => {
    it("should return resumable sessions newest first", async () => {
      const first = await repo.createSession("cat", 10, outputDir, true);
      const second = await repo.createSession("cat", 10, outputDir, true);
      await repo.updateSessionStatus(first, "interrupted", 0);

      const open = await repo.getIncompleteSessions("cat");
      expect(open.map((s) => s.id)).toEqual([second, first]);
    });

    it("should stamp completion time only on terminal statuses", async () => {
      const id = await repo.createSession("cat", 10, outputDir, true);
      await repo.updateSessionStatus(id, "interrupted", 4);
      expect((await repo.getSession(id))?.completedAt).toBeNull();

      await repo.updateSessionStatus(id, "completed", 10, { note: "done" });
      const session = await repo.getSession(id);
      expect(session?.status).toBe("completed");
      expect(session?.savedCount).toBe(10);
      expect(session?.completedAt).not.toBeNull();
      expect(session?.stats).toEqual({ note: "done" });
    });

    it("should refuse to reopen a completed session", async () => {
      const id = await repo.createSession("cat", 10, outputDir, true);
      await repo.updateSessionStatus(id, "completed", 10);

      expect(await repo.resumeSession(id)).toBe(false);
      await expect(repo.updateSessionStatus(id, "running", 10)).rejects.toThrow("Invalid session state transition");
    });
  });

  describe("download tasks", () => {
    beforeEach(async () => {
      await repo.savePinImmediately(makePin("p1"), "cat", null);
    });

    it("should return the existing task for the same pin and URL", async () => {
      const first = await repo.createDownloadTask("p1", "https://img.test/p1.jpg");
      const second = await repo.createDownloadTask("p1", "https://img.test/p1.jpg");

      expect(second).toBe(first);
      expect(await repo.getTasksForPin("p1")).toHaveLength(1);
    });

    it("should refuse to complete a task without a path", async () => {
      const id = await repo.createDownloadTask("p1", "https://img.test/p1.jpg");

      const attempt = repo.updateDownloadTaskStatus(id, "completed", { fileSize: 10 });
      await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
      await expect(repo.updateDownloadTaskStatus(id, "completed")).rejects.toMatchObject({
        code: "TASK_COMPLETED_WITHOUT_PATH",
      });
      expect((await repo.tasks.findById(id))?.status).toBe("pending");
    });

    it("should mark the pin downloaded in the same step as completing the task", async () => {
      const id = await repo.createDownloadTask("p1", "https://img.test/p1.jpg");
      const path = join(repo.imagesDir, "p1.jpg");

      await repo.updateDownloadTaskStatus(id, "completed", { localPath: path, fileSize: 2048 });

      const task = await repo.tasks.findById(id);
      expect(task).toMatchObject({ status: "completed", localPath: path, fileSize: 2048 });
      const pin = await repo.pins.findById("p1");
      expect(pin?.downloaded).toBe(true);
      expect(pin?.downloadPath).toBe(path);
    });

    it("should count failures and clear the path when a task leaves completed", async () => {
      const id = await repo.createDownloadTask("p1", "https://img.test/p1.jpg");
      await repo.updateDownloadTaskStatus(id, "completed", { localPath: "/tmp/p1.jpg", fileSize: 10 });
      await repo.updateDownloadTaskStatus(id, "pending");
      await repo.updateDownloadTaskStatus(id, "failed", { errorMessage: "HTTP 404" });

      const task = await repo.tasks.findById(id);
      expect(task).toMatchObject({ status: "failed", localPath: null, fileSize: null, retryCount: 1, errorMessage: "HTTP 404" });
      expect(await repo.countTasksByStatus()).toEqual({ pending: 0, downloading: 0, completed: 0, failed: 1 });
    });

    it("should list pending tasks oldest first up to the limit", async () => {
      await repo.savePinImmediately(makePin("p2"), "cat", null);
      const first = await repo.createDownloadTask("p1", "https://img.test/p1.jpg");
      const second = await repo.createDownloadTask("p2", "https://img.test/p2.jpg");
      const third = await repo.createDownloadTask("p1", "https://img.test/p1-alt.jpg");
      await repo.updateDownloadTaskStatus(first, "downloading");

      expect((await repo.getPendingDownloadTasks(10)).map((t) => t.id)).toEqual([second, third]);
      expect((await repo.getPendingDownloadTasks(1)).map((t) => t.id)).toEqual([second]);
    });

    it("should report a missing task", async () => {
      await expect(repo.updateDownloadTaskStatus(999, "downloading")).rejects.toMatchObject({ code: "TASK_NOT_FOUND" });
    });
  });
});
