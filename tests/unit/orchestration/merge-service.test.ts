import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { writeFile } from "fs/promises";
import { join } from "path";
import { KeywordRepository } from "../../../src/db/repositories/keyword.repo";
import { discoverPartitions, mergeOutputTrees } from "../../../src/orchestration/merge-service";
import { jpegBytes, makePin, makeTempDir, removeDir } from "../../support/fakes";

describe("mergeOutputTrees", () => {
  let sourceDir: string;
  let targetDir: string;

  beforeEach(async () => {
    sourceDir = await makeTempDir();
    targetDir = await makeTempDir();

    const source = KeywordRepository.open(sourceDir, "cat");
    try {
      for (const id of ["p1", "p2", "p3"]) await source.savePinImmediately(makePin(id), "cat", null);
      const imagePath = join(source.imagesDir, "p1.jpg");
      await writeFile(imagePath, jpegBytes(2048));
      await source.markPinDownloaded("p1", imagePath);
    } finally {
      source.close();
    }

    const target = KeywordRepository.open(targetDir, "cat");
    try {
      await target.savePinImmediately(makePin("p2", { title: "kept" }), "cat", null);
    } finally {
      target.close();
    }
  });

  afterEach(async () => {
    await removeDir(sourceDir);
    await removeDir(targetDir);
  });

  it("should find partitions by their database file", async () => {
    expect(await discoverPartitions(sourceDir)).toEqual(["cat"]);
    expect(await discoverPartitions(join(sourceDir, "missing"))).toEqual([]);
  });

  it("should add missing pins and copy their images, keeping target rows", async () => {
    const [result] = await mergeOutputTrees({ sourceDir, targetDir });

    expect(result).toEqual({ partition: "cat", sourcePins: 3, added: 2, skipped: 1, imagesCopied: 1 });

    const target = KeywordRepository.open(targetDir, "cat");
    try {
      expect((await target.loadPinsByQuery("cat")).map((p) => p.id)).toEqual(["p2", "p1", "p3"]);
      expect((await target.pins.findById("p2"))?.title).toBe("kept");
      const copied = join(target.imagesDir, "p1.jpg");
      expect(existsSync(copied)).toBe(true);
      expect((await target.pins.findById("p1"))?.downloadPath).toBe(copied);
      expect((await target.pins.findById("p3"))?.downloaded).toBe(false);
    } finally {
      target.close();
    }
  });

  it("should write nothing on a dry run", async () => {
    const [result] = await mergeOutputTrees({ sourceDir, targetDir, dryRun: true });

    expect(result).toMatchObject({ added: 2, skipped: 1, imagesCopied: 0 });
    const target = KeywordRepository.open(targetDir, "cat");
    try {
      expect(await target.countPins("cat")).toBe(1);
    } finally {
      target.close();
    }
  });

  it("should not create a missing target partition on a dry run", async () => {
    const emptyTarget = join(targetDir, "nested");

    const [result] = await mergeOutputTrees({ sourceDir, targetDir: emptyTarget, dryRun: true });

    expect(result).toMatchObject({ sourcePins: 3, added: 3 });
    expect(existsSync(join(emptyTarget, "cat"))).toBe(false);
  });
});
