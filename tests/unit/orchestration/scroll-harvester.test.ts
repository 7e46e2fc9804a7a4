import { describe, it, expect } from "vitest";
import { harvestByScrolling } from "../../../src/orchestration/scroll-harvester";
import { CancellationError } from "../../../src/core/errors";
import type { RawPin } from "../../../src/domain/models";
import { FakeDriver, ScriptedExtractor, makePin, makePins } from "../../support/fakes";

function collectingSink(): { saved: string[]; sink: (record: RawPin) => Promise<boolean> } {
  const saved: string[] = [];
  return {
    saved,
    sink: async (record) => {
      if (saved.includes(record.id)) return false;
      saved.push(record.id);
      return true;
    },
  };
}

describe("harvestByScrolling", () => {
  it("should scroll back and forth once when entering recovery", async () => {
    const driver = new FakeDriver();
    const extractor = new ScriptedExtractor(() => [makePin("a")]);
    const { saved, sink } = collectingSink();

    const state = await harvestByScrolling(
      driver,
      extractor,
      { target: 10, maxScrolls: 20, stallThreshold: 2, maxConsecutiveNoNew: 3 },
      sink,
      { scrollPixels: 100 }
    );

    expect(saved).toEqual(["a"]);
    expect(driver.scrolls).toEqual([100, 100, -100, 200]);
    expect(state.doneReason).toBe("exhausted");
    expect(state.rounds).toBe(4);
  });

  it("should stop persisting once the target is met", async () => {
    const driver = new FakeDriver();
    const extractor = new ScriptedExtractor(() => makePins("p", 1, 5));
    const { saved, sink } = collectingSink();

    const state = await harvestByScrolling(
      driver,
      extractor,
      { target: 3, maxScrolls: 20, stallThreshold: 2, maxConsecutiveNoNew: 3 },
      sink,
      { scrollPixels: 100 }
    );

    expect(saved).toEqual(["p1", "p2", "p3"]);
    expect(state.doneReason).toBe("target_reached");
    expect(driver.scrolls).toEqual([]);
  });

  it("should not touch the page for a zero target", async () => {
    const extractor = new ScriptedExtractor(() => makePins("p", 1, 5));
    const { sink } = collectingSink();

    const state = await harvestByScrolling(
      new FakeDriver(),
      extractor,
      { target: 0, maxScrolls: 20, stallThreshold: 2, maxConsecutiveNoNew: 3 },
      sink,
      { scrollPixels: 100 }
    );

    expect(state.phase).toBe("done");
    expect(extractor.calls).toBe(0);
  });

  it("should raise a cancellation when the signal fires between rounds", async () => {
    const controller = new AbortController();
    const driver = new FakeDriver();
    driver.onScroll = () => controller.abort();
    let round = 0;
    const extractor = new ScriptedExtractor(() => makePins("p", ++round, round));
    const { saved, sink } = collectingSink();

    await expect(
      harvestByScrolling(
        driver,
        extractor,
        { target: 10, maxScrolls: 20, stallThreshold: 2, maxConsecutiveNoNew: 3 },
        sink,
        { scrollPixels: 100, signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(CancellationError);
    expect(saved).toEqual(["p1"]);
  });
});
