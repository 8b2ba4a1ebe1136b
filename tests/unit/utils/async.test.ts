import { afterEach, describe, expect, it, vi } from "vitest";

import {
  TimeoutError,
  chunk,
  mapWithConcurrency,
  withTimeout,
} from "../../../src/utils/async.js";

describe("utils/async", () => {
  describe("chunk", () => {
    it("should split items into fixed-size chunks", () => {
      expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
      expect(chunk([], 3)).toEqual([]);
    });
  });

  describe("withTimeout", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("should resolve with the value when the promise settles in time", async () => {
      await expect(withTimeout(Promise.resolve("ok"), 1000, "fetch")).resolves.toBe("ok");
    });

    it("should reject with a TimeoutError when time runs out", async () => {
      vi.useFakeTimers();
      const pending = withTimeout(new Promise<never>(() => undefined), 250, "Write Account");
      const assertion = expect(pending).rejects.toThrow(
        new TimeoutError("Write Account", 250)
      );

      await vi.advanceTimersByTimeAsync(250);

      await assertion;
    });

    it("should pass through rejections", async () => {
      await expect(
        withTimeout(Promise.reject(new Error("refused")), 1000, "fetch")
      ).rejects.toThrow("refused");
    });
  });

  describe("mapWithConcurrency", () => {
    it("should keep result order", async () => {
      const results = await mapWithConcurrency([30, 10, 20], 2, async (n) => {
        await Promise.resolve();
        return n * 2;
      });

      expect(results).toEqual([60, 20, 40]);
    });

    it("should never exceed the concurrency limit", async () => {
      let active = 0;
      let peak = 0;

      await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
      });

      expect(peak).toBe(2);
    });

    it("should handle an empty list", async () => {
      await expect(mapWithConcurrency([], 4, () => Promise.resolve(1))).resolves.toEqual([]);
    });
  });
});
