import { describe, it, expect, vi } from "vitest";
import { calculateBackoff, withRetry } from "./retry.js";

describe("calculateBackoff", () => {
  it("doubles from the base delay up to the cap", () => {
    expect(calculateBackoff(0)).toBe(2000);
    expect(calculateBackoff(1)).toBe(4000);
    expect(calculateBackoff(2)).toBe(8000);
    expect(calculateBackoff(3)).toBe(10000);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("rethrows the last error once attempts are exhausted", async () => {
    const sleep = vi.fn(async () => {});
    const onRetry = vi.fn();
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, { sleep, onRetry })).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(onRetry.mock.calls.map((c) => [c[1], c[2]])).toEqual([
      [1, 2000],
      [2, 4000],
    ]);
  });

  it("gives up immediately when shouldRetry says no", async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi.fn(async () => {
      throw new Error("fatal");
    });

    await expect(withRetry(fn, { sleep, shouldRetry: () => false })).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
