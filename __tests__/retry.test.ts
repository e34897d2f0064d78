import { describe, expect, it, vi } from "vitest";

import { isTransientFailure, withRetry } from "../src/retry.js";

describe("isTransientFailure", () => {
  it("recognises network and server errors", () => {
    expect(isTransientFailure(new Error("read ECONNRESET"))).toBe(true);
    expect(isTransientFailure(new Error("fatal: unable to access: Could not resolve host: github.com"))).toBe(true);
    expect(isTransientFailure(new Error("The requested URL returned error: 502"))).toBe(true);
    expect(isTransientFailure("Operation timed out")).toBe(true);
  });

  it("treats other failures as permanent", () => {
    expect(isTransientFailure(new Error("ResolutionImpossible"))).toBe(false);
    expect(isTransientFailure(new Error("The requested URL returned error: 403"))).toBe(false);
  });
});

describe("withRetry", () => {
  it("retries transient failures until the operation succeeds", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("read ECONNRESET"))
      .mockRejectedValueOnce(new Error("read ECONNRESET"))
      .mockResolvedValue("done");

    await expect(withRetry("git push", fn, { baseDelayMs: 0 })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up after the last attempt", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("connection reset by peer"));

    await expect(withRetry("git fetch", fn, { attempts: 2, baseDelayMs: 0 })).rejects.toThrow(
      "connection reset by peer"
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent failures", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("rejected: non-fast-forward"));

    await expect(withRetry("git push", fn, { baseDelayMs: 0 })).rejects.toThrow("non-fast-forward");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
