import { describe, it, expect, vi } from "vitest";
import { withRetry, isTransient } from "./retry.js";

/** Error shaped like a storage API failure with a numeric status. */
function apiError(code: number, message = `HTTP ${code}`): Error {
  return Object.assign(new Error(message), { code });
}

describe("isTransient", () => {
  it("retries throttling and server errors", () => {
    expect(isTransient(apiError(429))).toBe(true);
    expect(isTransient(apiError(503))).toBe(true);
  });

  it("does not retry client errors", () => {
    expect(isTransient(apiError(404))).toBe(false);
    expect(isTransient(apiError(403))).toBe(false);
  });

  it("recognizes network failures by message", () => {
    expect(isTransient(new Error("read ECONNRESET"))).toBe(true);
    expect(isTransient(new Error("invalid argument"))).toBe(false);
  });

  it("ignores non-errors", () => {
    expect(isTransient("ECONNRESET")).toBe(false);
  });
});

describe("withRetry", () => {
  it("returns result on first attempt success", async () => {
    const fn = vi.fn().mockResolvedValue("success");
    await expect(withRetry(fn)).resolves.toBe("success");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on transient error and succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(apiError(503))
      .mockResolvedValue("recovered");

    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 5, maxDelayMs: 20 });
    expect(result).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after max retries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("ECONNREFUSED"));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 5, maxDelayMs: 20 }),
    ).rejects.toThrow("ECONNREFUSED");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry non-transient errors", async () => {
    const fn = vi.fn().mockRejectedValue(apiError(403, "Forbidden"));

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 5 })).rejects.toThrow("Forbidden");
    expect(fn).toHaveBeenCalledOnce();
  });
});
