import { afterEach, describe, expect, it, vi } from "vitest";
import { cleanText, deduplicate, formatDuration, sleep } from "./utils";

describe("deduplicate", () => {
  it("keeps the first spelling of case-insensitive duplicates", () => {
    expect(deduplicate(["ab-1", "12345", "AB-1", "12345"])).toEqual(["ab-1", "12345"]);
  });
});

describe("formatDuration", () => {
  it("formats seconds and minutes", () => {
    expect(formatDuration(4_200)).toBe("4s");
    expect(formatDuration(150_000)).toBe("2m 30s");
  });
});

describe("cleanText", () => {
  it("collapses whitespace", () => {
    expect(cleanText("  a \n\t b  ")).toBe("a b");
  });
});

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves once the delay has passed", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(500).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });
});
