import { describe, expect, it } from "vitest";
import { roundTo, singleLine, sleep } from "./utils";

describe("utils", () => {
  it("rounds to two decimals by default", () => {
    expect(roundTo(3.456)).toBe(3.46);
    expect(roundTo(12)).toBe(12);
  });

  it("joins lines with spaces", () => {
    expect(singleLine("Engineer\nat Acme\r\nMadrid")).toBe("Engineer at Acme Madrid");
    expect(singleLine(undefined)).toBe("");
  });

  it("wakes up early when aborted", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("returns at once for an already aborted signal", async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
