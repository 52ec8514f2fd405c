/**
 * Tests for zid allocation.
 */

import { describe, it, expect } from "vitest";
import { EPOCH, formatZid, nextZidDate } from "./zid.js";

describe("formatZid", () => {
  it("should render the epoch as 19800101000000", () => {
    expect(formatZid(EPOCH)).toBe("19800101000000");
  });

  it("should zero-pad every field", () => {
    expect(formatZid(new Date(Date.UTC(2024, 2, 5, 7, 8, 9)))).toBe(
      "20240305070809",
    );
  });

  it("should always produce 14 digits", () => {
    expect(formatZid(new Date(Date.UTC(1999, 11, 31, 23, 59, 59)))).toMatch(
      /^\d{14}$/,
    );
  });
});

describe("nextZidDate", () => {
  it("should advance exactly one minute", () => {
    expect(formatZid(nextZidDate(EPOCH))).toBe("19800101000100");
  });

  it("should not modify its argument", () => {
    const start = new Date(EPOCH.getTime());
    nextZidDate(start);
    expect(start.getTime()).toBe(EPOCH.getTime());
  });

  it("should roll over hours after 60 steps", () => {
    let date = EPOCH;
    for (let i = 0; i < 60; i++) {
      date = nextZidDate(date);
    }
    expect(formatZid(date)).toBe("19800101010000");
  });

  it("should roll over the day and year", () => {
    const lastMinute = new Date(Date.UTC(1980, 11, 31, 23, 59, 0));
    expect(formatZid(nextZidDate(lastMinute))).toBe("19810101000000");
  });
});
