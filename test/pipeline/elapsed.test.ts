import { describe, expect, test } from "vitest";
import { formatElapsed, Stopwatch } from "../../src/pipeline/elapsed";

describe("formatElapsed", () => {
  test("should show seconds with millisecond precision", () => {
    expect(formatElapsed(0, 1_500)).toBe("1.500s");
    expect(formatElapsed(0, 42)).toBe("0.042s");
  });

  test("should add minutes once a minute has passed", () => {
    expect(formatElapsed(0, 61_000)).toBe("1m1.000s");
    expect(formatElapsed(0, 600_250)).toBe("10m0.250s");
  });

  test("should add hours and keep zero minutes", () => {
    expect(formatElapsed(0, 3_600_000)).toBe("1h0m0.000s");
    expect(formatElapsed(0, 3_723_004)).toBe("1h2m3.004s");
  });

  test("should measure from the start timestamp", () => {
    expect(formatElapsed(10_000, 12_345)).toBe("2.345s");
  });

  test("should clamp a negative span to zero", () => {
    expect(formatElapsed(500, 100)).toBe("0.000s");
  });

  test("should round fractional milliseconds", () => {
    expect(formatElapsed(0, 0.6)).toBe("0.001s");
  });
});

describe("Stopwatch", () => {
  test("should report time since construction", () => {
    let now = 1_000;
    const watch = new Stopwatch(() => now);

    now = 2_500;
    expect(watch.elapsed()).toBe("1.500s");

    now = 62_000;
    expect(watch.elapsed()).toBe("1m1.000s");
  });
});
