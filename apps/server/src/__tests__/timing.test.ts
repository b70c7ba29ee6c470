import { describe, expect, it } from "vitest";
import { formatElapsed, startScopedTimer, withTiming } from "../timing";

describe("timing", () => {
  it("formats sub-second durations in milliseconds", () => {
    expect(formatElapsed(0)).toBe("0.0ms");
    expect(formatElapsed(12.34)).toBe("12.3ms");
    expect(formatElapsed(999.9)).toBe("999.9ms");
  });

  it("formats longer durations in seconds", () => {
    expect(formatElapsed(1000)).toBe("1.000s");
    expect(formatElapsed(15250)).toBe("15.250s");
  });

  it("reports elapsed time once per timer", () => {
    const readings = [10, 25, 40];
    const reported: number[] = [];
    const timer = startScopedTimer((elapsed) => reported.push(elapsed), () => readings.shift() ?? 0);

    expect(timer.release()).toBe(15);
    expect(timer.release()).toBe(30);
    expect(reported).toEqual([15]);
  });

  it("releases the timer when the wrapped function resolves", async () => {
    const reported: number[] = [];
    const readings = [0, 5];
    const wrapped = withTiming(
      async (value: number) => {
        expect(value).toBe(7);
      },
      (elapsed) => reported.push(elapsed),
      () => readings.shift() ?? 0
    );

    await wrapped(7);

    expect(reported).toEqual([5]);
  });

  it("releases the timer when the wrapped function rejects", async () => {
    const reported: number[] = [];
    const readings = [0, 8];
    const wrapped = withTiming(
      async () => {
        throw new Error("spawn failed");
      },
      (elapsed) => reported.push(elapsed),
      () => readings.shift() ?? 0
    );

    await expect(wrapped()).rejects.toThrow("spawn failed");
    expect(reported).toEqual([8]);
  });
});
