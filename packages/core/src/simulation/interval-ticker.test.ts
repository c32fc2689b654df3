import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { IntervalTicker } from "./interval-ticker.js";

describe("IntervalTicker", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("reports the measured time between steps", () => {
    const now = vi.spyOn(performance, "now").mockReturnValue(1000);
    const onTick = vi.fn();
    new IntervalTicker(16).start(onTick);

    now.mockReturnValue(1016);
    vi.advanceTimersByTime(16);
    now.mockReturnValue(1040);
    vi.advanceTimersByTime(16);

    expect(onTick.mock.calls).toEqual([[16], [24]]);
  });

  it("waits a whole interval before the first step", () => {
    vi.spyOn(performance, "now").mockReturnValue(0);
    const onTick = vi.fn();
    new IntervalTicker(100).start(onTick);

    vi.advanceTimersByTime(99);
    expect(onTick).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onTick).toHaveBeenCalledTimes(1);
  });

  it("stops stepping once stopped", () => {
    vi.spyOn(performance, "now").mockReturnValue(0);
    const onTick = vi.fn();
    const stop = new IntervalTicker(100).start(onTick);

    vi.advanceTimersByTime(100);
    stop();
    vi.advanceTimersByTime(1000);
    expect(onTick).toHaveBeenCalledTimes(1);
  });
});
