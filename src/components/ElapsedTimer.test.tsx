import { act } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import ElapsedTimer from "./ElapsedTimer";

describe("ElapsedTimer", () => {
  let container: HTMLDivElement;
  let root: Root;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T09:00:00Z"));
    container = document.createElement("div");
    document.body.appendChild(container);
    root = createRoot(container);
  });

  afterEach(() => {
    act(() => root.unmount());
    container.remove();
    vi.useRealTimers();
  });

  const shown = () => container.querySelector(".time")?.textContent;

  it("counts up once per tick", () => {
    const start = Date.now();
    act(() => root.render(<ElapsedTimer startTime={start} tickMs={1000} />));
    expect(shown()).toBe("00:00:00");

    act(() => { vi.advanceTimersByTime(1000); });
    expect(shown()).toBe("00:00:01");

    act(() => { vi.advanceTimersByTime(3_722_000); });
    expect(shown()).toBe("01:02:03");
  });

  it("refreshes at least once a second whatever the tick", () => {
    act(() => root.render(<ElapsedTimer startTime={Date.now()} tickMs={5000} />));
    act(() => { vi.advanceTimersByTime(1000); });
    expect(shown()).toBe("00:00:01");
  });

  it("starts over when the start time changes", () => {
    const start = Date.now();
    act(() => root.render(<ElapsedTimer startTime={start} tickMs={1000} />));
    act(() => { vi.advanceTimersByTime(90_000); });
    expect(shown()).toBe("00:01:30");

    act(() => root.render(<ElapsedTimer startTime={Date.now()} tickMs={1000} />));
    expect(shown()).toBe("00:00:00");
  });
});
