import { useEffect, useState } from "react";

export const MAX_TICK_MS = 1000;

/** Milliseconds since `startTime`, refreshed every `tickMs` and at least once a second. */
export function useElapsedTime(startTime: number, tickMs: number): number {
  const [now, setNow] = useState<number>(() => Date.now());
  const period = Math.min(tickMs, MAX_TICK_MS);

  useEffect(() => {
    setNow(Date.now());
    const id = setInterval(() => setNow(Date.now()), period);
    return () => clearInterval(id);
  }, [startTime, period]);

  return Math.max(0, now - startTime);
}
