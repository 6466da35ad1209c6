import { formatElapsed } from "../quiz/format";
import { useElapsedTime } from "../hooks/useElapsedTime";

type Props = { startTime: number; tickMs: number };

export default function ElapsedTimer({ startTime, tickMs }: Props) {
  const elapsed = useElapsedTime(startTime, tickMs);
  return (
    <div className="timer-display">
      ⏱️ Time Elapsed: <span className="time">{formatElapsed(elapsed)}</span>
    </div>
  );
}
