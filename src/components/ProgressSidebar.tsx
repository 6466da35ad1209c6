import type { SessionMetrics, SessionState } from "../quiz/session";
import { formatAccuracy } from "../quiz/format";
import ElapsedTimer from "./ElapsedTimer";
import QuestionNavigator from "./QuestionNavigator";

type Props = {
  session: SessionState;
  metrics: SessionMetrics;
  navigatorColumns: number;
  timerTickMs: number;
  onJump: (position: number) => void;
};

export default function ProgressSidebar({ session, metrics, navigatorColumns, timerTickMs, onJump }: Props) {
  return (
    <aside className="scorecard">
      <h2>Progress Tracker</h2>
      <ElapsedTimer startTime={session.startTime} tickMs={timerTickMs} />
      <div className="metric attempted">
        📝 Questions Attempted: <strong>{metrics.attempted}/{metrics.total}</strong>
      </div>
      <div className="metric accuracy">
        🎯 Accuracy: <strong>{formatAccuracy(metrics.accuracy)}</strong>
      </div>
      <progress value={metrics.attempted} max={metrics.total} />
      <h3>Question Navigator</h3>
      <QuestionNavigator session={session} columns={navigatorColumns} onJump={onJump} />
    </aside>
  );
}
