import { navigatorStatus, positionLabel, type NavigatorStatus, type SessionState } from "../quiz/session";

const STATUS_ICON: Record<NavigatorStatus, string> = {
  empty: "⬜",
  pointer: "📍",
  check: "✅",
  cross: "❌",
};

type Props = {
  session: SessionState;
  columns: number;
  onJump: (position: number) => void;
};

export default function QuestionNavigator({ session, columns, onJump }: Props) {
  return (
    <nav className="navigator" style={{ gridTemplateColumns: `repeat(${Math.max(1, columns)}, 1fr)` }}>
      {session.order.map((_, i) => {
        const status = navigatorStatus(session, i);
        return (
          <button key={i} className={`nav-item ${status}`} data-status={status} onClick={() => onJump(i)}>
            {positionLabel(i)} {STATUS_ICON[status]}
          </button>
        );
      })}
    </nav>
  );
}
