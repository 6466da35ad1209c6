import { useEffect, useMemo, useState } from "react";
import { DEFAULT_CONFIG, type AppConfig } from "./config";
import { parseQuestionBank } from "./Questions";
import defaultQuestions from "./questions.json";
import { DEFAULT_ENV, canAdvance, type SessionEnv } from "./quiz/session";
import { useQuizSession } from "./hooks/useQuizSession";
import QuestionCard from "./components/QuestionCard";
import NavigationControls from "./components/NavigationControls";
import ProgressSidebar from "./components/ProgressSidebar";

declare global { interface Window { __QUESTIONS__?: unknown } }

type Props = {
  /** Raw bank data; falls back to window.__QUESTIONS__, then the bundled bank. */
  questions?: unknown;
  config?: Partial<AppConfig>;
  env?: Partial<Pick<SessionEnv, "random" | "now">>;
};

// Shortcuts stay off while the user is typing anywhere other than the answer radios.
function isTextEntry(target: EventTarget | null) {
  if (!(target instanceof HTMLElement)) return false;
  if (target instanceof HTMLInputElement) return target.type !== "radio" && target.type !== "checkbox";
  if (target instanceof HTMLTextAreaElement || target instanceof HTMLSelectElement) return true;
  return target.isContentEditable || target.closest('[contenteditable=""], [contenteditable="true"]') !== null;
}

export default function App({ questions, config: overrides, env: envOverrides }: Props) {
  // Config
  const [config] = useState<AppConfig>(() => ({ ...DEFAULT_CONFIG, ...overrides }));
  const [env] = useState<SessionEnv>(() => ({ ...DEFAULT_ENV, ...envOverrides, shuffle: config.shuffleQuestions }));

  const bank = useMemo(
    () => parseQuestionBank(questions ?? window.__QUESTIONS__ ?? defaultQuestions),
    [questions]
  );

  const quiz = useQuizSession(bank, env);
  const { session, question, select, submit, next, previous } = quiz;
  const pos = session.currentIndex;

  // Keyboard shortcuts
  useEffect(() => {
    if (!config.keyboardShortcuts) return;
    const onKey = (e: KeyboardEvent) => {
      if (isTextEntry(e.target)) return;
      const k = e.key.toLowerCase();
      if (k === "n") next();
      else if (k === "p") previous();
      else if (k === "enter" && !(e.target instanceof HTMLButtonElement)) submit(pos);
      else if (/^[1-9]$/.test(k)) {
        const opt = question.options[parseInt(k, 10) - 1];
        if (opt !== undefined) select(pos, opt);
      }
    };
    window.addEventListener("keydown", onKey);
    return () => window.removeEventListener("keydown", onKey);
  }, [config.keyboardShortcuts, pos, question, next, previous, select, submit]);

  return (
    <div className="app">
      <header className="topbar">
        <h1>{config.title}</h1>
        <p className="caption">{config.caption}</p>
      </header>

      <main className="layout">
        <div className="main-col">
          <QuestionCard
            key={pos}
            position={pos}
            question={question}
            selected={session.selected[pos]}
            submitted={session.submitted[pos]}
            correct={session.correct[pos]}
            warning={quiz.warning}
            showExplanation={config.showExplanation}
            onSelect={(opt) => select(pos, opt)}
            onSubmit={() => submit(pos)}
          />
          <NavigationControls
            canGoBack={pos > 0}
            canGoForward={canAdvance(session)}
            onPrevious={previous}
            onNext={next}
            onRestart={quiz.restart}
          />
        </div>

        <ProgressSidebar
          session={session}
          metrics={quiz.metrics}
          navigatorColumns={config.navigatorColumns}
          timerTickMs={config.timerTickMs}
          onJump={quiz.jump}
        />
      </main>

      <style>{`
        :root { --bg:#f7fafc; --fg:#0b0f12; --card:#ffffff; --muted:#4b5563; --accent:#2563eb; }
        body, .app { margin:0; padding:0; background:var(--bg); color:var(--fg); font-family: ui-sans-serif, system-ui, Segoe UI, Roboto, Helvetica, Arial; }
        .topbar { padding:12px 16px; background:var(--card); border-bottom:1px solid #e0e0e0; }
        .topbar h1 { margin:0; font-size:1.5rem; }
        .caption { margin:4px 0 0; color:var(--muted); }
        .layout { display:grid; grid-template-columns: 3fr 1fr; gap:12px; padding:12px; }
        .question, .scorecard { background:var(--card); border-radius:14px; padding:12px; box-shadow: 0 2px 12px rgba(0,0,0,.08); }
        .question-card { border:1px solid #e0e0e0; border-radius:10px; padding:1.5rem; margin-bottom:1.5rem; box-shadow:0 2px 4px rgba(0,0,0,.1); }
        .options { border:none; padding:0; }
        .choice { display:flex; gap:8px; align-items:flex-start; margin:6px 0; }
        .warning { margin:8px 0; padding:8px 12px; border-radius:8px; background:#fff4e5; color:#8a4b00; }
        .actions { display:flex; gap:8px; margin-top:12px; }
        .correct-highlight { background:#e6f4ea; border-left:4px solid #34a853; padding:1rem; border-radius:8px; margin-top:1rem; }
        .incorrect-highlight { background:#fce8e6; border-left:4px solid #ea4335; padding:1rem; border-radius:8px; margin-top:1rem; }
        .explanation-box { padding:1rem; border-radius:8px; margin-top:1rem; }
        .explanation-correct { background:#e6f4ea; }
        .explanation-incorrect { background:#fce8e6; }
        .timer-display { font-size:1.25rem; margin-bottom:1rem; }
        .metric { margin:6px 0; }
        .scorecard progress { width:100%; }
        .navigator { display:grid; gap:6px; }
        .nav-item { padding:6px 4px; border-radius:8px; border:1px solid #e0e0e0; background:var(--card); cursor:pointer; }
        .nav-item.pointer { border-color:var(--accent); }
      `}</style>
    </div>
  );
}
