import { useCallback, useMemo, useReducer } from "react";
import type { QuestionBank } from "../Questions";
import { quizReducer, type QuizState } from "../quiz/reducer";
import {
  computeMetrics,
  currentQuestion,
  initializeSession,
  restartSession,
  type SessionEnv,
} from "../quiz/session";

/**
 * Owns one session for the lifetime of the component. The lazy initializer runs
 * once per mount, so re-renders never reshuffle; only `restart` does, or a
 * different `bank`, which starts a fresh session for it.
 */
export function useQuizSession(bank: QuestionBank, env: SessionEnv) {
  const [state, dispatch] = useReducer(quizReducer, null, (): QuizState => ({
    bank,
    session: initializeSession(null, bank, env),
    warning: null,
  }));

  // Render-phase update: React discards this render and re-renders with the new session.
  if (state.bank !== bank) {
    dispatch({ type: "restart", bank, session: restartSession(bank, env) });
  }

  const select = useCallback((index: number, optionText: string) => dispatch({ type: "select", index, optionText }), []);
  const submit = useCallback((index: number) => dispatch({ type: "submit", index }), []);
  const next = useCallback(() => dispatch({ type: "next" }), []);
  const previous = useCallback(() => dispatch({ type: "previous" }), []);
  const jump = useCallback((index: number) => dispatch({ type: "jump", index }), []);
  const restart = useCallback(
    () => dispatch({ type: "restart", bank, session: restartSession(bank, env) }),
    [bank, env]
  );

  const metrics = useMemo(() => computeMetrics(state.session), [state.session]);
  const question = currentQuestion(state.bank, state.session);

  return {
    session: state.session,
    warning: state.warning,
    question,
    metrics,
    select,
    submit,
    next,
    previous,
    jump,
    restart,
  };
}
