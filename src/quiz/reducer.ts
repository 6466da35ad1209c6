import type { QuestionBank } from "../Questions";
import {
  advance,
  jumpTo,
  retreat,
  selectOption,
  submitAnswer,
  type SessionState,
} from "./session";

export type QuizState = {
  /** The bank `session` was built from; positions only make sense against it. */
  bank: QuestionBank;
  session: SessionState;
  /** User-facing notice from the last command, cleared by the next one. */
  warning: string | null;
};

export type QuizAction =
  | { type: "select"; index: number; optionText: string }
  | { type: "submit"; index: number }
  | { type: "next" }
  | { type: "previous" }
  | { type: "jump"; index: number }
  // The new session is built by the caller so the reducer stays pure.
  | { type: "restart"; bank: QuestionBank; session: SessionState };

function withSession(state: QuizState, session: SessionState): QuizState {
  if (session === state.session && state.warning === null) return state;
  return { bank: state.bank, session, warning: null };
}

export function quizReducer(state: QuizState, action: QuizAction): QuizState {
  const { bank } = state;
  switch (action.type) {
    case "select":
      return withSession(state, selectOption(bank, state.session, action.index, action.optionText));
    case "submit": {
      const { session, warning } = submitAnswer(bank, state.session, action.index);
      if (warning) return warning === state.warning ? state : { bank, session, warning };
      return withSession(state, session);
    }
    case "next":
      return withSession(state, advance(state.session));
    case "previous":
      return withSession(state, retreat(state.session));
    case "jump":
      return withSession(state, jumpTo(state.session, action.index));
    case "restart":
      return { bank: action.bank, session: action.session, warning: null };
  }
}
