import type { Question, QuestionBank } from "../Questions";
import { clamp, shuffledOrder, type RandomSource } from "./shuffle";

/** ---------------------------------------------
 * Session state
 * ----------------------------------------------*/

/**
 * Progress of one quiz session. Every array is indexed by position in `order`,
 * not by the question's index in the bank.
 */
export type SessionState = {
  order: readonly number[];
  currentIndex: number;
  selected: readonly (string | null)[];
  submitted: readonly boolean[];
  /** Fixed at the first submission of a position; `null` until then. */
  correct: readonly (boolean | null)[];
  score: number;
  /** Epoch milliseconds. */
  startTime: number;
};

export type SessionEnv = {
  random: RandomSource;
  now: () => number;
  /** When false the bank order is kept as-is. */
  shuffle: boolean;
};

export const DEFAULT_ENV: SessionEnv = { random: Math.random, now: Date.now, shuffle: true };

export type NavigatorStatus = "empty" | "pointer" | "check" | "cross";

export type SessionMetrics = {
  attempted: number;
  total: number;
  /** Percentage, or null while nothing has been attempted. */
  accuracy: number | null;
  progressFraction: number;
};

export type SubmitResult = {
  session: SessionState;
  warning: string | null;
};

export const NO_SELECTION_WARNING = "Please select an answer before submitting!";

function inRange(s: SessionState, index: number) {
  return Number.isInteger(index) && index >= 0 && index < s.order.length;
}

function replaceAt<T>(arr: readonly T[], index: number, value: T): T[] {
  const copy = arr.slice();
  copy[index] = value;
  return copy;
}

/** ---------------------------------------------
 * Lifecycle
 * ----------------------------------------------*/
export function createSession(bank: QuestionBank, env: SessionEnv): SessionState {
  const n = bank.size;
  return {
    order: env.shuffle ? shuffledOrder(n, env.random) : Array.from({ length: n }, (_, i) => i),
    currentIndex: 0,
    selected: new Array<string | null>(n).fill(null),
    submitted: new Array<boolean>(n).fill(false),
    correct: new Array<boolean | null>(n).fill(null),
    score: 0,
    startTime: env.now(),
  };
}

/** Builds the session only once: an existing session is returned untouched. */
export function initializeSession(existing: SessionState | null, bank: QuestionBank, env: SessionEnv): SessionState {
  return existing ?? createSession(bank, env);
}

export function restartSession(bank: QuestionBank, env: SessionEnv): SessionState {
  return createSession(bank, env);
}

/** ---------------------------------------------
 * Answering
 * ----------------------------------------------*/
export function questionAt(bank: QuestionBank, s: SessionState, index: number): Question {
  return bank.at(s.order[index]);
}

export function currentQuestion(bank: QuestionBank, s: SessionState): Question {
  return questionAt(bank, s, clamp(s.currentIndex, 0, s.order.length - 1));
}

export function selectOption(bank: QuestionBank, s: SessionState, index: number, optionText: string): SessionState {
  if (!inRange(s, index) || s.submitted[index]) return s;
  if (!questionAt(bank, s, index).options.includes(optionText)) return s;
  if (s.selected[index] === optionText) return s;
  return { ...s, selected: replaceAt(s.selected, index, optionText) };
}

export function submitAnswer(bank: QuestionBank, s: SessionState, index: number): SubmitResult {
  if (!inRange(s, index)) return { session: s, warning: null };
  const choice = s.selected[index];
  if (choice == null) return { session: s, warning: NO_SELECTION_WARNING };
  if (s.submitted[index]) return { session: s, warning: null };

  const isCorrect = choice === questionAt(bank, s, index).correctAnswer;
  return {
    session: {
      ...s,
      correct: replaceAt(s.correct, index, isCorrect),
      submitted: replaceAt(s.submitted, index, true),
      score: isCorrect ? s.score + 1 : s.score,
    },
    warning: null,
  };
}

/** ---------------------------------------------
 * Navigation
 * ----------------------------------------------*/

/** Moving forward requires the current position to be submitted. */
export function canAdvance(s: SessionState) {
  return s.submitted[s.currentIndex] === true && s.currentIndex < s.order.length - 1;
}

export function advance(s: SessionState): SessionState {
  if (!s.submitted[s.currentIndex]) return s;
  const next = clamp(s.currentIndex + 1, 0, s.order.length - 1);
  return next === s.currentIndex ? s : { ...s, currentIndex: next };
}

export function retreat(s: SessionState): SessionState {
  const prev = clamp(s.currentIndex - 1, 0, s.order.length - 1);
  return prev === s.currentIndex ? s : { ...s, currentIndex: prev };
}

export function jumpTo(s: SessionState, index: number): SessionState {
  if (!inRange(s, index) || index === s.currentIndex) return s;
  return { ...s, currentIndex: index };
}

/** ---------------------------------------------
 * Derived values
 * ----------------------------------------------*/
export function computeMetrics(s: SessionState): SessionMetrics {
  const total = s.order.length;
  const attempted = s.submitted.filter(Boolean).length;
  return {
    attempted,
    total,
    accuracy: attempted > 0 ? (s.score / attempted) * 100 : null,
    progressFraction: total > 0 ? attempted / total : 0,
  };
}

export function navigatorStatus(s: SessionState, position: number): NavigatorStatus {
  if (s.submitted[position]) return s.correct[position] ? "check" : "cross";
  return position === s.currentIndex ? "pointer" : "empty";
}

export function positionLabel(position: number) {
  return `Q${position + 1}`;
}
