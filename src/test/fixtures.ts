import { createQuestionBank, type Question, type QuestionBank } from "../Questions";
import type { SessionEnv } from "../quiz/session";

export const HYPERCALCAEMIA: Question = {
  questionText: "Most common cause of hypercalcaemia in hospitalised patients?",
  options: ["Primary hyperparathyroidism", "Malignancy", "Vitamin D intoxication", "Sarcoidosis"],
  correctAnswer: "Malignancy",
  explanation: "Test explanation for malignancy.",
};

/** First question is HYPERCALCAEMIA; the rest answer "Beta". */
export function sampleQuestions(count = 12): Question[] {
  const rest = Array.from({ length: count - 1 }, (_, i) => ({
    questionText: `Sample question ${i + 2}?`,
    options: ["Alpha", "Beta", "Gamma", "Delta"],
    correctAnswer: "Beta",
    explanation: `Sample explanation ${i + 2}.`,
  }));
  return [HYPERCALCAEMIA, ...rest];
}

export function sampleBank(count = 12): QuestionBank {
  return createQuestionBank(sampleQuestions(count));
}

/** mulberry32 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function testEnv(overrides: Partial<SessionEnv> = {}): SessionEnv {
  return { random: seededRandom(42), now: () => 1_700_000_000_000, shuffle: false, ...overrides };
}

export function isPermutation(order: readonly number[], size: number) {
  return order.length === size && [...order].sort((a, b) => a - b).every((v, i) => v === i);
}
