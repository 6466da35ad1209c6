// Questions.ts — question bank types and validation.
// The bank is external data (src/questions.json, or window.__QUESTIONS__ set by the host page),
// so every entry is checked before the quiz starts.

export type Question = {
  questionText: string;
  options: readonly string[];
  correctAnswer: string;
  explanation: string;
};

export type QuestionBank = {
  readonly size: number;
  readonly questions: readonly Question[];
  at(index: number): Question;
};

export class QuestionBankError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QuestionBankError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseQuestion(raw: unknown, i: number): Question {
  const where = `question ${i + 1}`;
  if (!isRecord(raw)) throw new QuestionBankError(`${where}: expected an object`);

  const { questionText, options, correctAnswer, explanation } = raw;
  if (typeof questionText !== "string" || !questionText.trim()) {
    throw new QuestionBankError(`${where}: questionText must be a non-empty string`);
  }
  if (!Array.isArray(options) || options.length < 2) {
    throw new QuestionBankError(`${where}: options must list at least two answers`);
  }
  const opts: string[] = [];
  for (const o of options) {
    if (typeof o !== "string" || !o.trim()) {
      throw new QuestionBankError(`${where}: every option must be a non-empty string`);
    }
    if (opts.includes(o)) throw new QuestionBankError(`${where}: duplicate option "${o}"`);
    opts.push(o);
  }
  if (typeof correctAnswer !== "string" || !opts.includes(correctAnswer)) {
    throw new QuestionBankError(`${where}: correctAnswer must match one of the options verbatim`);
  }
  if (typeof explanation !== "string") {
    throw new QuestionBankError(`${where}: explanation must be a string`);
  }
  return Object.freeze({ questionText, options: Object.freeze(opts), correctAnswer, explanation });
}

export function createQuestionBank(questions: Question[]): QuestionBank {
  const frozen = Object.freeze(questions.slice());
  return Object.freeze({
    size: frozen.length,
    questions: frozen,
    at(index: number): Question {
      const q = frozen[index];
      if (!Number.isInteger(index) || q === undefined) {
        throw new RangeError(`No question at position ${index} (bank has ${frozen.length})`);
      }
      return q;
    },
  });
}

export function parseQuestionBank(raw: unknown): QuestionBank {
  if (!Array.isArray(raw)) throw new QuestionBankError("Question bank must be an array of questions");
  if (raw.length === 0) throw new QuestionBankError("Question bank is empty");
  return createQuestionBank(raw.map((q, i) => parseQuestion(q, i)));
}
