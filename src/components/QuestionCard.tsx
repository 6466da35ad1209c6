import type { Question } from "../Questions";
import { optionLabel } from "../quiz/format";
import Explanation from "./Explanation";

type Props = {
  position: number;
  question: Question;
  selected: string | null;
  submitted: boolean;
  correct: boolean | null;
  warning: string | null;
  showExplanation: boolean;
  onSelect: (optionText: string) => void;
  onSubmit: () => void;
};

export default function QuestionCard({
  position, question, selected, submitted, correct, warning, showExplanation, onSelect, onSubmit,
}: Props) {
  return (
    <section className="question">
      <h3>Question {position + 1}</h3>
      <div className="question-card">{question.questionText}</div>

      {submitted ? (
        <>
          <div className="your-answer"><strong>Your answer:</strong> {selected}</div>
          {showExplanation && <Explanation question={question} isCorrect={correct === true} />}
        </>
      ) : (
        <>
          <fieldset className="options">
            <legend>Select your answer:</legend>
            {question.options.map((opt, i) => (
              <label key={opt} className="choice">
                <input
                  type="radio"
                  name={`q${position}`}
                  value={opt}
                  checked={selected === opt}
                  onChange={() => onSelect(opt)}
                />
                <span>{optionLabel(i, opt)}</span>
              </label>
            ))}
          </fieldset>
          {warning && <div className="warning" role="alert">{warning}</div>}
          <button className="submit" onClick={onSubmit}>Submit Answer</button>
        </>
      )}
    </section>
  );
}
