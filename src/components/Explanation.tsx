import type { Question } from "../Questions";

type Props = { question: Question; isCorrect: boolean };

export default function Explanation({ question, isCorrect }: Props) {
  return (
    <div className="result">
      {isCorrect ? (
        <div className="correct-highlight">✅ Correct answer!</div>
      ) : (
        <div className="incorrect-highlight">
          ❌ Correct answer: <strong>{question.correctAnswer}</strong>
        </div>
      )}
      <div className={`explanation-box ${isCorrect ? "explanation-correct" : "explanation-incorrect"}`}>
        <strong>Explanation:</strong> {question.explanation}
      </div>
    </div>
  );
}
