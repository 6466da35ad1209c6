type Props = {
  canGoBack: boolean;
  canGoForward: boolean;
  onPrevious: () => void;
  onNext: () => void;
  onRestart: () => void;
};

export default function NavigationControls({ canGoBack, canGoForward, onPrevious, onNext, onRestart }: Props) {
  return (
    <div className="actions">
      <button className="prev" disabled={!canGoBack} onClick={onPrevious}>⏮ Previous</button>
      <button className="next" disabled={!canGoForward} onClick={onNext}>Next ⏭</button>
      <button className="restart" onClick={onRestart}>🔄 Restart Quiz</button>
    </div>
  );
}
