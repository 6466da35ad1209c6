const pad2 = (n: number) => String(n).padStart(2, "0");

/** `HH:MM:SS`; hours keep counting past 24. */
export function formatElapsed(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

export function formatAccuracy(accuracy: number | null): string {
  return accuracy == null ? "N/A" : `${accuracy.toFixed(1)}%`;
}

export function optionLabel(i: number, text: string): string {
  return `${String.fromCharCode(65 + i)}. ${text}`;
}
