export type RandomSource = () => number;

/** Fisher–Yates over a copy; `random` must return values in [0, 1). */
export function shuffleArray<T>(arr: readonly T[], random: RandomSource = Math.random): T[] {
  const copy = arr.slice();
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

export function shuffledOrder(size: number, random: RandomSource = Math.random): number[] {
  return shuffleArray(Array.from({ length: size }, (_, i) => i), random);
}

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n));
}
