export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
  if (max <= min) return min;
  return min + random() * (max - min);
}
