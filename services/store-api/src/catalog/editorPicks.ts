/** Source of uniform values in [0, 1) */
export type RandomSource = () => number;

/**
 * Draw up to `count` items uniformly without replacement, using a partial
 * Fisher-Yates shuffle over a copy of `pool`.
 */
export function sampleWithoutReplacement<T>(pool: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  const items = [...pool];
  const take = Math.min(count, items.length);

  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (items.length - i));
    const held = items[i];
    items[i] = items[j];
    items[j] = held;
  }

  return items.slice(0, take);
}
