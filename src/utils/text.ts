/**
 * Small text helpers shared by the filter and the quality scorers.
 */

/**
 * Count whitespace-separated words.
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Mean of a list of numbers; 0 for an empty list.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Length in code points, so an emoji or other astral character counts once.
 */
export function charLength(text: string): number {
  return [...text].length;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Fraction of `items` satisfying `predicate`, scaled to `weight`.
 * An empty list contributes 0.
 */
export function proportion<T>(
  items: readonly T[],
  predicate: (item: T) => boolean,
  weight: number
): number {
  if (items.length === 0) {
    return 0;
  }
  return (items.filter(predicate).length / items.length) * weight;
}
