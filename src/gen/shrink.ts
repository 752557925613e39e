/**
 * Shrinking utilities.
 *
 * Shrinkers here are plain functions from a value to the smaller values worth
 * trying next. The iterables they return are lazy and can be iterated again
 * from the start.
 */

import { Tree } from '../data/tree.js';

/**
 * Produces the candidates one step smaller than a value.
 */
export type Shrinker<T> = (value: T) => Iterable<T>;

/**
 * Wrap a generator function as an iterable that starts over on each iteration.
 */
export function restartable<T>(produce: () => Iterator<T>): Iterable<T> {
  return { [Symbol.iterator]: produce };
}

/**
 * Shrink a list structurally.
 *
 * First removes contiguous chunks of length n, n/2, n/4, ..., 1 at each
 * aligned offset, then, when an element shrinker is given, replaces one
 * element at a time with each of its shrinks. Every candidate is either
 * shorter or equally long with exactly one element smaller.
 */
export function shrinkList<T>(
  list: readonly T[],
  shrinkElement?: Shrinker<T>
): Iterable<T[]> {
  return restartable(function* () {
    yield* removeChunks(list);
    if (shrinkElement !== undefined) {
      yield* shrinkOneElement(list, shrinkElement);
    }
  });
}

function* removeChunks<T>(list: readonly T[]): Generator<T[]> {
  const n = list.length;
  for (let k = n; k > 0; k = Math.floor(k / 2)) {
    for (let start = 0; start + k <= n; start += k) {
      yield [...list.slice(0, start), ...list.slice(start + k)];
    }
  }
}

function* shrinkOneElement<T>(
  list: readonly T[],
  shrinkElement: Shrinker<T>
): Generator<T[]> {
  for (let i = 0; i < list.length; i++) {
    for (const smaller of shrinkElement(list[i])) {
      yield [...list.slice(0, i), smaller, ...list.slice(i + 1)];
    }
  }
}

/**
 * Numeric shrinks toward an origin: the origin first, then values closing
 * half of the remaining distance each time, ending next to the value.
 */
export function shrinkTowards(value: number, origin: number): number[] {
  if (value === origin || !Number.isFinite(value)) {
    return [];
  }

  const shrinks: number[] = [];
  const distance = value - origin;
  for (
    let step = distance;
    Math.abs(step) >= 1;
    step = Math.trunc(step / 2)
  ) {
    shrinks.push(value - step);
  }
  return shrinks;
}

/**
 * Numeric shrink tree toward an origin.
 */
export function numericTree(value: number, origin: number): Tree<number> {
  return Tree.unfold(value, (current) => shrinkTowards(current, origin));
}
