import { GeneratorFn, GenerationError, create } from './core.js';
import { Range } from '../data/size.js';
import { Tree } from '../data/tree.js';
import { numericTree } from './shrink.js';

/**
 * Generate a boolean; `true` shrinks to `false`.
 */
export function bool(): GeneratorFn<boolean> {
  return create((_size, seed) => {
    const [value] = seed.nextBool();
    return value
      ? Tree.withChildren(true, [Tree.singleton(false)])
      : Tree.singleton(false);
  });
}

/**
 * Generate an integer within a range, shrinking toward the range origin.
 */
export function int(range: Range): GeneratorFn<number> {
  return create((_size, seed) => {
    const [offset] = seed.nextBounded(range.size() + 1);
    return numericTree(range.min + offset, range.origin);
  });
}

/**
 * Pick one of the given items, shrinking toward earlier items.
 */
export function item<T>(items: readonly T[]): GeneratorFn<T> {
  if (items.length === 0) {
    throw new GenerationError('item requires at least one item');
  }

  return create((size, seed) =>
    int(Range.uniform(0, items.length - 1))(size, seed).map(
      (index) => items[index]
    )
  );
}
