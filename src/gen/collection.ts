import { GeneratorFn, create, sized } from './core.js';
import { Tree } from '../data/tree.js';
import { shrinkList } from './shrink.js';

/**
 * Collection generators.
 */

export interface ArrayOptions {
  minLength?: number;
  maxLength?: number;
  length?: number;
}

/**
 * Generate arrays whose length is bounded by the size unless `maxLength` says
 * otherwise.
 */
export function array<T>(
  elementGen: GeneratorFn<T>,
  options: ArrayOptions = {}
): GeneratorFn<T[]> {
  const { minLength = 0, maxLength, length } = options;

  if (length !== undefined) {
    return arrayOfLength(elementGen, length);
  }

  return sized((size) => {
    const finalMaxLength = Math.max(minLength, maxLength ?? size.get());

    return create((innerSize, seed) => {
      const [offset, next] = seed.nextBounded(finalMaxLength - minLength + 1);
      const tree = arrayOfLength(elementGen, minLength + offset)(
        innerSize,
        next
      );
      return minLength === 0 ? tree : atLeast(tree, minLength);
    });
  });
}

/**
 * Generate arrays of exactly the given length. Shrinks drop elements before
 * shrinking individual elements.
 */
export function arrayOfLength<T>(
  elementGen: GeneratorFn<T>,
  length: number
): GeneratorFn<T[]> {
  return create((size, seed) => {
    const elementTrees: Tree<T>[] = [];
    let currentSeed = seed;

    for (let i = 0; i < length; i++) {
      const [elementSeed, nextSeed] = currentSeed.split();
      elementTrees.push(elementGen(size, elementSeed));
      currentSeed = nextSeed;
    }

    return Tree.unfold(elementTrees, (trees) =>
      shrinkList(trees, (tree) => tree.children)
    ).map((trees) => trees.map((tree) => tree.value));
  });
}

function atLeast<T>(tree: Tree<T[]>, minLength: number): Tree<T[]> {
  return new Tree(tree.value, function* () {
    for (const child of tree.iterateChildren()) {
      if (child.value.length >= minLength) {
        yield atLeast(child, minLength);
      }
    }
  });
}
