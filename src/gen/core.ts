import { Seed } from '../data/seed.js';
import { Size } from '../data/size.js';
import { Tree } from '../data/tree.js';

/**
 * Generator function type.
 */
export type GeneratorFn<T> = (size: Size, seed: Seed) => Tree<T>;

/**
 * Default number of attempts a retry-filter makes before reporting exhaustion.
 */
export const DEFAULT_RETRY_LIMIT = 100;

/**
 * Raised when a generator cannot produce a value at all.
 */
export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
  }
}

export function create<T>(fn: GeneratorFn<T>): GeneratorFn<T> {
  return fn;
}

/**
 * Create a generator function that accesses the current size.
 */
export function sized<T>(fn: (size: Size) => GeneratorFn<T>): GeneratorFn<T> {
  return (size, seed) => fn(size)(size, seed);
}

export function constant<T>(value: T): GeneratorFn<T> {
  return () => Tree.singleton(value);
}

/**
 * Choose from generator functions with equal probability.
 */
export function oneOf<T>(generators: GeneratorFn<T>[]): GeneratorFn<T> {
  if (generators.length === 0) {
    throw new GenerationError('oneOf requires at least one generator');
  }

  return (size, seed) => {
    const [index, next] = seed.nextBounded(generators.length);
    return generators[index](size, next);
  };
}

/**
 * Choose from alternatives with weighted probabilities.
 */
export function frequency<T>(
  choices: Array<[number, GeneratorFn<T>]>
): GeneratorFn<T> {
  if (choices.length === 0) {
    throw new GenerationError('frequency requires at least one choice');
  }

  const totalWeight = choices.reduce((sum, [weight]) => sum + weight, 0);
  if (totalWeight <= 0) {
    throw new GenerationError('frequency requires positive total weight');
  }

  return (size, seed) => {
    const [randomValue, next] = seed.nextFloat();
    const target = randomValue * totalWeight;

    let currentWeight = 0;
    for (const [weight, gen] of choices) {
      currentWeight += weight;
      if (target < currentWeight) {
        return gen(size, next);
      }
    }

    // Rounding can leave target at the very top of the last bucket.
    return choices[choices.length - 1][1](size, next);
  };
}

/**
 * Resample on fresh seeds until a value satisfies the predicate.
 *
 * Returns `undefined` once `maxTries` attempts have all been rejected. Shrinks
 * of an accepted value are kept only where they satisfy the predicate too.
 */
export function firstWhere<T>(
  generator: GeneratorFn<T>,
  predicate: (value: T) => boolean,
  maxTries: number,
  size: Size,
  seed: Seed
): Tree<T> | undefined {
  let currentSeed = seed;

  for (let attempt = 0; attempt < maxTries; attempt++) {
    const [attemptSeed, nextSeed] = currentSeed.split();
    const tree = generator(size, attemptSeed);
    if (predicate(tree.value)) {
      return keepWhere(tree, predicate);
    }
    currentSeed = nextSeed;
  }

  return undefined;
}

/**
 * Generator form of `firstWhere`: exhaustion is the value `undefined`.
 */
export function tryWhere<T>(
  generator: GeneratorFn<T>,
  predicate: (value: T) => boolean,
  maxTries: number = DEFAULT_RETRY_LIMIT
): GeneratorFn<T | undefined> {
  assertRetryLimit(maxTries);
  return (size, seed) =>
    firstWhere(generator, predicate, maxTries, size, seed) ??
    Tree.singleton<T | undefined>(undefined);
}

/**
 * Generator form of `firstWhere` that raises `GenerationError` on exhaustion.
 */
export function filter<T>(
  generator: GeneratorFn<T>,
  predicate: (value: T) => boolean,
  maxTries: number = DEFAULT_RETRY_LIMIT
): GeneratorFn<T> {
  assertRetryLimit(maxTries);
  return (size, seed) => {
    const tree = firstWhere(generator, predicate, maxTries, size, seed);
    if (tree === undefined) {
      throw new GenerationError(
        `Failed to generate value satisfying predicate after ${maxTries} attempts`
      );
    }
    return tree;
  };
}

export function assertRetryLimit(maxTries: number): void {
  if (!Number.isInteger(maxTries) || maxTries < 1) {
    throw new RangeError(
      `Retry limit must be a positive integer, got ${maxTries}`
    );
  }
}

function keepWhere<T>(tree: Tree<T>, predicate: (value: T) => boolean): Tree<T> {
  return new Tree(tree.value, function* () {
    for (const child of tree.iterateChildren()) {
      if (predicate(child.value)) {
        yield keepWhere(child, predicate);
      }
    }
  });
}
