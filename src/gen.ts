// Public interface for generators
import {
  GeneratorFn,
  DEFAULT_RETRY_LIMIT,
  create,
  sized,
  constant,
  oneOf,
  frequency,
  tryWhere,
  filter,
} from './gen/core.js';
import { Size, Range } from './data/size.js';
import { Seed } from './data/seed.js';
import { Tree } from './data/tree.js';
import { bool, int, item } from './gen/primitive.js';
import { array, arrayOfLength, ArrayOptions } from './gen/collection.js';

/**
 * A description of a random, size-aware computation producing shrinkable
 * values. Nothing runs until `generate` is called with a size and a seed.
 */
export class Gen<T> {
  constructor(public readonly generator: GeneratorFn<T>) {}

  generate(size: Size, seed: Seed): Tree<T> {
    return this.generator(size, seed);
  }

  map<U>(fn: (value: T) => U): Gen<U> {
    return new Gen((size, seed) => this.generate(size, seed).map(fn));
  }

  /**
   * Feed each generated value into a dependent generator. Shrinks follow the
   * dependent generator only.
   */
  chain<U>(fn: (value: T) => Gen<U>): Gen<U> {
    return new Gen((size, seed) => {
      const [leftSeed, rightSeed] = seed.split();
      const tree = this.generate(size, leftSeed);
      return fn(tree.value).generate(size, rightSeed);
    });
  }

  bind<U>(fn: (value: T) => Gen<U>): Gen<U> {
    return this.chain(fn);
  }

  /**
   * Resample until the predicate holds, yielding `undefined` after `maxTries`
   * rejected attempts.
   */
  tryWhere(
    predicate: (value: T) => boolean,
    maxTries: number = DEFAULT_RETRY_LIMIT
  ): Gen<T | undefined> {
    return new Gen(tryWhere(this.generator, predicate, maxTries));
  }

  /**
   * Like `tryWhere`, but a generator that never satisfies the predicate is an
   * error.
   */
  filter(
    predicate: (value: T) => boolean,
    maxTries: number = DEFAULT_RETRY_LIMIT
  ): Gen<T> {
    return new Gen(filter(this.generator, predicate, maxTries));
  }

  resize(fn: (size: Size) => Size): Gen<T> {
    return new Gen((size, seed) => this.generate(fn(size), seed));
  }

  withSize(size: number): Gen<T> {
    return this.resize(() => Size.of(size));
  }

  sample(seed?: Seed, size?: Size): T {
    return this.generate(size ?? Size.of(10), seed ?? Seed.random()).value;
  }

  samples(count: number, seed?: Seed, size?: Size): T[] {
    let currentSeed = seed ?? Seed.random();
    const actualSize = size ?? Size.of(10);
    const results: T[] = [];

    for (let i = 0; i < count; i++) {
      const [sampleSeed, nextSeed] = currentSeed.split();
      results.push(this.generate(actualSize, sampleSeed).value);
      currentSeed = nextSeed;
    }

    return results;
  }

  static create<T>(fn: GeneratorFn<T>): Gen<T> {
    return new Gen(create(fn));
  }

  static sized<T>(fn: (size: Size) => Gen<T>): Gen<T> {
    return new Gen(sized((size) => fn(size).generator));
  }

  static constant<T>(value: T): Gen<T> {
    return new Gen(constant(value));
  }

  static pure<T>(value: T): Gen<T> {
    return Gen.constant(value);
  }

  static delay<T>(fn: () => Gen<T>): Gen<T> {
    return new Gen((size, seed) => fn().generate(size, seed));
  }

  static oneOf<T>(gens: Gen<T>[]): Gen<T> {
    return new Gen(oneOf(gens.map((g) => g.generator)));
  }

  static frequency<T>(choices: Array<[number, Gen<T>]>): Gen<T> {
    return new Gen(
      frequency(
        choices.map(
          ([weight, gen]): [number, GeneratorFn<T>] => [weight, gen.generator]
        )
      )
    );
  }

  static item<T>(items: readonly T[]): Gen<T> {
    return new Gen(item(items));
  }

  static bool(): Gen<boolean> {
    return new Gen(bool());
  }

  static int(range: Range): Gen<number> {
    return new Gen(int(range));
  }

  static array<T>(gen: Gen<T>, options?: ArrayOptions): Gen<T[]> {
    return new Gen(array(gen.generator, options));
  }

  static arrayOfLength<T>(gen: Gen<T>, length: number): Gen<T[]> {
    return new Gen(arrayOfLength(gen.generator, length));
  }
}

export type { GeneratorFn } from './gen/core.js';
export type { ArrayOptions } from './gen/collection.js';
export { GenerationError, DEFAULT_RETRY_LIMIT } from './gen/core.js';

export const Ints = {
  /** Small non-negative integers [0, 100] */
  small: (): Gen<number> => Gen.int(Range.uniform(0, 100)),

  /** Integers in a specific range */
  range: (min: number, max: number): Gen<number> =>
    Gen.int(Range.uniform(min, max)),
} as const;
