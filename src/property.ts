/**
 * Core property testing functionality.
 */

import { Gen, GenerationError } from './gen.js';
import { Size } from './data/size.js';
import { Seed } from './data/seed.js';
import { Tree } from './data/tree.js';
import { Shrinker } from './gen/shrink.js';
import { Config } from './config.js';
import { Prop, Testable } from './prop.js';
import {
  TestResult,
  TestCase,
  TestStats,
  FailResult,
  ErrorResult,
  GaveUpResult,
  emptyStats,
  countPassed,
  countDiscarded,
  countShrinks,
  countLabels,
} from './result.js';

/**
 * A generator, or a recipe for one that depends on the run's configuration.
 */
export type GenSource<T> = Gen<T> | ((config: Config) => Gen<T>);

type LabelFn<T> = (value: T) => string | null;

/**
 * Thrown by `Property.check` when a counterexample was found or user code
 * faulted while generating a test case.
 */
export class PropertyFailedError<T> extends Error {
  constructor(public readonly result: FailResult<T> | ErrorResult) {
    const reasons = result.failure.failures.map((f) => f.message).join('; ');
    super(
      `Property failed after ${result.stats.testsRun} passed tests and ${result.stats.shrinkSteps} shrinks: ${reasons}`
    );
    this.name = 'PropertyFailedError';
  }
}

/**
 * Thrown by `Property.check` when too many test cases were discarded.
 */
export class PropertyGaveUpError extends Error {
  constructor(public readonly result: GaveUpResult) {
    super(`Property gave up: ${result.reason}`);
    this.name = 'PropertyGaveUpError';
  }
}

/**
 * A property that can be tested.
 *
 * Without a shrinker, failing values shrink along the generator's own tree.
 * With one, the generator's tree is ignored and candidates come from the
 * shrinker alone.
 */
export class Property<T> {
  constructor(
    private readonly generator: GenSource<T>,
    private readonly predicate: (value: T) => Testable,
    private readonly shrinker?: Shrinker<T>,
    private readonly labels: LabelFn<T>[] = [],
    private readonly examples: T[] = []
  ) {}

  private derive(labels: LabelFn<T>[], examples: T[]): Property<T> {
    return new Property(
      this.generator,
      this.predicate,
      this.shrinker,
      labels,
      examples
    );
  }

  /**
   * Add a label to classify test cases.
   */
  classify(label: string, condition: (value: T) => boolean): Property<T> {
    const labelFn = (value: T) => (condition(value) ? label : null);
    return this.derive([...this.labels, labelFn], this.examples);
  }

  /**
   * Collect statistics about generated values.
   */
  collect(labelFn: (value: T) => string): Property<T> {
    return this.derive([...this.labels, labelFn], this.examples);
  }

  /**
   * Test a value before random generation. Failing examples are not shrunk.
   */
  withExample(example: T): Property<T> {
    return this.derive(this.labels, [...this.examples, example]);
  }

  withExamples(examples: T[]): Property<T> {
    return this.derive(this.labels, [...this.examples, ...examples]);
  }

  run(
    config: Config = Config.default(),
    seed: Seed = Seed.random()
  ): TestResult<T> {
    const generator =
      this.generator instanceof Gen ? this.generator : this.generator(config);
    return new PropertyRun(
      generator,
      this.predicate,
      this.shrinker,
      this.labels,
      config
    ).execute(seed, this.examples);
  }

  /**
   * Run the property, throwing `PropertyFailedError` or `PropertyGaveUpError`
   * when it does not pass.
   */
  check(config: Config = Config.default(), seed: Seed = Seed.random()): void {
    const result = this.run(config, seed);

    if (result.type === 'fail' || result.type === 'error') {
      throw new PropertyFailedError(result);
    } else if (result.type === 'gave-up') {
      throw new PropertyGaveUpError(result);
    }
  }
}

/**
 * Create a property that shrinks along the generator's tree.
 */
export function forAll<T>(
  generator: GenSource<T>,
  predicate: (value: T) => Testable
): Property<T> {
  return new Property(generator, predicate);
}

/**
 * Create a property that shrinks failing values with an explicit shrinker.
 */
export function forAllShrink<T>(
  generator: GenSource<T>,
  shrinker: Shrinker<T>,
  predicate: (value: T) => Testable
): Property<T> {
  return new Property(generator, predicate, shrinker);
}

/**
 * One run of a property under a fixed configuration.
 */
class PropertyRun<T> {
  private stats: TestStats = emptyStats();

  constructor(
    private readonly generator: Gen<T>,
    private readonly predicate: (value: T) => Testable,
    private readonly shrinker: Shrinker<T> | undefined,
    private readonly labels: LabelFn<T>[],
    private readonly config: Config
  ) {}

  execute(seed: Seed, examples: T[]): TestResult<T> {
    let currentSeed = seed;

    for (const example of examples) {
      const [exampleSeed, nextSeed] = currentSeed.split();
      currentSeed = nextSeed;

      const testCase: TestCase<T> = {
        value: example,
        size: Size.of(0),
        seed: exampleSeed,
      };
      const outcome = this.evaluate(example);
      if (!outcome.passed) {
        return {
          type: 'fail',
          stats: this.stats,
          originalFailure: testCase,
          counterexample: testCase,
          shrinkPath: [],
          failure: outcome,
        };
      }
      this.stats = countPassed(this.stats);
    }

    let discardCount = 0;

    for (let testNum = 0; testNum < this.config.testLimit; testNum++) {
      // Size grows linearly with the test number.
      const size = Size.of(
        Math.min(
          this.config.sizeLimit,
          Math.floor((testNum * this.config.sizeLimit) / this.config.testLimit)
        )
      );

      const [testSeed, nextSeed] = currentSeed.split();
      currentSeed = nextSeed;

      let tree: Tree<T>;
      try {
        tree = this.generator.generate(size, testSeed);
      } catch (error) {
        // Anything but an exhausted filter is a fault in user code.
        if (!(error instanceof GenerationError)) {
          return {
            type: 'error',
            stats: this.stats,
            size,
            seed: testSeed,
            failure: Prop.exception(error),
          };
        }
        discardCount++;
        this.stats = countDiscarded(this.stats);
        if (discardCount >= this.config.discardLimit) {
          return {
            type: 'gave-up',
            stats: this.stats,
            reason: `Too many discarded tests (${discardCount}/${this.config.discardLimit})`,
          };
        }
        continue;
      }

      const testCase: TestCase<T> = { value: tree.value, size, seed: testSeed };
      const outcome = this.evaluate(tree.value);

      if (!outcome.passed) {
        const shrinkTree =
          this.shrinker === undefined
            ? tree
            : Tree.unfold(tree.value, this.shrinker);
        return this.shrinkFailure(shrinkTree, testCase, outcome);
      }
      this.stats = countPassed(this.stats);
    }

    return { type: 'pass', stats: this.stats };
  }

  /**
   * Evaluate the predicate and record labels. User code that throws yields
   * a failing outcome carrying the thrown value.
   */
  private evaluate(value: T): Prop {
    const outcome = Prop.evaluate(() => this.predicate(value));
    const labels = [...outcome.labels];
    for (const labelFn of this.labels) {
      const label = labelFn(value);
      if (label !== null && !labels.includes(label)) {
        labels.push(label);
      }
    }
    this.stats = countLabels(this.stats, labels);
    return outcome;
  }

  /**
   * Depth-first search for a minimal failing value: at each level take the
   * first child that still fails, until no child fails or the shrink limit
   * is spent. A shrinker that throws ends the search where it stands.
   */
  private shrinkFailure(
    failingTree: Tree<T>,
    originalFailure: TestCase<T>,
    originalOutcome: Prop
  ): FailResult<T> {
    const path: TestCase<T>[] = [];
    let current = failingTree;
    let failure = originalOutcome;
    let shrinkFault: Prop | undefined;
    let attempts = 0;

    try {
      search: while (attempts < this.config.shrinkLimit) {
        for (const child of current.iterateChildren()) {
          if (attempts >= this.config.shrinkLimit) {
            break search;
          }
          attempts++;

          const outcome = Prop.evaluate(() => this.predicate(child.value));
          if (!outcome.passed) {
            current = child;
            failure = outcome;
            path.push({
              value: child.value,
              size: originalFailure.size,
              seed: originalFailure.seed,
            });
            continue search;
          }
        }
        break;
      }
    } catch (error) {
      shrinkFault = Prop.exception(error);
    }

    return {
      type: 'fail',
      stats: countShrinks(this.stats, path.length),
      originalFailure,
      counterexample: {
        value: current.value,
        size: originalFailure.size,
        seed: originalFailure.seed,
      },
      shrinkPath: path,
      failure,
      ...(shrinkFault === undefined ? {} : { shrinkFault }),
    };
  }
}
