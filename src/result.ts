/**
 * Outcomes of a property run.
 */

import { Size } from './data/size.js';
import { Seed } from './data/seed.js';
import { Prop } from './prop.js';

export interface TestCase<T> {
  readonly value: T;
  readonly size: Size;
  readonly seed: Seed;
}

export interface TestStats {
  /** Passed test cases, examples included. */
  readonly testsRun: number;
  readonly testsDiscarded: number;
  /** Successful shrink steps. */
  readonly shrinkSteps: number;
  /** How many test cases carried each label. */
  readonly labels: ReadonlyMap<string, number>;
}

export type TestResult<T> =
  | PassResult
  | FailResult<T>
  | ErrorResult
  | GaveUpResult;

export interface PassResult {
  readonly type: 'pass';
  readonly stats: TestStats;
}

export interface FailResult<T> {
  readonly type: 'fail';
  readonly stats: TestStats;
  readonly originalFailure: TestCase<T>;
  /** Smallest failing value the shrink search reached. */
  readonly counterexample: TestCase<T>;
  /** Each smaller failing value found on the way, in order. */
  readonly shrinkPath: TestCase<T>[];
  /** The failing outcome of the counterexample. */
  readonly failure: Prop;
  /**
   * Set when producing shrink candidates raised an exception. Shrinking
   * stopped at the counterexample.
   */
  readonly shrinkFault?: Prop;
}

/**
 * User code raised an exception while a test case was being generated, so
 * there is no value to report or shrink.
 */
export interface ErrorResult {
  readonly type: 'error';
  readonly stats: TestStats;
  readonly size: Size;
  readonly seed: Seed;
  readonly failure: Prop;
}

export interface GaveUpResult {
  readonly type: 'gave-up';
  readonly stats: TestStats;
  readonly reason: string;
}

export const emptyStats = (): TestStats => ({
  testsRun: 0,
  testsDiscarded: 0,
  shrinkSteps: 0,
  labels: new Map(),
});

export const countPassed = (stats: TestStats): TestStats => ({
  ...stats,
  testsRun: stats.testsRun + 1,
});

export const countDiscarded = (stats: TestStats): TestStats => ({
  ...stats,
  testsDiscarded: stats.testsDiscarded + 1,
});

export const countShrinks = (stats: TestStats, steps: number): TestStats => ({
  ...stats,
  shrinkSteps: stats.shrinkSteps + steps,
});

export function countLabels(
  stats: TestStats,
  labels: readonly string[]
): TestStats {
  if (labels.length === 0) {
    return stats;
  }
  const counts = new Map(stats.labels);
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return { ...stats, labels: counts };
}
