export { Seed } from './data/seed.js';
export { Size, Range } from './data/size.js';
export { Tree } from './data/tree.js';
export { Gen, Ints, GenerationError, DEFAULT_RETRY_LIMIT } from './gen.js';
export type { GeneratorFn, ArrayOptions } from './gen.js';
export { shrinkList, shrinkTowards, restartable } from './gen/shrink.js';
export type { Shrinker } from './gen/shrink.js';
export { Prop, TRIVIAL_LABEL } from './prop.js';
export type { Testable, PropFailure, StepContext } from './prop.js';
export {
  Property,
  forAll,
  forAllShrink,
  PropertyFailedError,
  PropertyGaveUpError,
} from './property.js';
export type { GenSource } from './property.js';
export { Config, ConfigSchema } from './config.js';
export type { ConfigOptions } from './config.js';
export type {
  TestResult,
  TestCase,
  TestStats,
  PassResult,
  FailResult,
  ErrorResult,
  GaveUpResult,
} from './result.js';
export * from './state.js';
