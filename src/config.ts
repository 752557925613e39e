import { z } from 'zod';
import { DEFAULT_RETRY_LIMIT } from './gen/core.js';

const limit = z.number().int().nonnegative();

/**
 * Schema for the options accepted by `Config`.
 */
export const ConfigSchema = z.object({
  testLimit: limit.default(100),
  shrinkLimit: limit.default(1000),
  sizeLimit: limit.default(100),
  discardLimit: limit.default(100),
  retryLimit: limit.min(1).default(DEFAULT_RETRY_LIMIT),
});

export type ConfigOptions = z.input<typeof ConfigSchema>;

/**
 * Configuration for property testing.
 */
export class Config {
  /** Maximum number of tests to run. */
  public readonly testLimit: number;
  /** Maximum number of shrink candidates to try when a test fails. */
  public readonly shrinkLimit: number;
  /** Maximum size parameter to use for generation. */
  public readonly sizeLimit: number;
  /** Maximum number of discards before giving up. */
  public readonly discardLimit: number;
  /** Attempts a retry-filter makes before reporting exhaustion. */
  public readonly retryLimit: number;

  /**
   * Accepts either an options object or positional limits. Invalid limits
   * raise a `ZodError`.
   */
  constructor(
    configOrTestLimit?: ConfigOptions | number,
    shrinkLimit?: number,
    sizeLimit?: number,
    discardLimit?: number,
    retryLimit?: number
  ) {
    const options =
      typeof configOrTestLimit === 'object'
        ? configOrTestLimit
        : {
            testLimit: configOrTestLimit,
            shrinkLimit,
            sizeLimit,
            discardLimit,
            retryLimit,
          };
    const parsed = ConfigSchema.parse(options);

    this.testLimit = parsed.testLimit;
    this.shrinkLimit = parsed.shrinkLimit;
    this.sizeLimit = parsed.sizeLimit;
    this.discardLimit = parsed.discardLimit;
    this.retryLimit = parsed.retryLimit;
  }

  static default(): Config {
    return new Config();
  }

  private with(overrides: ConfigOptions): Config {
    return new Config({
      testLimit: this.testLimit,
      shrinkLimit: this.shrinkLimit,
      sizeLimit: this.sizeLimit,
      discardLimit: this.discardLimit,
      retryLimit: this.retryLimit,
      ...overrides,
    });
  }

  withTests(tests: number): Config {
    return this.with({ testLimit: tests });
  }

  withShrinks(shrinks: number): Config {
    return this.with({ shrinkLimit: shrinks });
  }

  withSizeLimit(size: number): Config {
    return this.with({ sizeLimit: size });
  }

  withDiscardLimit(discards: number): Config {
    return this.with({ discardLimit: discards });
  }

  withRetryLimit(retries: number): Config {
    return this.with({ retryLimit: retries });
  }

  toString(): string {
    return `Config(tests: ${this.testLimit}, shrinks: ${this.shrinkLimit}, size: ${this.sizeLimit}, discards: ${this.discardLimit}, retries: ${this.retryLimit})`;
  }
}
