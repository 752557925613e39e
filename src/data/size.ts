/**
 * Size parameter driving how large generated values may grow.
 *
 * The property runner walks it from 0 up to the configured size limit.
 */
export class Size {
  constructor(readonly value: number) {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Size must be a non-negative integer, got ${value}`);
    }
  }

  static of(value: number): Size {
    return new Size(value);
  }

  get(): number {
    return this.value;
  }

  scale(factor: number): Size {
    return new Size(Math.floor(this.value * factor));
  }

  clamp(max: number): Size {
    return new Size(Math.min(this.value, max));
  }

  toString(): string {
    return `Size(${this.value})`;
  }
}

/**
 * Inclusive integer range with the origin that shrinking moves toward.
 */
export class Range {
  readonly origin: number;

  constructor(
    public readonly min: number,
    public readonly max: number,
    origin?: number
  ) {
    if (min > max) {
      throw new RangeError(`Range min must be <= max, got [${min}, ${max}]`);
    }
    this.origin = origin ?? (min <= 0 && max >= 0 ? 0 : min);
    if (!this.contains(this.origin)) {
      throw new RangeError(
        `Range origin ${this.origin} lies outside [${min}, ${max}]`
      );
    }
  }

  static uniform(min: number, max: number): Range {
    return new Range(min, max);
  }

  static constant(value: number): Range {
    return new Range(value, value, value);
  }

  withOrigin(origin: number): Range {
    return new Range(this.min, this.max, origin);
  }

  contains(value: number): boolean {
    return value >= this.min && value <= this.max;
  }

  size(): number {
    return this.max - this.min;
  }
}
