/**
 * Splittable SplitMix64 random seed on 64-bit `bigint` arithmetic.
 *
 * Seeds are immutable: every draw returns the value together with the
 * advanced seed, and `split` yields two independent streams.
 */
export class Seed {
  constructor(
    public readonly state: bigint,
    public readonly gamma: bigint
  ) {}

  /**
   * Create a seed from an integer.
   */
  static fromNumber(value: number): Seed {
    const state = mix64(BigInt(Math.floor(value)));
    return new Seed(state, mixGamma(state));
  }

  /**
   * Create a seed from the clock and `Math.random`.
   */
  static random(): Seed {
    const entropy =
      BigInt(Date.now()) ^ BigInt(Math.floor(Math.random() * 0x100000000));
    return Seed.fromNumber(Number(entropy & 0xffffffffn));
  }

  private next(): [bigint, Seed] {
    const state = wrap64(this.state + this.gamma);
    return [mix64(state), new Seed(state, this.gamma)];
  }

  split(): [Seed, Seed] {
    const [output, advanced] = this.next();
    return [advanced, new Seed(output, mixGamma(output))];
  }

  /**
   * Next unsigned 32-bit value, taken from the upper half of the output.
   */
  nextUint32(): [number, Seed] {
    const [output, advanced] = this.next();
    return [Number(output >> 32n), advanced];
  }

  /**
   * Next integer in [0, bound).
   */
  nextBounded(bound: number): [number, Seed] {
    const [value, advanced] = this.nextUint32();
    return [Math.floor((value / 0x100000000) * bound), advanced];
  }

  /**
   * Next float in [0, 1).
   */
  nextFloat(): [number, Seed] {
    const [value, advanced] = this.nextUint32();
    return [value / 0x100000000, advanced];
  }

  nextBool(): [boolean, Seed] {
    const [output, advanced] = this.next();
    return [(output & 1n) === 1n, advanced];
  }

  toString(): string {
    return `Seed(${this.state}, ${this.gamma})`;
  }
}

const MASK_64 = (1n << 64n) - 1n;

function wrap64(n: bigint): bigint {
  return n & MASK_64;
}

function mix64(z: bigint): bigint {
  z = wrap64(z + 0x9e3779b97f4a7c15n);
  z = wrap64((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n);
  z = wrap64((z ^ (z >> 27n)) * 0x94d049bb133111ebn);
  return z ^ (z >> 31n);
}

// Gamma must be odd for a full period.
function mixGamma(z: bigint): bigint {
  return wrap64((mix64(z) | 1n) * 0x9e3779b97f4a7c15n);
}
