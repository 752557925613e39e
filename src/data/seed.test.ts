import { describe, test, expect } from 'vitest';
import { Seed } from './seed.js';

describe('Seed', () => {
  test('same starting number gives the same stream', () => {
    const [a1, s1] = Seed.fromNumber(42).nextUint32();
    const [a2, s2] = Seed.fromNumber(42).nextUint32();

    expect(a1).toBe(a2);
    expect(s1.state).toBe(s2.state);
    expect(s1.nextUint32()[0]).toBe(s2.nextUint32()[0]);
  });

  test('different starting numbers give different states', () => {
    expect(Seed.fromNumber(1).state).not.toBe(Seed.fromNumber(2).state);
  });

  test('gamma is odd', () => {
    for (const n of [0, 1, 7, 12345]) {
      expect(Seed.fromNumber(n).gamma & 1n).toBe(1n);
    }
  });

  test('state stays within 64 bits', () => {
    let seed = Seed.fromNumber(99);
    for (let i = 0; i < 50; i++) {
      [, seed] = seed.nextUint32();
      expect(seed.state).toBeGreaterThanOrEqual(0n);
      expect(seed.state < 1n << 64n).toBe(true);
    }
  });

  test('split produces two independent seeds', () => {
    const seed = Seed.fromNumber(42);
    const [left, right] = seed.split();

    expect(left.state).not.toBe(right.state);
    expect(left.state).not.toBe(seed.state);
    expect(left.nextUint32()[0]).not.toBe(right.nextUint32()[0]);
  });

  test('bounded values stay in range', () => {
    let seed = Seed.fromNumber(7);
    for (let i = 0; i < 200; i++) {
      const [value, next] = seed.nextBounded(10);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(10);
      seed = next;
    }
  });

  test('floats lie in [0, 1)', () => {
    let seed = Seed.fromNumber(3);
    for (let i = 0; i < 200; i++) {
      const [value, next] = seed.nextFloat();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
      seed = next;
    }
  });

  test('booleans take both values', () => {
    let seed = Seed.fromNumber(11);
    const seen = new Set<boolean>();
    for (let i = 0; i < 100; i++) {
      const [value, next] = seed.nextBool();
      seen.add(value);
      seed = next;
    }
    expect(seen.size).toBe(2);
  });

  test('random seeds are usable', () => {
    const [value] = Seed.random().nextBounded(5);
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(5);
  });
});
