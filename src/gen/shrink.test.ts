import { describe, test, expect } from 'vitest';
import { shrinkList, shrinkTowards, restartable } from './shrink.js';

describe('shrinkList', () => {
  test('removes halving chunks, then single elements', () => {
    expect([...shrinkList([1, 2, 3])]).toEqual([[], [2, 3], [1, 3], [1, 2]]);
    expect([...shrinkList([1, 2, 3, 4])]).toEqual([
      [],
      [3, 4],
      [1, 2],
      [2, 3, 4],
      [1, 3, 4],
      [1, 2, 4],
      [1, 2, 3],
    ]);
  });

  test('empty list has no shrinks', () => {
    expect([...shrinkList([])]).toEqual([]);
  });

  test('shrinks elements after removals when given an element shrinker', () => {
    expect([...shrinkList([2], (n) => shrinkTowards(n, 0))]).toEqual([
      [],
      [0],
      [1],
    ]);
  });

  test('every candidate is strictly smaller', () => {
    const list = [5, 0, 3, 8, 1];
    const measure = (xs: number[]) => [xs.length, xs.reduce((a, b) => a + b, 0)];
    const [length, total] = measure(list);

    for (const candidate of shrinkList(list, (n) => shrinkTowards(n, 0))) {
      const [candidateLength, candidateTotal] = measure(candidate);
      expect(
        candidateLength < length ||
          (candidateLength === length && candidateTotal < total)
      ).toBe(true);
    }
  });

  test('can be iterated more than once', () => {
    const shrinks = shrinkList(['a', 'b']);
    expect([...shrinks]).toEqual([[], ['b'], ['a']]);
    expect([...shrinks]).toEqual([[], ['b'], ['a']]);
  });

  test('is lazy', () => {
    let calls = 0;
    const shrinks = shrinkList([1, 2], (n) => {
      calls++;
      return [n - 1];
    });

    const iterator = shrinks[Symbol.iterator]();
    iterator.next();
    expect(calls).toBe(0);
  });

  test('does not modify the input', () => {
    const list = [1, 2, 3];
    [...shrinkList(list)];
    expect(list).toEqual([1, 2, 3]);
  });
});

describe('shrinkTowards', () => {
  test('tries the origin first and ends next to the value', () => {
    expect(shrinkTowards(10, 0)).toEqual([0, 5, 8, 9]);
    expect(shrinkTowards(-7, 0)).toEqual([0, -4, -6]);
    expect(shrinkTowards(12, 10)).toEqual([10, 11]);
  });

  test('nothing to shrink at the origin', () => {
    expect(shrinkTowards(5, 5)).toEqual([]);
  });
});

describe('restartable', () => {
  test('starts a fresh iterator each time', () => {
    const numbers = restartable(function* () {
      yield 1;
      yield 2;
    });
    expect([...numbers]).toEqual([1, 2]);
    expect([...numbers]).toEqual([1, 2]);
  });
});
