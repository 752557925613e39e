import { describe, test, expect } from 'vitest';
import { Tree } from './tree.js';

const countdown = (n: number): number[] => (n > 0 ? [n - 1] : []);

describe('Tree', () => {
  test('creates singleton tree', () => {
    const tree = Tree.singleton(42);
    expect(tree.value).toBe(42);
    expect(tree.children).toHaveLength(0);
    expect(tree.hasShrinks()).toBe(false);
  });

  test('creates tree with children', () => {
    const tree = Tree.withChildren(10, [Tree.singleton(1), Tree.singleton(2)]);
    expect(tree.value).toBe(10);
    expect(tree.children.map((c) => c.value)).toEqual([1, 2]);
    expect(tree.hasShrinks()).toBe(true);
  });

  test('maps over tree values', () => {
    const tree = Tree.withChildren(10, [
      Tree.singleton(5),
      Tree.withChildren(3, [Tree.singleton(1)]),
    ]);

    const mapped = tree.map((x) => x * 2);
    expect(mapped.value).toBe(20);
    expect(mapped.children[0].value).toBe(10);
    expect(mapped.children[1].value).toBe(6);
    expect(mapped.children[1].children[0].value).toBe(2);
  });

  test('gets shrinks in breadth-first order', () => {
    const tree = Tree.withChildren(10, [
      Tree.withChildren(5, [Tree.singleton(2)]),
      Tree.singleton(0),
      Tree.withChildren(3, [Tree.singleton(1)]),
    ]);

    expect(tree.shrinks()).toEqual([5, 0, 3, 2, 1]);
  });

  test('unfold does not shrink until children are visited', () => {
    let calls = 0;
    const tree = Tree.unfold(3, (n) => {
      calls++;
      return countdown(n);
    });

    expect(calls).toBe(0);
    expect(tree.children.map((c) => c.value)).toEqual([2]);
    expect(calls).toBe(1);
    expect(tree.children.map((c) => c.value)).toEqual([2]);
    expect(calls).toBe(1);
  });

  test('iterateChildren stops expanding when the caller stops', () => {
    let produced = 0;
    const tree = Tree.unfold(10, function* (n) {
      for (let i = 0; i < n; i++) {
        produced++;
        yield i;
      }
    });

    for (const child of tree.iterateChildren()) {
      expect(child.value).toBe(0);
      break;
    }
    expect(produced).toBe(1);
  });

  test('iterateChildren can be restarted', () => {
    const tree = Tree.unfold(3, (n) => [n - 1, n - 2].filter((m) => m >= 0));
    const first = [...tree.iterateChildren()].map((c) => c.value);
    const second = [...tree.iterateChildren()].map((c) => c.value);
    expect(first).toEqual([2, 1]);
    expect(second).toEqual([2, 1]);
  });

  test('counts nodes and depth of an unfolded tree', () => {
    const tree = Tree.unfold(2, countdown);
    expect(tree.countNodes()).toBe(3);
    expect(tree.depth()).toBe(3);
  });

  test('renders as a string', () => {
    expect(Tree.unfold(1, countdown).toString()).toBe('Tree(1, [Tree(0)])');
  });
});
