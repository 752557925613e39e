/**
 * A rose tree containing a value and its shrink possibilities.
 *
 * Children are either supplied up front or unfolded on demand from a
 * shrink function. Unfolded children are computed the first time they are
 * visited and cached afterwards, so a tree can be walked any number of times.
 */
export class Tree<T> {
  private cached: Tree<T>[] | undefined;
  private expandChildren: (() => Iterable<Tree<T>>) | undefined;

  constructor(
    public readonly value: T,
    children: Tree<T>[] | (() => Iterable<Tree<T>>) = []
  ) {
    if (Array.isArray(children)) {
      this.cached = children;
    } else {
      this.expandChildren = children;
    }
  }

  static singleton<T>(value: T): Tree<T> {
    return new Tree(value);
  }

  static withChildren<T>(value: T, children: Tree<T>[]): Tree<T> {
    return new Tree(value, children);
  }

  /**
   * Build a tree lazily: the children of a node are the shrinks of its value,
   * each unfolded the same way.
   */
  static unfold<T>(value: T, shrink: (value: T) => Iterable<T>): Tree<T> {
    return new Tree(value, function* () {
      for (const smaller of shrink(value)) {
        yield Tree.unfold(smaller, shrink);
      }
    });
  }

  get children(): Tree<T>[] {
    if (this.cached === undefined) {
      const expand = this.expandChildren;
      this.cached = expand === undefined ? [] : Array.from(expand());
      this.expandChildren = undefined;
    }
    return this.cached;
  }

  /**
   * Children as a lazy iterable; stops expanding as soon as the caller stops
   * consuming. Falls back to the cached array once it exists.
   */
  *iterateChildren(): Generator<Tree<T>> {
    if (this.cached !== undefined || this.expandChildren === undefined) {
      yield* this.children;
      return;
    }
    yield* this.expandChildren();
  }

  map<U>(f: (value: T) => U): Tree<U> {
    return new Tree(f(this.value), () =>
      this.children.map((child) => child.map(f))
    );
  }

  /**
   * All shrink values in breadth-first order.
   */
  shrinks(): T[] {
    const result: T[] = [];
    const queue: Tree<T>[] = [...this.children];

    for (let tree = queue.shift(); tree !== undefined; tree = queue.shift()) {
      result.push(tree.value);
      queue.push(...tree.children);
    }

    return result;
  }

  hasShrinks(): boolean {
    return this.children.length > 0;
  }

  countNodes(): number {
    return (
      1 + this.children.reduce((sum, child) => sum + child.countNodes(), 0)
    );
  }

  depth(): number {
    if (this.children.length === 0) {
      return 1;
    }
    return 1 + Math.max(...this.children.map((child) => child.depth()));
  }

  toString(): string {
    if (this.children.length === 0) {
      return `Tree(${String(this.value)})`;
    }
    return `Tree(${String(this.value)}, [${this.children.map((c) => c.toString()).join(', ')}])`;
  }
}
