/**
 * Union-find over the integers 0..n-1
 */

export type UnionStrategy = 'size' | 'rank';

export class DisjointSet {
  private readonly parent: number[];
  private readonly sizes: number[];
  private readonly ranks: number[];
  private sets: number;

  private constructor(count: number, private readonly strategy: UnionStrategy) {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Element count must be a non-negative integer, got ${count}`);
    }
    this.parent = Array.from({ length: count }, (_, i) => i);
    this.sizes = new Array<number>(count).fill(1);
    this.ranks = new Array<number>(count).fill(0);
    this.sets = count;
  }

  /** Attach the smaller tree under the larger */
  static bySize(count: number): DisjointSet {
    return new DisjointSet(count, 'size');
  }

  /** Attach the shallower tree under the deeper */
  static byRank(count: number): DisjointSet {
    return new DisjointSet(count, 'rank');
  }

  /** Number of disjoint sets */
  get count(): number {
    return this.sets;
  }

  get length(): number {
    return this.parent.length;
  }

  /**
   * Root of the set containing `index`, compressing the path walked
   */
  find(index: number): number {
    this.checkIndex(index);

    let root = index;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }

    return root;
  }

  /**
   * Merge the sets holding `a` and `b`.
   * Returns true if they were previously disjoint.
   */
  union(a: number, b: number): boolean {
    let rootA = this.find(a);
    let rootB = this.find(b);

    if (rootA === rootB) return false;

    if (this.outranks(rootB, rootA)) {
      [rootA, rootB] = [rootB, rootA];
    }

    this.parent[rootB] = rootA;
    this.sizes[rootA] += this.sizes[rootB];
    if (this.ranks[rootA] === this.ranks[rootB]) {
      this.ranks[rootA]++;
    }
    this.sets--;

    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /** Number of elements in the set containing `index` */
  setSize(index: number): number {
    return this.sizes[this.find(index)];
  }

  private outranks(a: number, b: number): boolean {
    return this.strategy === 'size'
      ? this.sizes[a] > this.sizes[b]
      : this.ranks[a] > this.ranks[b];
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.parent.length) {
      throw new RangeError(`Index ${index} is outside 0..${this.parent.length - 1}`);
    }
  }
}
