export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(readonly size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
    this.rank = new Array<number>(size).fill(0);
  }

  find(index: number): number {
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
   * Returns false when both were already in the same set.
   */
  union(a: number, b: number): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);

    if (rootA === rootB) {
      return false;
    }

    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
    } else if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA]++;
    }

    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Sets with more than one member, each sorted, ordered by smallest member.
   */
  sets(): number[][] {
    const groups = new Map<number, number[]>();

    for (let index = 0; index < this.size; index++) {
      const root = this.find(index);
      const group = groups.get(root) ?? [];
      group.push(index);
      groups.set(root, group);
    }

    return [...groups.values()]
      .filter((group) => group.length > 1)
      .sort((a, b) => a[0] - b[0]);
  }
}
