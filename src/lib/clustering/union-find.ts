/**
 * Disjoint-set forest over string keys with path compression.
 * The root of a merged set is always the lexicographically smaller root, so the
 * resulting partition never depends on the order unions were applied in.
 */
export class UnionFind {
  private readonly parent = new Map<string, string>();

  add(key: string): void {
    if (!this.parent.has(key)) {
      this.parent.set(key, key);
    }
  }

  find(key: string): string {
    this.add(key);
    let root = key;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    // Path compression
    let node = key;
    while (node !== root) {
      const up = this.parent.get(node) ?? root;
      this.parent.set(node, root);
      node = up;
    }
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    const [keep, absorb] = rootA < rootB ? [rootA, rootB] : [rootB, rootA];
    this.parent.set(absorb, keep);
  }

  /** Sets keyed by root; members in insertion order of `add`. */
  groups(): Map<string, string[]> {
    const out = new Map<string, string[]>();
    for (const key of this.parent.keys()) {
      const root = this.find(key);
      const members = out.get(root);
      if (members) members.push(key);
      else out.set(root, [key]);
    }
    return out;
  }
}
