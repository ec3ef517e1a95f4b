import type { HashFunction } from './poseidon';
import { MerkleProof } from './types';

/**
 * Smallest depth whose tree holds `size` leaves.
 */
export function requiredDepth(size: number): number {
  let depth = 0;
  while (2 ** depth < size) {
    depth += 1;
  }
  return depth;
}

/**
 * Lean incremental Merkle tree.
 *
 * The tree is stored as one array of nodes per level. A node without a right
 * sibling is promoted to the next level unchanged instead of being hashed
 * with a zero filler, so the depth is always `ceil(log2(size))` and a tree of
 * n leaves costs n - 1 hashes. Mutations only recompute the path from the
 * touched leaf to the root.
 *
 * ```ts
 * const tree = new LeanIMT(hash, [a, b, c]);
 * tree.root;   // hash(hash(a, b), c)
 * tree.depth;  // 2
 * ```
 */
export class LeanIMT {
  private nodes: bigint[][] = [[]];
  private readonly hash: HashFunction;

  constructor(hash: HashFunction, leaves: bigint[] = []) {
    this.hash = hash;
    if (leaves.length > 0) {
      this.insertMany(leaves);
    }
  }

  /** Top node, or undefined for an empty tree */
  get root(): bigint | undefined {
    return this.nodes[this.depth][0];
  }

  get depth(): number {
    return this.nodes.length - 1;
  }

  get size(): number {
    return this.nodes[0].length;
  }

  get leaves(): bigint[] {
    return this.nodes[0].slice();
  }

  leafAt(index: number): bigint | undefined {
    return this.nodes[0][index];
  }

  indexOf(leaf: bigint): number {
    return this.nodes[0].indexOf(leaf);
  }

  has(leaf: bigint): boolean {
    return this.nodes[0].includes(leaf);
  }

  insert(leaf: bigint): void {
    this.growTo(requiredDepth(this.size + 1));

    let node = leaf;
    let index = this.size;

    for (let level = 0; level < this.depth; level++) {
      this.nodes[level][index] = node;
      if (index & 1) {
        node = this.hash(this.nodes[level][index - 1], node);
      }
      index >>= 1;
    }

    this.nodes[this.depth] = [node];
  }

  /**
   * Append several leaves, building the new parent nodes level by level.
   * Each new internal node is hashed exactly once.
   */
  insertMany(leaves: bigint[]): void {
    if (leaves.length === 0) {
      return;
    }

    let startIndex = this.size >> 1;
    this.nodes[0] = this.nodes[0].concat(leaves);
    this.growTo(requiredDepth(this.size));

    for (let level = 0; level < this.depth; level++) {
      const parentCount = Math.ceil(this.nodes[level].length / 2);

      for (let index = startIndex; index < parentCount; index++) {
        const left = this.nodes[level][index * 2];
        const right = this.nodes[level][index * 2 + 1];
        this.nodes[level + 1][index] = right !== undefined ? this.hash(left, right) : left;
      }

      startIndex >>= 1;
    }
  }

  update(index: number, leaf: bigint): void {
    let node = leaf;
    let cursor = index;

    for (let level = 0; level < this.depth; level++) {
      this.nodes[level][cursor] = node;
      if (cursor & 1) {
        node = this.hash(this.nodes[level][cursor - 1], node);
      } else {
        const sibling = this.nodes[level][cursor + 1];
        if (sibling !== undefined) {
          node = this.hash(node, sibling);
        }
      }
      cursor >>= 1;
    }

    this.nodes[this.depth] = [node];
  }

  /**
   * Membership path for the leaf at `index`. Levels where the node was
   * promoted contribute no sibling.
   */
  generateProof(index: number): MerkleProof {
    const leaf = this.nodes[0][index];
    const root = this.root;
    if (leaf === undefined || root === undefined) {
      throw new RangeError(`Leaf index ${index} is out of range`);
    }

    const siblings: bigint[] = [];
    const pathIndices: number[] = [];
    let cursor = index;

    for (let level = 0; level < this.depth; level++) {
      const isRight = cursor & 1;
      const sibling = this.nodes[level][isRight ? cursor - 1 : cursor + 1];
      if (sibling !== undefined) {
        siblings.push(sibling);
        pathIndices.push(isRight);
      }
      cursor >>= 1;
    }

    return { root, leaf, leafIndex: index, siblings, pathIndices };
  }

  /**
   * Replay a proof from `leaf` and compare against its root.
   */
  static verifyProof(proof: MerkleProof, hash: HashFunction, leaf: bigint = proof.leaf): boolean {
    if (proof.siblings.length !== proof.pathIndices.length) {
      return false;
    }

    let node = leaf;
    for (let i = 0; i < proof.siblings.length; i++) {
      const sibling = proof.siblings[i];
      node = proof.pathIndices[i] === 1 ? hash(sibling, node) : hash(node, sibling);
    }

    return node === proof.root;
  }

  private growTo(depth: number): void {
    while (this.depth < depth) {
      this.nodes.push([]);
    }
  }
}

/**
 * Pack path bits (LSB = leaf level) into the single index the circuit takes.
 */
export function packPathIndices(pathIndices: number[]): bigint {
  return pathIndices.reduce((acc, bit, level) => acc | (BigInt(bit & 1) << BigInt(level)), 0n);
}
