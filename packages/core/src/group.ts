/**
 * Group membership layer.
 *
 * A group is an ordered set of identity commitments held in a lean
 * incremental Merkle tree; the tree root identifies the group in proofs.
 * Removing a member overwrites its leaf with the zero sentinel so that every
 * other member keeps its index and Merkle path shape.
 */

import { LeanIMT } from './lean-imt';
import { getPoseidon2, HashFunction } from './poseidon';
import { MerkleProof } from './types';
import { BigNumberish } from './encoding';
import {
  DuplicateMemberError,
  EmptyMemberError,
  IndexOutOfRangeError,
  RemovedMemberError,
  SignetValidationError,
} from './errors';
import { BN254_FIELD_ORDER, parseDecimal, validateFieldElement, validateIndex } from './validation';

/** Leaf value of a removed member */
export const REMOVED_MEMBER = 0n;

const DECIMAL = /^[0-9]+$/;
const HEX = /^0x[0-9a-fA-F]+$/;

/**
 * Ordered set of commitments backed by a lean Poseidon Merkle tree.
 *
 * All operations are synchronous; use `createGroup` to obtain a group with
 * the Poseidon hash already loaded.
 */
export class Group {
  private readonly tree: LeanIMT;
  private readonly hash: HashFunction;
  private readonly indexByMember = new Map<bigint, number>();

  /**
   * @param hash - Two-input hash for internal nodes (see `getPoseidon2`)
   * @param members - Initial members, inserted in order
   * @throws EmptyMemberError if a member is 0
   * @throws DuplicateMemberError if a member repeats
   */
  constructor(hash: HashFunction, members: BigNumberish[] = []) {
    this.hash = hash;
    const values = members.map(toMember);
    this.checkNew(values);
    this.tree = new LeanIMT(hash, values);
    this.reindex();
  }

  /** Root of the tree; undefined while the group is empty */
  get root(): bigint | undefined {
    return this.tree.root;
  }

  get depth(): number {
    return this.tree.depth;
  }

  /** Number of leaves, removed slots included */
  get size(): number {
    return this.tree.size;
  }

  /** Leaves in insertion order; removed slots read as 0n */
  get members(): bigint[] {
    return this.tree.leaves;
  }

  /**
   * Index of a member, or undefined if absent. The removed-member sentinel is
   * never found.
   */
  indexOf(member: BigNumberish): number | undefined {
    const value = parseMember(member);
    if (value === REMOVED_MEMBER) {
      return undefined;
    }
    return this.indexByMember.get(value);
  }

  addMember(member: BigNumberish): void {
    const value = toMember(member);
    this.checkNew([value]);
    this.tree.insert(value);
    this.indexByMember.set(value, this.tree.size - 1);
  }

  /**
   * Append several members in one pass. Nothing is inserted if any of them
   * is invalid or already present.
   */
  addMembers(members: BigNumberish[]): void {
    const values = members.map(toMember);
    this.checkNew(values);
    const offset = this.tree.size;
    this.tree.insertMany(values);
    values.forEach((value, i) => this.indexByMember.set(value, offset + i));
  }

  /**
   * Replace the member at `index`.
   *
   * @throws IndexOutOfRangeError if index is negative, fractional or >= size
   * @throws RemovedMemberError if the slot was removed
   * @throws DuplicateMemberError if the new value is another member
   */
  updateMember(index: number, member: BigNumberish): void {
    const value = toMember(member);
    const current = this.liveLeaf(index);
    if (value === current) {
      return;
    }
    if (this.indexByMember.has(value)) {
      throw new DuplicateMemberError(value);
    }

    this.tree.update(index, value);
    this.indexByMember.delete(current);
    this.indexByMember.set(value, index);
  }

  /**
   * Remove the member at `index` by overwriting it with 0. Other members keep
   * their indices.
   */
  removeMember(index: number): void {
    const current = this.liveLeaf(index);
    this.tree.update(index, REMOVED_MEMBER);
    this.indexByMember.delete(current);
  }

  /**
   * @throws IndexOutOfRangeError if index is out of range or names a removed slot
   */
  generateMerkleProof(index: number): MerkleProof {
    validateIndex(index);
    const leaf = this.tree.leafAt(index);
    if (leaf === undefined) {
      throw new IndexOutOfRangeError(index);
    }
    if (leaf === REMOVED_MEMBER) {
      throw new IndexOutOfRangeError(index, `Leaf index ${index} refers to a removed member`);
    }
    return this.tree.generateProof(index);
  }

  /** Replay `proof` from `leaf`; the removed-member sentinel never verifies. */
  verifyMerkleProof(proof: MerkleProof, leaf: bigint): boolean {
    if (leaf === REMOVED_MEMBER) {
      return false;
    }
    return LeanIMT.verifyProof(proof, this.hash, leaf);
  }

  /** JSON array of decimal leaves, removed slots as "0". */
  export(): string {
    return JSON.stringify(this.tree.leaves.map((leaf) => leaf.toString()));
  }

  /**
   * Rebuild a group from `export()` output. The root is recomputed from the
   * leaves.
   *
   * @throws SignetValidationError if the text is not an array of field elements
   * @throws DuplicateMemberError if a non-zero leaf repeats
   */
  static import(exported: string, hash: HashFunction): Group {
    let parsed: unknown;
    try {
      parsed = JSON.parse(exported);
    } catch (error) {
      throw new SignetValidationError(
        `Invalid group export: ${error instanceof Error ? error.message : String(error)}`,
        'members',
      );
    }
    if (!Array.isArray(parsed)) {
      throw new SignetValidationError('Group export must be a JSON array', 'members');
    }

    const leaves = parsed.map((item: unknown, i) =>
      parseDecimal(item, `members[${i}]`, BN254_FIELD_ORDER),
    );
    const group = new Group(hash);
    group.checkNew(leaves.filter((leaf) => leaf !== REMOVED_MEMBER));
    group.tree.insertMany(leaves);
    group.reindex();
    return group;
  }

  private liveLeaf(index: number): bigint {
    validateIndex(index);
    const leaf = this.tree.leafAt(index);
    if (leaf === undefined) {
      throw new IndexOutOfRangeError(index);
    }
    if (leaf === REMOVED_MEMBER) {
      throw new RemovedMemberError(index);
    }
    return leaf;
  }

  private checkNew(values: bigint[]): void {
    const seen = new Set<bigint>();
    for (const value of values) {
      if (seen.has(value) || this.indexByMember.has(value)) {
        throw new DuplicateMemberError(value);
      }
      seen.add(value);
    }
  }

  private reindex(): void {
    this.indexByMember.clear();
    this.tree.leaves.forEach((leaf, index) => {
      if (leaf !== REMOVED_MEMBER) {
        this.indexByMember.set(leaf, index);
      }
    });
  }
}

/**
 * Create a Poseidon-backed group.
 */
export async function createGroup(members: BigNumberish[] = []): Promise<Group> {
  return new Group(await getPoseidon2(), members);
}

/**
 * Restore a Poseidon-backed group from `Group.export()` output.
 */
export async function importGroup(exported: string): Promise<Group> {
  return Group.import(exported, await getPoseidon2());
}

function parseMember(member: BigNumberish): bigint {
  if (typeof member === 'bigint') {
    return member;
  }
  if (typeof member === 'number') {
    if (!Number.isSafeInteger(member)) {
      throw new SignetValidationError('Member must be a safe integer', 'member');
    }
    return BigInt(member);
  }
  if (typeof member === 'string' && (DECIMAL.test(member) || HEX.test(member))) {
    return BigInt(member);
  }
  throw new SignetValidationError('Member must be an integer, decimal or 0x-hex string', 'member');
}

function toMember(member: BigNumberish): bigint {
  const value = parseMember(member);
  validateFieldElement(value, 'member');
  if (value === REMOVED_MEMBER) {
    throw new EmptyMemberError();
  }
  return value;
}
