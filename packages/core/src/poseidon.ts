/**
 * Poseidon hash utilities using circomlibjs
 *
 * Poseidon is the circuit-native hash: identity commitments, nullifiers and
 * every Merkle node are Poseidon digests over the BN254 scalar field, so the
 * values computed here must match the circuit bit for bit.
 */

import { buildPoseidon, Poseidon } from 'circomlibjs';

/** Two-to-one hash used to combine tree nodes. */
export type HashFunction = (left: bigint, right: bigint) => bigint;

let poseidonInstance: Promise<Poseidon> | null = null;

/**
 * Initialize the Poseidon hash function (lazy loaded, shared per process)
 */
export function getPoseidon(): Promise<Poseidon> {
  if (!poseidonInstance) {
    poseidonInstance = buildPoseidon();
  }
  return poseidonInstance;
}

/**
 * Compute Poseidon hash of inputs
 *
 * @param inputs - Array of numbers or bigints to hash
 * @returns The hash as a bigint
 */
export async function poseidonHash(inputs: (number | bigint)[]): Promise<bigint> {
  const poseidon = await getPoseidon();
  return poseidon.F.toObject(poseidon(inputs));
}

/**
 * Synchronous two-input Poseidon bound to a loaded instance.
 */
export function poseidon2(poseidon: Poseidon): HashFunction {
  return (left, right) => poseidon.F.toObject(poseidon([left, right]));
}

/**
 * Load Poseidon and return the two-input hash used by groups.
 */
export async function getPoseidon2(): Promise<HashFunction> {
  return poseidon2(await getPoseidon());
}
