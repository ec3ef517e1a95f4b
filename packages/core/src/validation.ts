/**
 * Input validation utilities.
 *
 * Boundary checks for values that enter the library from callers (members,
 * depths, decimal strings). Values produced and consumed internally are not
 * re-validated at every hop.
 */

import { IndexOutOfRangeError, SignetValidationError, UnsupportedDepthError } from './errors';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** BN254 scalar field order (the max value a field element can take + 1). */
export const BN254_FIELD_ORDER =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

/** BN254 base field order; Groth16 point coordinates live here. */
export const BN254_BASE_FIELD_ORDER =
  21888242871839275222246405745257275088696311157297823662689037894645226208583n;

/** Exclusive upper bound of a 32-byte unsigned integer. */
export const UINT256_LIMIT = 1n << 256n;

/** Smallest tree depth with a precompiled circuit. */
export const MIN_TREE_DEPTH = 1;

/** Largest tree depth with a precompiled circuit. */
export const MAX_TREE_DEPTH = 32;

const DECIMAL_PATTERN = /^(0|[1-9][0-9]*)$/;

// ---------------------------------------------------------------------------
// Validation functions
// ---------------------------------------------------------------------------

/**
 * Validate that a depth has a matching precompiled circuit.
 * @throws UnsupportedDepthError if outside MIN_TREE_DEPTH..MAX_TREE_DEPTH
 */
export function validateTreeDepth(depth: number): void {
  if (!isSupportedDepth(depth)) {
    throw new UnsupportedDepthError(depth, MIN_TREE_DEPTH, MAX_TREE_DEPTH);
  }
}

export function isSupportedDepth(depth: unknown): depth is number {
  return (
    typeof depth === 'number' &&
    Number.isInteger(depth) &&
    depth >= MIN_TREE_DEPTH &&
    depth <= MAX_TREE_DEPTH
  );
}

/**
 * Returns true if value is a canonical decimal string (no sign, no leading zeros).
 */
export function isDecimalString(value: unknown): value is string {
  return typeof value === 'string' && DECIMAL_PATTERN.test(value);
}

/**
 * Validate that a value is a BN254 field element (0 <= value < field order).
 * @throws SignetValidationError if out of field range
 */
export function validateFieldElement(value: bigint, label: string): void {
  if (value < 0n || value >= BN254_FIELD_ORDER) {
    throw new SignetValidationError(`${label} is not a valid BN254 field element`, label);
  }
}

/**
 * Parse a canonical decimal string below `limit`.
 * @throws SignetValidationError if not canonical or too large
 */
export function parseDecimal(value: unknown, label: string, limit: bigint): bigint {
  if (!isDecimalString(value)) {
    throw new SignetValidationError(`${label} must be a canonical decimal string`, label);
  }
  const parsed = BigInt(value);
  if (parsed >= limit) {
    throw new SignetValidationError(`${label} is out of range`, label);
  }
  return parsed;
}

/**
 * Validate the shape of a leaf index; the upper bound is checked by the caller.
 * @throws IndexOutOfRangeError if not a non-negative integer
 */
export function validateIndex(index: number, label = 'index'): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new IndexOutOfRangeError(index, `${label} must be a non-negative integer`);
  }
}
