/**
 * Proof exchange format.
 *
 * A signal proof travels as compact JSON with a fixed key order:
 *
 *   {"version":"signet-proof/1","merkleTreeDepth":2,"merkleTreeRoot":"…",
 *    "nullifier":"…","message":"…","scope":"…",
 *    "points":{"a":[…],"b":[[…],[…]],"c":[…]}}
 *
 * Import is strict: unknown or missing keys, non-canonical decimals and values
 * outside their field are rejected rather than normalized, so a proof has
 * exactly one accepted encoding.
 */

import { MalformedProofError } from './errors';
import { Groth16Points, Groth16Proof, SignalProof } from './types';
import {
  BN254_BASE_FIELD_ORDER,
  BN254_FIELD_ORDER,
  isDecimalString,
  isSupportedDepth,
  UINT256_LIMIT,
} from './validation';

export const PROOF_FORMAT_VERSION = 'signet-proof/1';

/** Groth16 points flattened to the 8 words on-chain verifiers take */
export type PackedGroth16Proof = [string, string, string, string, string, string, string, string];

const PROOF_KEYS = ['merkleTreeDepth', 'merkleTreeRoot', 'nullifier', 'message', 'scope', 'points'];
const POINT_KEYS = ['a', 'b', 'c'];

export function exportProof(proof: SignalProof): string {
  return JSON.stringify({
    version: PROOF_FORMAT_VERSION,
    merkleTreeDepth: proof.merkleTreeDepth,
    merkleTreeRoot: proof.merkleTreeRoot,
    nullifier: proof.nullifier,
    message: proof.message,
    scope: proof.scope,
    points: {
      a: proof.points.a,
      b: proof.points.b,
      c: proof.points.c,
    },
  });
}

/**
 * Parse a proof produced by `exportProof`.
 *
 * A missing `version` is read as the current one.
 *
 * @throws MalformedProofError on any structural or range violation
 */
export function importProof(text: string): SignalProof {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedProofError(
      `Invalid proof JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const record = asRecord(parsed, 'proof');
  if (record.version !== undefined && record.version !== PROOF_FORMAT_VERSION) {
    throw new MalformedProofError(`Unsupported proof version: ${String(record.version)}`);
  }
  checkKeys(record, [...PROOF_KEYS, 'version'], PROOF_KEYS, 'proof');

  const depth = record.merkleTreeDepth;
  if (!isSupportedDepth(depth)) {
    throw new MalformedProofError('merkleTreeDepth must be an integer between 1 and 32');
  }

  return {
    merkleTreeDepth: depth,
    merkleTreeRoot: decimal(record.merkleTreeRoot, 'merkleTreeRoot', BN254_FIELD_ORDER),
    nullifier: decimal(record.nullifier, 'nullifier', BN254_FIELD_ORDER),
    message: decimal(record.message, 'message', UINT256_LIMIT),
    scope: decimal(record.scope, 'scope', UINT256_LIMIT),
    points: parsePoints(record.points),
  };
}

/**
 * Flatten points as a.x, a.y, b.x[1], b.x[0], b.y[1], b.y[0], c.x, c.y
 * (G2 coordinates swapped into the order pairing precompiles expect).
 */
export function packGroth16Proof(points: Groth16Points): PackedGroth16Proof {
  return [
    points.a[0],
    points.a[1],
    points.b[0][1],
    points.b[0][0],
    points.b[1][1],
    points.b[1][0],
    points.c[0],
    points.c[1],
  ];
}

export function unpackGroth16Proof(packed: PackedGroth16Proof): Groth16Points {
  return {
    a: [packed[0], packed[1]],
    b: [
      [packed[3], packed[2]],
      [packed[5], packed[4]],
    ],
    c: [packed[6], packed[7]],
  };
}

/**
 * Take the affine coordinates out of a snarkjs proof.
 *
 * @throws MalformedProofError if a point has too few coordinates
 */
export function pointsFromGroth16Proof(proof: Groth16Proof): Groth16Points {
  const { pi_a: a, pi_b: b, pi_c: c } = proof;
  if (a.length < 2 || c.length < 2 || b.length < 2 || b[0].length < 2 || b[1].length < 2) {
    throw new MalformedProofError('Groth16 proof is missing point coordinates');
  }
  return {
    a: [a[0], a[1]],
    b: [
      [b[0][0], b[0][1]],
      [b[1][0], b[1][1]],
    ],
    c: [c[0], c[1]],
  };
}

/**
 * Rebuild the projective snarkjs form (z = 1) from affine points.
 */
export function pointsToGroth16Proof(points: Groth16Points): Groth16Proof {
  return {
    pi_a: [points.a[0], points.a[1], '1'],
    pi_b: [[points.b[0][0], points.b[0][1]], [points.b[1][0], points.b[1][1]], ['1', '0']],
    pi_c: [points.c[0], points.c[1], '1'],
    protocol: 'groth16',
    curve: 'bn128',
  };
}

/**
 * Structural check of in-memory points; the verifier uses it to turn
 * malformed input into a rejection.
 */
export function isWellFormedPoints(points: unknown): points is Groth16Points {
  try {
    parsePoints(points);
    return true;
  } catch (error) {
    if (error instanceof MalformedProofError) {
      return false;
    }
    throw error;
  }
}

function parsePoints(value: unknown): Groth16Points {
  const record = asRecord(value, 'points');
  checkKeys(record, POINT_KEYS, POINT_KEYS, 'points');

  const b = tuple(record.b, 'points.b');
  return {
    a: coordinatePair(record.a, 'points.a'),
    b: [coordinatePair(b[0], 'points.b[0]'), coordinatePair(b[1], 'points.b[1]')],
    c: coordinatePair(record.c, 'points.c'),
  };
}

function coordinatePair(value: unknown, label: string): [string, string] {
  const [x, y] = tuple(value, label);
  return [
    decimal(x, `${label}[0]`, BN254_BASE_FIELD_ORDER),
    decimal(y, `${label}[1]`, BN254_BASE_FIELD_ORDER),
  ];
}

function tuple(value: unknown, label: string): [unknown, unknown] {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new MalformedProofError(`${label} must be an array of length 2`);
  }
  return [value[0], value[1]];
}

function decimal(value: unknown, label: string, limit: bigint): string {
  if (!isDecimalString(value)) {
    throw new MalformedProofError(`${label} must be a canonical decimal string`);
  }
  if (BigInt(value) >= limit) {
    throw new MalformedProofError(`${label} is out of range`);
  }
  return value;
}

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new MalformedProofError(`${label} must be a JSON object`);
  }
  return { ...value };
}

function checkKeys(
  record: Record<string, unknown>,
  allowed: string[],
  required: string[],
  label: string,
): void {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      throw new MalformedProofError(`Unexpected key in ${label}: ${key}`);
    }
  }
  for (const key of required) {
    if (!(key in record)) {
      throw new MalformedProofError(`Missing key in ${label}: ${key}`);
    }
  }
}
