/**
 * EdDSA-Poseidon signatures over Baby Jubjub.
 *
 * An identity can sign arbitrary messages with a key derived from its seed;
 * the signature proves control of the identity without revealing the
 * commitment's preimage. Messages are encoded with `encodeSignal` and reduced
 * modulo the scalar field before signing.
 */

import { buildEddsa, Eddsa, Point } from 'circomlibjs';
import { encodeSignal, SignalInput } from './encoding';
import { BN254_FIELD_ORDER, isDecimalString } from './validation';

/** Baby Jubjub public key as affine coordinates. */
export type PublicKey = [bigint, bigint];

export interface IdentitySignature {
  /** Nonce point R8 (decimal coordinates) */
  R8: [string, string];
  /** Scalar S (decimal) */
  S: string;
}

let eddsaInstance: Promise<Eddsa> | null = null;

/**
 * Initialize EdDSA (lazy loaded, shared per process)
 */
export function getEddsa(): Promise<Eddsa> {
  if (!eddsaInstance) {
    eddsaInstance = buildEddsa();
  }
  return eddsaInstance;
}

/** Reduce a message to the scalar field. */
export function messageToField(message: SignalInput): bigint {
  return encodeSignal(message, 'message') % BN254_FIELD_ORDER;
}

export async function derivePublicKey(signingKey: Uint8Array): Promise<PublicKey> {
  const eddsa = await getEddsa();
  const [x, y] = eddsa.prv2pub(signingKey);
  return [eddsa.F.toObject(x), eddsa.F.toObject(y)];
}

/**
 * Sign a message with a raw 32-byte signing key.
 */
export async function signWithKey(
  signingKey: Uint8Array,
  message: SignalInput,
): Promise<IdentitySignature> {
  const eddsa = await getEddsa();
  const F = eddsa.F;
  const signature = eddsa.signPoseidon(signingKey, F.e(messageToField(message)));

  return {
    R8: [F.toObject(signature.R8[0]).toString(), F.toObject(signature.R8[1]).toString()],
    S: signature.S.toString(),
  };
}

/**
 * Verify an identity signature.
 *
 * Returns false, never throws, for signatures or keys that are not well-formed
 * or not on the curve.
 */
export async function verifySignature(
  message: SignalInput,
  signature: IdentitySignature,
  publicKey: PublicKey,
): Promise<boolean> {
  const r8 = parseCoordinates(signature?.R8);
  if (!r8 || !isDecimalString(signature.S)) {
    return false;
  }
  if (!Array.isArray(publicKey) || publicKey.length !== 2) {
    return false;
  }
  const [px, py] = publicKey;
  if (!inField(px) || !inField(py)) {
    return false;
  }

  const eddsa = await getEddsa();
  const F = eddsa.F;
  const A: Point = [F.e(px), F.e(py)];
  const R8: Point = [F.e(r8[0]), F.e(r8[1])];
  if (!eddsa.babyJub.inCurve(A) || !eddsa.babyJub.inCurve(R8)) {
    return false;
  }

  return eddsa.verifyPoseidon(F.e(messageToField(message)), { R8, S: BigInt(signature.S) }, A);
}

function parseCoordinates(value: unknown): [bigint, bigint] | null {
  if (!Array.isArray(value) || value.length !== 2) {
    return null;
  }
  const [x, y] = value;
  if (!isDecimalString(x) || !isDecimalString(y)) {
    return null;
  }
  const point: [bigint, bigint] = [BigInt(x), BigInt(y)];
  return inField(point[0]) && inField(point[1]) ? point : null;
}

function inField(value: bigint): boolean {
  return typeof value === 'bigint' && value >= 0n && value < BN254_FIELD_ORDER;
}
