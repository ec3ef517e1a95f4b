/**
 * Canonical encodings of messages and scopes.
 *
 * Callers may pass a message or scope as a number, text or raw bytes.
 * `encodeSignal` maps each of them to one unsigned 256-bit integer, which is
 * what a proof carries in its `message` / `scope` fields.
 * `hashToField` then reduces that integer into the circuit's field; the
 * circuit only ever sees the reduced value.
 *
 *   - bigint / number          → the integer itself
 *   - text or bytes, ≤ 32      → bytes right-padded to 32, read big-endian
 *   - text or bytes, > 32      → keccak256 of the bytes
 *
 * Text is always taken as UTF-8, so "2024" and 2024 are different signals.
 */

import { keccak256, toBeArray, toBigInt, toUtf8Bytes } from 'ethers';
import { SignetValidationError } from './errors';
import { UINT256_LIMIT } from './validation';

export type BigNumberish = bigint | number | string;

/** Anything accepted as a message or scope. */
export type SignalInput = BigNumberish | Uint8Array;

/** Width in bytes of an embedded value. */
export const EMBED_WIDTH = 32;

/**
 * Encode a message or scope as an unsigned 256-bit integer.
 *
 * @throws SignetValidationError for negative, fractional or oversized numbers
 */
export function encodeSignal(value: SignalInput, label = 'value'): bigint {
  if (typeof value === 'bigint') {
    return checkRange(value, label);
  }

  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new SignetValidationError(`${label} must be a safe integer`, label);
    }
    return checkRange(BigInt(value), label);
  }

  if (typeof value === 'string') {
    return encodeBytes(toUtf8Bytes(value));
  }

  if (value instanceof Uint8Array) {
    return encodeBytes(value);
  }

  throw new SignetValidationError(`${label} has an unsupported type`, label);
}

/**
 * Reduce a 256-bit value into the BN254 scalar field:
 * keccak256(minimal big-endian bytes of value) >> 8. Zero is the single byte 0.
 */
export function hashToField(value: bigint): bigint {
  checkRange(value, 'value');
  const bytes = value === 0n ? new Uint8Array(1) : toBeArray(value);
  return toBigInt(keccak256(bytes)) >> 8n;
}

function encodeBytes(bytes: Uint8Array): bigint {
  if (bytes.length > EMBED_WIDTH) {
    return toBigInt(keccak256(bytes));
  }
  const padded = new Uint8Array(EMBED_WIDTH);
  padded.set(bytes, 0);
  return toBigInt(padded);
}

function checkRange(value: bigint, label: string): bigint {
  if (value < 0n || value >= UINT256_LIMIT) {
    throw new SignetValidationError(`${label} must fit in 32 unsigned bytes`, label);
  }
  return value;
}
