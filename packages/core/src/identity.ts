import { createHash, randomBytes } from 'crypto';
import { inspect } from 'util';
import { InvalidSeedError } from './errors';
import { poseidonHash } from './poseidon';
import { derivePublicKey, IdentitySignature, PublicKey, signWithKey } from './signature';
import { SignalInput } from './encoding';
import { BN254_FIELD_ORDER } from './validation';

/** Domain tags; each derived secret hashes the seed under its own tag. */
export const TRAPDOOR_DOMAIN = 'signet:identity:trapdoor';
export const NULLIFIER_DOMAIN = 'signet:identity:nullifier';
export const SIGNING_KEY_DOMAIN = 'signet:identity:signing';

/** Size of a randomly generated seed. */
export const RANDOM_SEED_BYTES = 32;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * A group member's private identity.
 *
 * `trapdoor` and `nullifier` are derived from the seed and never leave the
 * holder; only `commitment = Poseidon(trapdoor, nullifier)` is published and
 * inserted into groups. Recreating an identity from the same seed yields the
 * same commitment.
 */
export class Identity {
  readonly trapdoor: bigint;
  readonly nullifier: bigint;
  readonly commitment: bigint;
  /** EdDSA public key for message signatures */
  readonly publicKey: PublicKey;

  private readonly seed: Uint8Array;
  private readonly signingKey: Uint8Array;

  private constructor(
    seed: Uint8Array,
    trapdoor: bigint,
    nullifier: bigint,
    commitment: bigint,
    signingKey: Uint8Array,
    publicKey: PublicKey,
  ) {
    this.seed = seed;
    this.trapdoor = trapdoor;
    this.nullifier = nullifier;
    this.commitment = commitment;
    this.signingKey = signingKey;
    this.publicKey = publicKey;
  }

  /**
   * Create an identity from a seed, or from fresh randomness when omitted.
   *
   * @param seed - UTF-8 string or raw bytes; the same seed always yields the same identity
   * @throws InvalidSeedError if the seed is empty or not a string/bytes value
   */
  static async create(seed?: string | Uint8Array): Promise<Identity> {
    const seedBytes =
      seed === undefined ? new Uint8Array(randomBytes(RANDOM_SEED_BYTES)) : normalizeSeed(seed);

    const trapdoor = deriveScalar(seedBytes, TRAPDOOR_DOMAIN);
    const nullifier = deriveScalar(seedBytes, NULLIFIER_DOMAIN);
    const commitment = await poseidonHash([trapdoor, nullifier]);

    const signingKey = domainHash(seedBytes, SIGNING_KEY_DOMAIN);
    const publicKey = await derivePublicKey(signingKey);

    return new Identity(seedBytes, trapdoor, nullifier, commitment, signingKey, publicKey);
  }

  /**
   * Restore an identity from the output of `export()`.
   */
  static async import(exported: string): Promise<Identity> {
    if (typeof exported !== 'string' || !BASE64_PATTERN.test(exported)) {
      throw new InvalidSeedError('Exported identity must be a non-empty base64 string');
    }
    return Identity.create(new Uint8Array(Buffer.from(exported, 'base64')));
  }

  /** The seed as base64. Anyone holding it controls the identity. */
  export(): string {
    return Buffer.from(this.seed).toString('base64');
  }

  signMessage(message: SignalInput): Promise<IdentitySignature> {
    return signWithKey(this.signingKey, message);
  }

  /** Public view only; the secrets are never serialized. */
  toJSON(): { commitment: string; publicKey: [string, string] } {
    return {
      commitment: this.commitment.toString(),
      publicKey: [this.publicKey[0].toString(), this.publicKey[1].toString()],
    };
  }

  [inspect.custom](): string {
    return `Identity { commitment: ${this.commitment} }`;
  }
}

/**
 * Create a new identity (random seed when omitted).
 */
export function createIdentity(seed?: string | Uint8Array): Promise<Identity> {
  return Identity.create(seed);
}

/**
 * Derive a field scalar: SHA-256(tag || 0x00 || seed) mod field order.
 */
export function deriveScalar(seed: Uint8Array, domain: string): bigint {
  const digest = domainHash(seed, domain);
  return BigInt('0x' + Buffer.from(digest).toString('hex')) % BN254_FIELD_ORDER;
}

function domainHash(seed: Uint8Array, domain: string): Uint8Array {
  const digest = createHash('sha256')
    .update(domain, 'utf8')
    .update(Buffer.from([0]))
    .update(seed)
    .digest();
  return new Uint8Array(digest);
}

function normalizeSeed(seed: unknown): Uint8Array {
  if (typeof seed === 'string') {
    if (seed.length === 0) {
      throw new InvalidSeedError('Seed must be a non-empty string');
    }
    return new Uint8Array(Buffer.from(seed, 'utf8'));
  }
  if (seed instanceof Uint8Array) {
    if (seed.length === 0) {
      throw new InvalidSeedError('Seed must contain at least one byte');
    }
    return new Uint8Array(seed);
  }
  throw new InvalidSeedError('Seed must be a string or a Uint8Array');
}
