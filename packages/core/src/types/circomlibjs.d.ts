/**
 * Type declarations for circomlibjs (the package ships none).
 *
 * Only the Poseidon and EdDSA builders are described. Field elements are kept
 * in the library's internal Montgomery form (Uint8Array) and converted with
 * `F.e` / `F.toObject`.
 */

declare module 'circomlibjs' {
  /** Finite field over the BN254 scalar field */
  export interface F {
    e(value: bigint | number | string): Uint8Array;
    toObject(element: Uint8Array): bigint;
  }

  /** Poseidon hash function instance */
  export interface Poseidon {
    (inputs: Array<bigint | number | Uint8Array>): Uint8Array;
    F: F;
  }

  export type Point = [Uint8Array, Uint8Array];

  export interface EddsaSignature {
    R8: Point;
    S: bigint;
  }

  export interface BabyJub {
    F: F;
    inCurve(point: Point): boolean;
  }

  /** EdDSA over Baby Jubjub */
  export interface Eddsa {
    F: F;
    babyJub: BabyJub;
    prv2pub(privateKey: Uint8Array): Point;
    signPoseidon(privateKey: Uint8Array, message: Uint8Array): EddsaSignature;
    verifyPoseidon(message: Uint8Array, signature: EddsaSignature, publicKey: Point): boolean;
  }

  export function buildPoseidon(): Promise<Poseidon>;

  export function buildEddsa(): Promise<Eddsa>;
}
