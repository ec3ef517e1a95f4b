/**
 * @signet/core
 *
 * Anonymous group signalling: identities, lean Merkle groups, and Groth16
 * proofs that a member signalled a message within a scope.
 */

export * from './types';
export * from './errors';
export * from './validation';
export * from './poseidon';
export * from './encoding';
export * from './signature';
export * from './identity';
export * from './lean-imt';
export * from './group';
export * from './artifacts';
export * from './proving-system';
export * from './prover';
export * from './verifier';
export * from './serialization';
