import { ArtifactProvider, defaultArtifactProvider } from './artifacts';
import { hashToField } from './encoding';
import { defaultProvingSystem, ProvingSystem } from './proving-system';
import { isWellFormedPoints, pointsToGroth16Proof } from './serialization';
import {
  AuditLogger,
  BatchVerificationResult,
  ConsoleAuditLogger,
  SignalProof,
} from './types';
import {
  BN254_FIELD_ORDER,
  isDecimalString,
  isSupportedDepth,
  MAX_TREE_DEPTH,
  MIN_TREE_DEPTH,
  UINT256_LIMIT,
} from './validation';

export interface VerifierOptions {
  /** Verification keys; defaults to SIGNET_ARTIFACTS_DIR */
  artifacts?: ArtifactProvider;
  /** Verification backend; defaults to snarkjs Groth16 */
  provingSystem?: ProvingSystem;
  /** Defaults to ConsoleAuditLogger */
  auditLogger?: AuditLogger;
  /** Actor recorded in audit entries */
  actor?: string;
  /**
   * Root the proof must be over. Verifiers that track the live group pass
   * its current root here to reject proofs made against older roots.
   */
  expectedMerkleTreeRoot?: bigint;
}

/**
 * Validates the public fields of a signal proof.
 *
 * Returns human-readable error strings; an empty array means the proof is
 * well-formed (not that it verifies).
 */
export function validateSignalProof(proof: SignalProof): string[] {
  const errors: string[] = [];

  if (typeof proof !== 'object' || proof === null) {
    return ['Proof must be an object'];
  }
  if (!isSupportedDepth(proof.merkleTreeDepth)) {
    errors.push(
      `merkleTreeDepth must be an integer between ${MIN_TREE_DEPTH} and ${MAX_TREE_DEPTH}`,
    );
  }
  if (!inRange(proof.merkleTreeRoot, BN254_FIELD_ORDER)) {
    errors.push('Invalid merkleTreeRoot');
  }
  if (!inRange(proof.nullifier, BN254_FIELD_ORDER)) {
    errors.push('Invalid nullifier');
  }
  if (!inRange(proof.message, UINT256_LIMIT)) {
    errors.push('Invalid message');
  }
  if (!inRange(proof.scope, UINT256_LIMIT)) {
    errors.push('Invalid scope');
  }
  if (!isWellFormedPoints(proof.points)) {
    errors.push('Invalid proof points');
  }

  return errors;
}

/**
 * Verifies a signal proof.
 *
 * Rebuilds the public signals [merkleTreeRoot, nullifier, hashToField(message),
 * hashToField(scope)] and checks them against the verification key for the
 * proof's depth. Never throws: malformed proofs, a root other than
 * `expectedMerkleTreeRoot` and backend errors all return false.
 *
 * Detecting a reused nullifier is the caller's job.
 */
export async function verifyProof(
  proof: SignalProof,
  options: VerifierOptions = {},
): Promise<boolean> {
  const auditLogger = options.auditLogger ?? new ConsoleAuditLogger();
  const actor = options.actor ?? 'verifier';

  const { verified, reason } = await checkProof(proof, options);

  auditLogger.log({
    timestamp: new Date().toISOString(),
    action: 'proof_verify',
    actor,
    target: typeof proof?.nullifier === 'string' ? proof.nullifier : undefined,
    success: verified,
    metadata: reason ? { reason } : undefined,
  });

  return verified;
}

/**
 * Verifies multiple proofs in parallel.
 *
 * @returns Batch verification result with individual and aggregate outcomes
 */
export async function verifyBatch(
  proofs: SignalProof[],
  options: VerifierOptions = {},
): Promise<BatchVerificationResult> {
  if (proofs.length === 0) {
    return {
      results: [],
      allVerified: true,
      verifiedCount: 0,
      totalCount: 0,
    };
  }

  const results = await Promise.all(
    proofs.map(async (proof, index) => {
      const verified = await verifyProof(proof, options);
      return { index, verified, error: verified ? undefined : 'Proof verification failed' };
    }),
  );

  const verifiedCount = results.filter((r) => r.verified).length;
  return {
    results,
    allVerified: verifiedCount === proofs.length,
    verifiedCount,
    totalCount: proofs.length,
  };
}

async function checkProof(
  proof: SignalProof,
  options: VerifierOptions,
): Promise<{ verified: boolean; reason?: string }> {
  const errors = validateSignalProof(proof);
  if (errors.length > 0) {
    return { verified: false, reason: errors.join('; ') };
  }

  if (
    options.expectedMerkleTreeRoot !== undefined &&
    BigInt(proof.merkleTreeRoot) !== options.expectedMerkleTreeRoot
  ) {
    return { verified: false, reason: 'Merkle tree root does not match the expected root' };
  }

  const publicSignals = [
    proof.merkleTreeRoot,
    proof.nullifier,
    hashToField(BigInt(proof.message)).toString(),
    hashToField(BigInt(proof.scope)).toString(),
  ];

  try {
    const artifacts = options.artifacts ?? defaultArtifactProvider();
    const provingSystem = options.provingSystem ?? defaultProvingSystem;
    const verificationKey = await artifacts.getVerificationKey(proof.merkleTreeDepth);
    const verified = await provingSystem.verify(
      { system: provingSystem.type, proof: pointsToGroth16Proof(proof.points), publicSignals },
      { depth: proof.merkleTreeDepth, verificationKey },
    );
    return verified ? { verified } : { verified, reason: 'Groth16 verification failed' };
  } catch (error) {
    return {
      verified: false,
      reason: `Verification error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

function inRange(value: unknown, limit: bigint): boolean {
  return isDecimalString(value) && BigInt(value) < limit;
}
