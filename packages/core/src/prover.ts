import { Identity } from './identity';
import { Group } from './group';
import { packPathIndices } from './lean-imt';
import { poseidonHash } from './poseidon';
import { encodeSignal, hashToField, SignalInput } from './encoding';
import { ArtifactProvider, defaultArtifactProvider } from './artifacts';
import { defaultProvingSystem, ProvingSystem, SerializedProof } from './proving-system';
import { pointsFromGroth16Proof } from './serialization';
import {
  AuditLogger,
  ConsoleAuditLogger,
  Groth16Points,
  MerkleProof,
  SignalCircuitInputs,
  SignalProof,
} from './types';
import { MemberNotFoundError, ProvingError } from './errors';
import { validateTreeDepth } from './validation';

export interface ProverOptions {
  /** Circuit artifacts; defaults to SIGNET_ARTIFACTS_DIR */
  artifacts?: ArtifactProvider;
  /** Proving backend; defaults to snarkjs Groth16 */
  provingSystem?: ProvingSystem;
  /** Defaults to ConsoleAuditLogger */
  auditLogger?: AuditLogger;
  /** Actor recorded in audit entries */
  actor?: string;
}

/**
 * Public values a signal proof commits to, computed before proving.
 */
export interface SignalPublicValues {
  merkleTreeRoot: bigint;
  nullifier: bigint;
  message: bigint;
  scope: bigint;
  messageHash: bigint;
  scopeHash: bigint;
}

/**
 * Generates a zero-knowledge proof that the identity is a member of the group
 * and signals `message` within `scope`, without revealing which member.
 *
 * The nullifier is Poseidon(hashToField(scope), identity nullifier): the same
 * identity signalling twice in one scope produces the same nullifier, which
 * is how a verifier detects double signalling.
 *
 * @param identity - The member's identity (private)
 * @param groupOrMerkleProof - The group, or a membership proof obtained from it
 * @param message - Signal content (number, numeric string, text or bytes)
 * @param scope - Topic the nullifier is bound to
 * @param merkleTreeDepth - Circuit depth; defaults to the proof's path length (min 1)
 * @returns A SignalProof that verifies against the group root
 * @throws MemberNotFoundError if the identity is not in the group
 * @throws UnsupportedDepthError if the depth has no circuit
 * @throws ProvingError if the backend fails or its outputs disagree with the inputs
 */
export async function generateProof(
  identity: Identity,
  groupOrMerkleProof: Group | MerkleProof,
  message: SignalInput,
  scope: SignalInput,
  merkleTreeDepth?: number,
  options: ProverOptions = {},
): Promise<SignalProof> {
  const merkleProof = resolveMerkleProof(identity, groupOrMerkleProof);

  const depth = merkleTreeDepth ?? Math.max(merkleProof.siblings.length, 1);
  validateTreeDepth(depth);
  if (merkleProof.siblings.length > depth) {
    throw new ProvingError(
      `Merkle proof has ${merkleProof.siblings.length} siblings but the circuit depth is ${depth}`,
    );
  }
  if (merkleProof.siblings.length !== merkleProof.pathIndices.length) {
    throw new ProvingError('Merkle proof siblings and path indices differ in length');
  }

  const values = await computePublicValues(identity, merkleProof.root, message, scope);
  const input = buildCircuitInputs(identity, merkleProof, depth, values);

  const auditLogger = options.auditLogger ?? new ConsoleAuditLogger();
  const actor = options.actor ?? 'prover';

  let points: Groth16Points;
  try {
    points = await prove(input, depth, values, options);
  } catch (error) {
    auditLogger.log({
      timestamp: new Date().toISOString(),
      action: 'proof_generate',
      actor,
      success: false,
      metadata: {
        merkleTreeDepth: depth,
        merkleTreeRoot: values.merkleTreeRoot.toString(),
        error: error instanceof Error ? error.message : String(error),
      },
    });
    throw error;
  }

  auditLogger.log({
    timestamp: new Date().toISOString(),
    action: 'proof_generate',
    actor,
    target: values.nullifier.toString(),
    success: true,
    metadata: {
      merkleTreeDepth: depth,
      merkleTreeRoot: values.merkleTreeRoot.toString(),
      scope: values.scope.toString(),
    },
  });

  return {
    merkleTreeDepth: depth,
    merkleTreeRoot: values.merkleTreeRoot.toString(),
    nullifier: values.nullifier.toString(),
    message: values.message.toString(),
    scope: values.scope.toString(),
    points,
  };
}

/**
 * Compute the nullifier and signal hashes for an identity and root.
 */
export async function computePublicValues(
  identity: Identity,
  merkleTreeRoot: bigint,
  message: SignalInput,
  scope: SignalInput,
): Promise<SignalPublicValues> {
  const messageValue = encodeSignal(message, 'message');
  const scopeValue = encodeSignal(scope, 'scope');
  const messageHash = hashToField(messageValue);
  const scopeHash = hashToField(scopeValue);
  const nullifier = await poseidonHash([scopeHash, identity.nullifier]);

  return {
    merkleTreeRoot,
    nullifier,
    message: messageValue,
    scope: scopeValue,
    messageHash,
    scopeHash,
  };
}

/**
 * Circuit inputs with the sibling path zero-padded to `depth`.
 */
export function buildCircuitInputs(
  identity: Identity,
  merkleProof: MerkleProof,
  depth: number,
  values: SignalPublicValues,
): SignalCircuitInputs {
  const siblings = merkleProof.siblings.map((s) => s.toString());
  while (siblings.length < depth) {
    siblings.push('0');
  }

  return {
    identityTrapdoor: identity.trapdoor.toString(),
    identityNullifier: identity.nullifier.toString(),
    merkleProofLength: merkleProof.siblings.length.toString(),
    merkleProofIndex: packPathIndices(merkleProof.pathIndices).toString(),
    merkleProofSiblings: siblings,
    message: values.messageHash.toString(),
    scope: values.scopeHash.toString(),
  };
}

async function prove(
  input: SignalCircuitInputs,
  depth: number,
  values: SignalPublicValues,
  options: ProverOptions,
): Promise<Groth16Points> {
  const artifacts = options.artifacts ?? defaultArtifactProvider();
  const provingSystem = options.provingSystem ?? defaultProvingSystem;
  const circuitArtifacts = await artifacts.getCircuitArtifacts(depth);

  let result: SerializedProof;
  try {
    result = await provingSystem.prove(input, circuitArtifacts);
  } catch (error) {
    throw new ProvingError(
      `Proof generation failed: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }

  checkOutputs(result.publicSignals, values);
  try {
    return pointsFromGroth16Proof(result.proof);
  } catch (error) {
    throw new ProvingError('Proving backend returned a malformed proof', error);
  }
}

function resolveMerkleProof(
  identity: Identity,
  groupOrMerkleProof: Group | MerkleProof,
): MerkleProof {
  if (!(groupOrMerkleProof instanceof Group)) {
    return groupOrMerkleProof;
  }

  const index = groupOrMerkleProof.indexOf(identity.commitment);
  if (index === undefined) {
    throw new MemberNotFoundError(identity.commitment);
  }
  return groupOrMerkleProof.generateMerkleProof(index);
}

/** Circuit outputs start with [merkleTreeRoot, nullifier]. */
function checkOutputs(publicSignals: string[], values: SignalPublicValues): void {
  if (publicSignals.length < 2) {
    throw new ProvingError('Proving backend returned too few public signals');
  }
  if (publicSignals[0] !== values.merkleTreeRoot.toString()) {
    throw new ProvingError(
      'Circuit root does not match the Merkle proof root; ' +
        'the proof may be stale or for another identity',
    );
  }
  if (publicSignals[1] !== values.nullifier.toString()) {
    throw new ProvingError('Circuit nullifier does not match the computed nullifier');
  }
}
