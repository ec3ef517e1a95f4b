/**
 * Core type definitions for signet
 */

/**
 * Membership path from a leaf to the root of a lean Merkle tree.
 */
export interface MerkleProof {
  /** Root the path leads to */
  root: bigint;
  /** Leaf the path starts from */
  leaf: bigint;
  /** Position of the leaf among the tree's leaves */
  leafIndex: number;
  /** Sibling hashes, leaf level first; promoted levels contribute none */
  siblings: bigint[];
  /** 0 = node is the left child, 1 = right child, aligned with `siblings` */
  pathIndices: number[];
}

/**
 * Groth16 proof points as decimal strings, affine coordinates only.
 * `b` holds the two Fp2 coordinates of a G2 point, each as [c0, c1].
 */
export interface Groth16Points {
  a: [string, string];
  b: [[string, string], [string, string]];
  c: [string, string];
}

/**
 * Proof that an anonymous group member signalled `message` within `scope`.
 *
 * `message` and `scope` are the canonical integer encodings of the caller's
 * inputs; the circuit commits to `hashToField` of each.
 */
export interface SignalProof {
  /** Depth of the circuit the proof was made with (1..32) */
  merkleTreeDepth: number;
  merkleTreeRoot: string;
  /** Poseidon(hashToField(scope), identity nullifier) */
  nullifier: string;
  message: string;
  scope: string;
  points: Groth16Points;
}

/**
 * Groth16 proof as produced and consumed by snarkjs.
 */
export interface Groth16Proof {
  pi_a: string[];
  pi_b: string[][];
  pi_c: string[];
  protocol: string;
  curve: string;
}

export interface VerificationKey {
  protocol: string;
  curve: string;
  nPublic: number;
  vk_alpha_1: string[];
  vk_beta_2: string[][];
  vk_gamma_2: string[][];
  vk_delta_2: string[][];
  IC: string[][];
}

/** Witness inputs of the signal circuit, all decimal strings */
export type SignalCircuitInputs = {
  identityTrapdoor: string;
  identityNullifier: string;
  merkleProofLength: string;
  merkleProofIndex: string;
  merkleProofSiblings: string[];
  message: string;
  scope: string;
};

export interface BatchVerificationResult {
  /** Per-proof verification results */
  results: { index: number; verified: boolean; error?: string }[];
  /** True if all proofs verified successfully */
  allVerified: boolean;
  /** Number of successfully verified proofs */
  verifiedCount: number;
  /** Total number of proofs checked */
  totalCount: number;
}

// ---------------------------------------------------------------------------
// Audit Logging
// ---------------------------------------------------------------------------

/**
 * Structured audit log entry produced by the prover and verifier.
 * Entries never carry identity secrets.
 */
export interface AuditEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Action that occurred */
  action: 'proof_generate' | 'proof_verify';
  /** Actor (prover or verifier identifier) */
  actor: string;
  /** Target identifier (nullifier of the proof) */
  target?: string;
  /** Whether the action succeeded */
  success: boolean;
  /** Additional structured metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Pluggable audit logger interface.
 *
 * The default `ConsoleAuditLogger` writes JSON to stdout. Deployments that
 * need a durable trail plug in their own implementation.
 */
export interface AuditLogger {
  /** Record an audit entry */
  log(entry: AuditEntry): void;
}

/**
 * Console-based audit logger (development/testing only).
 */
export class ConsoleAuditLogger implements AuditLogger {
  log(entry: AuditEntry): void {
    console.log('[AUDIT]', JSON.stringify(entry));
  }
}

/**
 * In-memory audit logger that stores entries for inspection (testing).
 */
export class InMemoryAuditLogger implements AuditLogger {
  readonly entries: AuditEntry[] = [];

  constructor() {
    if (typeof process !== 'undefined' && process.env.NODE_ENV === 'production') {
      console.warn(
        '[signet] InMemoryAuditLogger is not suitable for production. ' +
          'Audit entries will be lost on restart.',
      );
    }
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);
  }

  /** Return entries filtered by action */
  filter(action: AuditEntry['action']): AuditEntry[] {
    return this.entries.filter((e) => e.action === action);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
