/**
 * Proving system abstraction layer.
 *
 * The prover and verifier only talk to a `ProvingSystem`, so the Groth16
 * backend can be replaced by a native or remote prover.
 *
 * Current implementations:
 *   - Groth16ProvingSystem (snarkjs, BN128): default
 */

import { groth16 } from 'snarkjs';
import { CircuitArtifacts, VerifierArtifacts } from './artifacts';
import { Groth16Proof, SignalCircuitInputs } from './types';

// ---------------------------------------------------------------------------
// Core Abstractions
// ---------------------------------------------------------------------------

/**
 * Identifies the proving system in use.
 */
export type ProvingSystemType = 'groth16';

/**
 * Proof blob produced by a proving system, together with the public signals
 * the circuit exposed.
 */
export interface SerializedProof {
  /** Which proving system produced this proof */
  system: ProvingSystemType;
  proof: Groth16Proof;
  /** Public signals as decimal strings, in circuit output order */
  publicSignals: string[];
}

/**
 * Unified interface for a ZK proving backend.
 */
export interface ProvingSystem {
  /** The type identifier for this proving system */
  readonly type: ProvingSystemType;

  /**
   * Compute the witness and generate a proof.
   *
   * @param circuitInputs - Private + public inputs for the circuit
   * @param artifacts     - Circuit WASM and proving key for one depth
   */
  prove(circuitInputs: SignalCircuitInputs, artifacts: CircuitArtifacts): Promise<SerializedProof>;

  /**
   * Verify a proof against the verification key for its depth.
   */
  verify(proof: SerializedProof, artifacts: VerifierArtifacts): Promise<boolean>;
}

// ---------------------------------------------------------------------------
// Groth16 Implementation
// ---------------------------------------------------------------------------

/**
 * Groth16 proving system backed by snarkjs.
 */
export class Groth16ProvingSystem implements ProvingSystem {
  readonly type: ProvingSystemType = 'groth16';

  async prove(
    circuitInputs: SignalCircuitInputs,
    artifacts: CircuitArtifacts,
  ): Promise<SerializedProof> {
    const { proof, publicSignals } = await groth16.fullProve(
      circuitInputs,
      artifacts.wasmPath,
      artifacts.provingKeyPath,
    );

    return {
      system: 'groth16',
      proof: {
        pi_a: proof.pi_a.map((x) => String(x)),
        pi_b: proof.pi_b.map((pair) => pair.map((x) => String(x))),
        pi_c: proof.pi_c.map((x) => String(x)),
        protocol: proof.protocol,
        curve: proof.curve,
      },
      publicSignals: publicSignals.map((s) => String(s)),
    };
  }

  async verify(proof: SerializedProof, artifacts: VerifierArtifacts): Promise<boolean> {
    return groth16.verify(artifacts.verificationKey, proof.publicSignals, proof.proof);
  }
}

/** Shared default backend */
export const defaultProvingSystem: ProvingSystem = new Groth16ProvingSystem();
