/**
 * Circuit artifacts and their lookup by tree depth.
 *
 * There is one precompiled circuit per supported depth. Proving needs its
 * witness program (WASM) and proving key (zkey); verifying needs its
 * verification key. Verification keys for all depths are shipped in a single
 * packed file whose depth-specific entries (`vk_delta_2`, `IC`) are indexed
 * by `depth - 1`.
 *
 * Directory layout read by `FileArtifactProvider`:
 *
 *   signal-<depth>.wasm
 *   signal-<depth>.zkey
 *   verification-keys.json
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { SignetConfigError } from './errors';
import { VerificationKey } from './types';
import { validateTreeDepth } from './validation';

/** Environment variable naming the artifact directory */
export const ARTIFACTS_DIR_ENV = 'SIGNET_ARTIFACTS_DIR';

export const VERIFICATION_KEYS_FILE = 'verification-keys.json';

/**
 * Artifacts needed by the prover to generate a proof at one depth.
 */
export interface CircuitArtifacts {
  depth: number;
  /** Path of the compiled circuit WASM */
  wasmPath: string;
  /** Path of the Groth16 proving key */
  provingKeyPath: string;
}

/**
 * Artifacts needed by the verifier.
 */
export interface VerifierArtifacts {
  depth: number;
  verificationKey: VerificationKey;
}

/**
 * Verification keys for every depth, sharing the depth-independent fields.
 */
export interface PackedVerificationKeys {
  protocol: string;
  curve: string;
  nPublic: number;
  vk_alpha_1: string[];
  vk_beta_2: string[][];
  vk_gamma_2: string[][];
  /** vk_delta_2 per depth, index depth - 1 */
  vk_delta_2: string[][][];
  /** IC per depth, index depth - 1 */
  IC: string[][][];
}

/**
 * Source of depth-specific circuit artifacts.
 */
export interface ArtifactProvider {
  /** @throws SignetConfigError if the artifacts for `depth` are unavailable */
  getCircuitArtifacts(depth: number): Promise<CircuitArtifacts>;
  /** @throws SignetConfigError if no key exists for `depth` */
  getVerificationKey(depth: number): Promise<VerificationKey>;
}

/**
 * Reads artifacts from a local directory. The packed verification keys are
 * parsed once and cached.
 */
export class FileArtifactProvider implements ArtifactProvider {
  readonly directory: string;
  private packedKeys: Promise<PackedVerificationKeys> | null = null;

  constructor(directory: string) {
    if (!directory) {
      throw new SignetConfigError('Artifact directory must be a non-empty path');
    }
    this.directory = directory;
  }

  async getCircuitArtifacts(depth: number): Promise<CircuitArtifacts> {
    validateTreeDepth(depth);
    const wasmPath = join(this.directory, `signal-${depth}.wasm`);
    const provingKeyPath = join(this.directory, `signal-${depth}.zkey`);

    await Promise.all([assertReadable(wasmPath), assertReadable(provingKeyPath)]);
    return { depth, wasmPath, provingKeyPath };
  }

  async getVerificationKey(depth: number): Promise<VerificationKey> {
    validateTreeDepth(depth);
    if (!this.packedKeys) {
      const loading = loadPackedVerificationKeys(join(this.directory, VERIFICATION_KEYS_FILE));
      // A failed load is retried on the next call
      void loading.catch(() => {
        if (this.packedKeys === loading) {
          this.packedKeys = null;
        }
      });
      this.packedKeys = loading;
    }
    return selectVerificationKey(await this.packedKeys, depth);
  }
}

/**
 * Build a FileArtifactProvider from SIGNET_ARTIFACTS_DIR.
 *
 * @throws SignetConfigError if the variable is unset
 */
export function artifactProviderFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): FileArtifactProvider {
  const directory = env[ARTIFACTS_DIR_ENV];
  if (!directory) {
    throw new SignetConfigError(`${ARTIFACTS_DIR_ENV} is not set`);
  }
  return new FileArtifactProvider(directory);
}

let defaultProvider: FileArtifactProvider | null = null;

/**
 * Shared provider for SIGNET_ARTIFACTS_DIR, used when no `artifacts` option is
 * given. Replaced only when the variable changes, so its key cache lives for
 * the process.
 *
 * @throws SignetConfigError if the variable is unset
 */
export function defaultArtifactProvider(
  env: NodeJS.ProcessEnv = process.env,
): FileArtifactProvider {
  if (defaultProvider && defaultProvider.directory === env[ARTIFACTS_DIR_ENV]) {
    return defaultProvider;
  }
  defaultProvider = artifactProviderFromEnv(env);
  return defaultProvider;
}

/**
 * Load a single-depth verification key from a JSON file.
 */
export async function loadVerificationKey(path: string): Promise<VerificationKey> {
  const data = await readConfigFile(path);
  try {
    return JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SignetConfigError(`Failed to parse verification key from ${path}: ${reason}`);
  }
}

/**
 * Load the packed verification keys for all depths.
 */
export async function loadPackedVerificationKeys(path: string): Promise<PackedVerificationKeys> {
  const data = await readConfigFile(path);
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SignetConfigError(`Failed to parse verification keys from ${path}: ${reason}`);
  }
  if (!isPackedVerificationKeys(parsed)) {
    throw new SignetConfigError(`${path} is not a packed verification key file`);
  }
  return parsed;
}

/**
 * Extract the key for one depth from the packed file.
 *
 * @throws SignetConfigError if the file holds no key for `depth`
 */
export function selectVerificationKey(
  packed: PackedVerificationKeys,
  depth: number,
): VerificationKey {
  const idx = depth - 1;
  if (idx < 0 || idx >= packed.vk_delta_2.length || idx >= packed.IC.length) {
    throw new SignetConfigError(`No verification key found for depth ${depth}`);
  }

  return {
    protocol: packed.protocol,
    curve: packed.curve,
    nPublic: packed.nPublic,
    vk_alpha_1: packed.vk_alpha_1,
    vk_beta_2: packed.vk_beta_2,
    vk_gamma_2: packed.vk_gamma_2,
    vk_delta_2: packed.vk_delta_2[idx],
    IC: packed.IC[idx],
  };
}

function isPackedVerificationKeys(value: unknown): value is PackedVerificationKeys {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.protocol === 'string' &&
    typeof record.curve === 'string' &&
    typeof record.nPublic === 'number' &&
    Array.isArray(record.vk_alpha_1) &&
    Array.isArray(record.vk_beta_2) &&
    Array.isArray(record.vk_gamma_2) &&
    Array.isArray(record.vk_delta_2) &&
    Array.isArray(record.IC)
  );
}

async function readConfigFile(path: string): Promise<string> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new SignetConfigError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

async function assertReadable(path: string): Promise<void> {
  try {
    await fs.access(path);
  } catch {
    throw new SignetConfigError(`Circuit artifact not found: ${path}`);
  }
}
