/**
 * Error hierarchy for signet.
 *
 * Every error extends SignetError and carries a `code` for programmatic checks.
 * Group state errors (duplicate, missing, removed, out of range) are caller
 * logic errors and can be recovered from by re-reading the group. Verification
 * never throws; see verifier.ts.
 */

/**
 * Base error class for all signet errors
 */
export class SignetError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'SignetError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation error for invalid input or constraints
 */
export class SignetValidationError extends SignetError {
  readonly field?: string;

  constructor(message: string, field?: string, code: string = 'VALIDATION_ERROR') {
    super(code, message);
    this.name = 'SignetValidationError';
    this.field = field;
  }
}

/**
 * Configuration error for missing artifacts or invalid setup
 */
export class SignetConfigError extends SignetError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'SignetConfigError';
  }
}

/**
 * Proof error for proof generation/import issues
 */
export class SignetProofError extends SignetError {
  constructor(message: string, code = 'PROOF_ERROR') {
    super(code, message);
    this.name = 'SignetProofError';
  }
}

/** The seed handed to identity derivation is empty or of the wrong type. */
export class InvalidSeedError extends SignetValidationError {
  constructor(message: string) {
    super(message, 'seed', 'INVALID_SEED');
    this.name = 'InvalidSeedError';
  }
}

export class DuplicateMemberError extends SignetValidationError {
  readonly member: bigint;

  constructor(member: bigint) {
    super(`Member ${member} is already in the group`, 'member', 'DUPLICATE_MEMBER');
    this.name = 'DuplicateMemberError';
    this.member = member;
  }
}

export class MemberNotFoundError extends SignetValidationError {
  readonly member: bigint;

  constructor(member: bigint) {
    super(`Member ${member} is not in the group`, 'member', 'MEMBER_NOT_FOUND');
    this.name = 'MemberNotFoundError';
    this.member = member;
  }
}

export class IndexOutOfRangeError extends SignetValidationError {
  readonly index: number;

  constructor(index: number, message = `Leaf index ${index} is out of range`) {
    super(message, 'index', 'INDEX_OUT_OF_RANGE');
    this.name = 'IndexOutOfRangeError';
    this.index = index;
  }
}

/** The zero sentinel marks removed slots and can never be a member. */
export class EmptyMemberError extends SignetValidationError {
  constructor() {
    super('Member value cannot be 0', 'member', 'EMPTY_MEMBER');
    this.name = 'EmptyMemberError';
  }
}

export class RemovedMemberError extends SignetValidationError {
  readonly index: number;

  constructor(index: number) {
    super(`Member at index ${index} has been removed`, 'index', 'REMOVED_MEMBER');
    this.name = 'RemovedMemberError';
    this.index = index;
  }
}

export class UnsupportedDepthError extends SignetValidationError {
  readonly depth: number;

  constructor(depth: number, min: number, max: number) {
    super(
      `The tree depth must be an integer between ${min} and ${max} (got ${depth})`,
      'merkleTreeDepth',
      'UNSUPPORTED_DEPTH',
    );
    this.name = 'UnsupportedDepthError';
    this.depth = depth;
  }
}

/**
 * The proving backend rejected the inputs, or its outputs disagree with the
 * locally computed root or nullifier (typically a stale Merkle proof).
 */
export class ProvingError extends SignetProofError {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, 'PROVING_ERROR');
    this.name = 'ProvingError';
    this.cause = cause;
  }
}

export class MalformedProofError extends SignetProofError {
  constructor(message: string) {
    super(message, 'MALFORMED_PROOF');
    this.name = 'MalformedProofError';
  }
}

/**
 * Error codes for programmatic error checking
 */
export const SignetErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  PROOF_ERROR: 'PROOF_ERROR',
  INVALID_SEED: 'INVALID_SEED',
  DUPLICATE_MEMBER: 'DUPLICATE_MEMBER',
  MEMBER_NOT_FOUND: 'MEMBER_NOT_FOUND',
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  EMPTY_MEMBER: 'EMPTY_MEMBER',
  REMOVED_MEMBER: 'REMOVED_MEMBER',
  UNSUPPORTED_DEPTH: 'UNSUPPORTED_DEPTH',
  PROVING_ERROR: 'PROVING_ERROR',
  MALFORMED_PROOF: 'MALFORMED_PROOF',
} as const;

export type SignetErrorCodeType = (typeof SignetErrorCode)[keyof typeof SignetErrorCode];
