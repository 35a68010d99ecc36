// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

export type SyntaxErrorKind =
  | 'UnexpectedToken'
  | 'UnbalancedParentheses'
  | 'UnknownFunction'
  | 'NestingTooDeep'
  | 'InvalidCharacter'
  | 'InvalidAddress';

export type ChecksumErrorKind =
  | 'ChecksumMismatch'
  | 'MalformedChecksum'
  | 'MissingChecksum';

export type KeyEncodingErrorKind = 'InvalidKeyEncoding';

export type SemanticErrorKind =
  | 'InvalidContext'
  | 'InvalidThreshold'
  | 'UncompressedKey'
  | 'ScriptTooLarge'
  | 'MultipleScripts'
  | 'NoAddress';

export type DerivationErrorKind =
  | 'HardenedFromPublic'
  | 'InvalidChildKey'
  | 'InvalidPathStep'
  | 'UnresolvedStep'
  | 'DepthExceeded';

export type DescriptorErrorKind =
  | SyntaxErrorKind
  | ChecksumErrorKind
  | KeyEncodingErrorKind
  | SemanticErrorKind
  | DerivationErrorKind;

/**
 * Base class of every failure raised by this library. `offset` is the byte
 * offset in the descriptor text where the problem was detected, when the
 * failure comes from parsing.
 */
export abstract class DescriptorError extends Error {
  abstract readonly kind: DescriptorErrorKind;
  readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`);
    this.name = new.target.name;
    this.offset = offset;
  }
}

export class DescriptorSyntaxError extends DescriptorError {
  readonly kind: SyntaxErrorKind;
  constructor(kind: SyntaxErrorKind, message: string, offset?: number) {
    super(message, offset);
    this.kind = kind;
  }
}

export class ChecksumError extends DescriptorError {
  readonly kind: ChecksumErrorKind;
  constructor(kind: ChecksumErrorKind, message: string, offset?: number) {
    super(message, offset);
    this.kind = kind;
  }
}

export class KeyEncodingError extends DescriptorError {
  readonly kind: KeyEncodingErrorKind = 'InvalidKeyEncoding';
}

export class SemanticError extends DescriptorError {
  readonly kind: SemanticErrorKind;
  constructor(kind: SemanticErrorKind, message: string) {
    super(message);
    this.kind = kind;
  }
}

export class DerivationError extends DescriptorError {
  readonly kind: DerivationErrorKind;
  constructor(kind: DerivationErrorKind, message: string, offset?: number) {
    super(message, offset);
    this.kind = kind;
  }
}

export type Result<T, E = DescriptorError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Runs `fn` and turns a thrown {@link DescriptorError} into a failed result.
 * Anything else is rethrown: it is a bug, not a bad input.
 */
export function toResult<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof DescriptorError) return { ok: false, error };
    throw error;
  }
}
