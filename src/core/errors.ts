import { DigestAlgorithm } from '../types';

/**
 * One failed schema rule, located by JSON pointer
 */
export interface Violation {
  location: string;
  message: string;
  keyword: string;
}

export type MetaErrorCode =
  | 'schema_violation'
  | 'semantic_violation'
  | 'unsupported_spec_version'
  | 'conversion_failure'
  | 'merge_violation'
  | 'digest_mismatch'
  | 'payload_decode'
  | 'envelope_violation'
  | 'schema_registration';

/**
 * Base class for every error raised by the metadata engine
 */
export abstract class MetaError extends Error {
  abstract readonly code: MetaErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

function summarize(violations: readonly Violation[]): string {
  return violations.map((v) => `${v.location || '/'}: ${v.message}`).join('; ');
}

export class SchemaViolationError extends MetaError {
  readonly code = 'schema_violation';

  constructor(
    readonly schema: string,
    readonly violations: readonly Violation[]
  ) {
    super(`Document does not match ${schema}: ${summarize(violations)}`);
  }
}

export class SemanticViolationError extends MetaError {
  readonly code = 'semantic_violation';

  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`${path}: ${reason}`);
  }
}

export class UnsupportedSpecVersionError extends MetaError {
  readonly code = 'unsupported_spec_version';

  constructor(readonly version?: string) {
    super(
      version === undefined
        ? 'cannot determine meta-spec version'
        : `unsupported meta-spec version ${JSON.stringify(version)}`
    );
  }
}

export class ConversionError extends MetaError {
  readonly code = 'conversion_failure';

  constructor(
    message: string,
    readonly violations: readonly Violation[] = []
  ) {
    super(violations.length > 0 ? `${message}: ${summarize(violations)}` : message);
  }
}

export class MergeError extends MetaError {
  readonly code = 'merge_violation';

  constructor(
    message: string,
    readonly violations: readonly Violation[] = []
  ) {
    super(violations.length > 0 ? `${message}: ${summarize(violations)}` : message);
  }
}

export class DigestMismatchError extends MetaError {
  readonly code = 'digest_mismatch';

  constructor(
    readonly algorithm: DigestAlgorithm,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`${algorithm} digest mismatch: expected ${expected}, got ${actual}`);
  }
}

export type PayloadStage = 'base64' | 'json' | 'schema';

export class PayloadDecodeError extends MetaError {
  readonly code = 'payload_decode';

  constructor(
    readonly stage: PayloadStage,
    message: string,
    readonly violations: readonly Violation[] = []
  ) {
    super(`JWS payload ${stage} error: ${message}`);
  }
}

export class EnvelopeError extends MetaError {
  readonly code = 'envelope_violation';

  constructor(readonly violations: readonly Violation[]) {
    super(`Malformed JWS envelope: ${summarize(violations)}`);
  }
}

export class SchemaRegistrationError extends MetaError {
  readonly code = 'schema_registration';
}

export function isMetaError(error: unknown): error is MetaError {
  return error instanceof MetaError;
}

/**
 * Violations carried by an error, if it has any
 */
export function violationsOf(error: MetaError): readonly Violation[] {
  if (
    error instanceof SchemaViolationError ||
    error instanceof ConversionError ||
    error instanceof MergeError ||
    error instanceof PayloadDecodeError ||
    error instanceof EnvelopeError
  ) {
    return error.violations;
  }
  if (error instanceof SemanticViolationError) {
    return [{ location: error.path, message: error.reason, keyword: 'semantic' }];
  }
  return [];
}

/**
 * Message of a thrown value. Errors raised by Node itself may come from
 * another realm under test runners, so this does not rely on instanceof.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
