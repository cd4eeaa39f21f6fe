import type { SigningAlgorithm } from './types.js';

export type ServiceOperation = 'GetPublicKey' | 'Sign' | 'DescribeKey';

export abstract class SignerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class KeyReferenceError extends SignerError {
  readonly code = 'KEY_REFERENCE_INVALID' as const;
}

export class UnsupportedSchemeError extends SignerError {
  readonly code = 'UNSUPPORTED_SCHEME' as const;

  constructor(readonly scheme: string) {
    super(`Unsupported key reference scheme: ${scheme}`);
  }
}

export class SignerNotRegisteredError extends SignerError {
  readonly code = 'SIGNER_NOT_REGISTERED' as const;

  constructor(readonly uri: string) {
    super(`No signer registered for ${uri}`);
  }
}

export class KeyFormatError extends SignerError {
  readonly code = 'KEY_FORMAT' as const;
}

export class UnsupportedKeyError extends SignerError {
  readonly code = 'UNSUPPORTED_KEY' as const;
}

export class UnsupportedAlgorithmError extends SignerError {
  readonly code = 'UNSUPPORTED_ALGORITHM' as const;
}

export class InvalidSignatureEncodingError extends SignerError {
  readonly code = 'INVALID_SIGNATURE_ENCODING' as const;

  constructor(
    readonly keyReference: string,
    readonly algorithm: SigningAlgorithm,
    detail: string,
  ) {
    super(`Invalid ${algorithm} signature returned for ${keyReference}: ${detail}`);
  }
}

export interface RemoteServiceErrorInit {
  operation: ServiceOperation;
  keyReference: string;
  transient: boolean;
  exhausted?: boolean;
  attempts?: number;
  /** Service error name, e.g. ThrottlingException. */
  serviceCode?: string;
  cause?: unknown;
}

export class RemoteServiceError extends SignerError {
  readonly code = 'REMOTE_SERVICE' as const;
  readonly operation: ServiceOperation;
  readonly keyReference: string;
  readonly transient: boolean;
  readonly exhausted: boolean;
  readonly attempts?: number;
  readonly serviceCode?: string;

  constructor(init: RemoteServiceErrorInit) {
    super(describeServiceFailure(init), { cause: init.cause });
    this.operation = init.operation;
    this.keyReference = init.keyReference;
    this.transient = init.transient;
    this.exhausted = init.exhausted ?? false;
    this.attempts = init.attempts;
    this.serviceCode = init.serviceCode;
  }

  /** Copy with retry bookkeeping applied. */
  withAttempts(attempts: number, exhausted = false): RemoteServiceError {
    return new RemoteServiceError({
      operation: this.operation,
      keyReference: this.keyReference,
      transient: this.transient,
      exhausted,
      attempts,
      serviceCode: this.serviceCode,
      cause: this.cause,
    });
  }
}

export type CancelReason = 'aborted' | 'deadline';

export class CancelledError extends SignerError {
  readonly code = 'CANCELLED' as const;

  constructor(readonly reason: CancelReason, options?: { cause?: unknown }) {
    super(reason === 'deadline' ? 'Operation deadline exceeded' : 'Operation cancelled', options);
  }

  static fromSignal(signal: AbortSignal): CancelledError {
    const cause: unknown = signal.reason;
    const reason: CancelReason =
      typeof cause === 'object' && cause !== null && 'name' in cause && cause.name === 'TimeoutError'
        ? 'deadline'
        : 'aborted';
    return new CancelledError(reason, { cause });
  }
}

export class HealthCheckError extends SignerError {
  readonly code = 'HEALTH_CHECK_FAILED' as const;
}

function describeServiceFailure(init: RemoteServiceErrorInit): string {
  const what = init.serviceCode ?? 'request failed';
  let message = `KMS ${init.operation} failed for ${init.keyReference}: ${what}`;
  if (init.exhausted) {
    message += ` (retries exhausted after ${init.attempts ?? 0} attempts)`;
  } else if (!init.transient) {
    message += ' (permanent)';
  }
  return message;
}
