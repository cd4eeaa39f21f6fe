import { createHash } from 'node:crypto';
import type { IKmsClient } from './kms-client.js';
import { InvalidSignatureEncodingError, UnsupportedAlgorithmError } from './errors.js';
import { derToP1363, parseDerSignature } from './key-util.js';
import { withRetry, type RetryInfo, type RetryPolicy, type Sleep } from './retry.js';
import type {
  CallOptions,
  DigestAlgorithm,
  EcCurve,
  KeyDescriptor,
  RsaPadding,
  SignRequest,
  Signature,
  SigningAlgorithm,
} from './types.js';

/**
 * (family, padding-or-curve, digest) → service algorithm. A combination that
 * is missing here cannot be signed.
 */
export const SIGNING_ALGORITHM_TABLE: Readonly<Record<string, SigningAlgorithm>> = {
  'rsa/pss/sha256': 'RSASSA_PSS_SHA_256',
  'rsa/pss/sha384': 'RSASSA_PSS_SHA_384',
  'rsa/pss/sha512': 'RSASSA_PSS_SHA_512',
  'rsa/pkcs1-v1_5/sha256': 'RSASSA_PKCS1_V1_5_SHA_256',
  'rsa/pkcs1-v1_5/sha384': 'RSASSA_PKCS1_V1_5_SHA_384',
  'rsa/pkcs1-v1_5/sha512': 'RSASSA_PKCS1_V1_5_SHA_512',
  'ecdsa/P-256/sha256': 'ECDSA_SHA_256',
  'ecdsa/P-384/sha384': 'ECDSA_SHA_384',
  'ecdsa/P-521/sha512': 'ECDSA_SHA_512',
  'ecdsa/secp256k1/sha256': 'ECDSA_SHA_256',
};

export interface SigningScheme {
  digest: DigestAlgorithm;
  rsaPadding: RsaPadding;
}

/**
 * Pick the service algorithm for a key and the host's signing scheme.
 * Throws UnsupportedAlgorithmError when the table has no entry.
 */
export function selectSigningAlgorithm(
  descriptor: Pick<KeyDescriptor, 'algorithmFamily' | 'curve'>,
  scheme: SigningScheme,
): SigningAlgorithm {
  const variant: RsaPadding | EcCurve | undefined =
    descriptor.algorithmFamily === 'rsa' ? scheme.rsaPadding : descriptor.curve;
  const algorithm =
    SIGNING_ALGORITHM_TABLE[`${descriptor.algorithmFamily}/${variant ?? 'unknown'}/${scheme.digest}`];
  if (!algorithm) {
    throw new UnsupportedAlgorithmError(
      `No signing algorithm for ${descriptor.algorithmFamily}` +
        `${variant ? ` (${variant})` : ''} with ${scheme.digest}`,
    );
  }
  return algorithm;
}

export interface SigningEngineConfig {
  digest?: DigestAlgorithm;
  rsaPadding?: RsaPadding;
  /** ECDSA output form; the service returns DER. */
  ecdsaSignatureEncoding?: 'der' | 'ieee-p1363';
  retryPolicy?: RetryPolicy;
  onRetry?: (info: RetryInfo) => void;
  sleep?: Sleep;
}

export class SigningEngine {
  private readonly kmsClient: IKmsClient;
  private readonly scheme: SigningScheme;
  private readonly ecdsaSignatureEncoding: 'der' | 'ieee-p1363';
  private readonly config: SigningEngineConfig;

  constructor(kmsClient: IKmsClient, config: SigningEngineConfig = {}) {
    this.kmsClient = kmsClient;
    this.config = config;
    this.scheme = {
      digest: config.digest ?? 'sha256',
      rsaPadding: config.rsaPadding ?? 'pss',
    };
    this.ecdsaSignatureEncoding = config.ecdsaSignatureEncoding ?? 'der';
  }

  get signingScheme(): SigningScheme {
    return { ...this.scheme };
  }

  /**
   * Sign a message: hash -> select algorithm -> KMS sign (retried) -> validate encoding.
   */
  async sign(
    descriptor: KeyDescriptor,
    message: Uint8Array,
    options: CallOptions = {},
  ): Promise<Signature> {
    const algorithm = this.selectAlgorithm(descriptor);
    const digest = new Uint8Array(createHash(this.scheme.digest).update(message).digest());
    const request = this.createRequest(descriptor, digest, algorithm);

    const raw = await withRetry(
      () =>
        this.kmsClient.sign(
          request.keyReference.resourceId,
          request.digest,
          request.algorithm,
          options.signal,
        ),
      {
        operation: 'Sign',
        keyReference: request.keyReference.uri,
        policy: this.config.retryPolicy,
        signal: options.signal,
        onRetry: this.config.onRetry,
        sleep: this.config.sleep,
      },
    );

    return this.toSignature(descriptor, algorithm, raw);
  }

  selectAlgorithm(descriptor: KeyDescriptor): SigningAlgorithm {
    const algorithm = selectSigningAlgorithm(descriptor, this.scheme);
    const supported = descriptor.signingAlgorithms;
    if (supported.length > 0 && !supported.includes(algorithm)) {
      throw new UnsupportedAlgorithmError(
        `${algorithm} is not supported by ${descriptor.keyReference.uri} ` +
          `(supported: ${supported.join(', ')})`,
      );
    }
    return algorithm;
  }

  private createRequest(
    descriptor: KeyDescriptor,
    digest: Uint8Array,
    algorithm: SigningAlgorithm,
  ): SignRequest {
    return Object.freeze({ keyReference: descriptor.keyReference, digest, algorithm });
  }

  private toSignature(
    descriptor: KeyDescriptor,
    algorithm: SigningAlgorithm,
    raw: Uint8Array,
  ): Signature {
    const uri = descriptor.keyReference.uri;
    if (raw.length === 0) {
      throw new InvalidSignatureEncodingError(uri, algorithm, 'signature is empty');
    }

    if (descriptor.algorithmFamily === 'rsa') {
      const expected = (descriptor.keySize ?? 0) / 8;
      if (raw.length !== expected) {
        throw new InvalidSignatureEncodingError(
          uri,
          algorithm,
          `expected ${expected} bytes, got ${raw.length}`,
        );
      }
      return Object.freeze({
        bytes: raw,
        algorithm,
        encoding: 'raw' as const,
        keyId: descriptor.derivedKeyId,
      });
    }

    const curve = descriptor.curve;
    if (!curve) {
      throw new InvalidSignatureEncodingError(uri, algorithm, 'descriptor has no curve');
    }
    let bytes: Uint8Array;
    try {
      parseDerSignature(raw, curve);
      bytes = this.ecdsaSignatureEncoding === 'ieee-p1363' ? derToP1363(raw, curve) : raw;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new InvalidSignatureEncodingError(uri, algorithm, detail);
    }

    return Object.freeze({
      bytes,
      algorithm,
      encoding: this.ecdsaSignatureEncoding,
      keyId: descriptor.derivedKeyId,
    });
  }
}
